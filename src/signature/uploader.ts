import * as fs from 'fs/promises';
import { HttpClient, isHttpClientError } from '../api/http-client';
import { mapHttpError, toAppError } from '../errors/handler';
import { TransportError } from '../errors/types';
import {
  UploadRequest,
  UploadResult,
  UploaderOptions,
  CHECKSUM_MD5_HEADER,
  CHECKSUM_SHA1_HEADER,
} from '../types/upload';
import { stripTrailingSlash } from '../utils/url';
import { logger } from '../utils/logger';
import { computeDigests } from './digests';

/**
 * Build the URL a signature is stored at.
 *
 * @example buildSignatureUrl("https://sig.example.com/sigs/", "user/app@sha256=ab/signature-1")
 *   => "https://sig.example.com/sigs/user/app@sha256=ab/signature-1"
 */
export function buildSignatureUrl(serverBaseURL: string, objectName: string): string {
  return `${stripTrailingSlash(serverBaseURL)}/${objectName}`;
}

/**
 * Publishes one detached signature file to a signature server with a
 * single checksum-verified PUT. Holds no per-upload state.
 */
export class SignatureUploader {
  private readonly timeout?: number;

  constructor(options: UploaderOptions = {}) {
    this.timeout = options.timeout;
  }

  async upload(request: UploadRequest): Promise<UploadResult> {
    let contents: Buffer;
    try {
      contents = await fs.readFile(request.filePath);
    } catch (error) {
      throw toAppError(error);
    }

    const { md5, sha1 } = computeDigests(contents);
    const url = buildSignatureUrl(request.serverBaseURL, request.objectName);

    logger.debug(`Uploading ${request.filePath} (${contents.length} bytes) to ${url}`);
    logger.debug(`md5=${md5} sha1=${sha1}`);

    const client = HttpClient.create({
      timeout: this.timeout,
      auth: { username: request.username, password: request.password },
    });

    try {
      await client.put(url, contents, {
        headers: {
          [CHECKSUM_SHA1_HEADER]: sha1,
          [CHECKSUM_MD5_HEADER]: md5,
          'Content-Type': 'application/octet-stream',
        },
      });
    } catch (error) {
      if (isHttpClientError(error)) {
        throw new TransportError(url, mapHttpError(error), error.message);
      }
      throw error;
    }

    return Object.freeze({ url, md5, sha1 });
  }
}
