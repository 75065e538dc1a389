/**
 * Everything one signature upload needs, fully resolved by the caller.
 */
export interface UploadRequest {
  /** Local path of the detached signature file */
  filePath: string;
  /** Path-like name the signature is stored under, e.g. org/repo@sha256=abc/signature-1 */
  objectName: string;
  /** Signature server base URL, with or without one trailing "/" */
  serverBaseURL: string;
  username: string;
  password: string;
}

export interface UploadResult {
  readonly url: string;
  readonly md5: string;
  readonly sha1: string;
}

export interface UploaderOptions {
  /** Request timeout in milliseconds */
  timeout?: number;
}

export const CHECKSUM_SHA1_HEADER = 'X-Checksum-Sha1';
export const CHECKSUM_MD5_HEADER = 'X-Checksum-MD5';
