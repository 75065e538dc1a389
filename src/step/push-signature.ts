/**
 * push-container-signature step: uploads the detached signature produced
 * by sign-container-image to a signature server over HTTP.
 *
 * Step configuration
 * | Key                                         | Required | Default |
 * |---------------------------------------------|----------|---------|
 * | `container-image-signature-server-url`      | yes      |         |
 * | `container-image-signature-server-username` | yes      |         |
 * | `container-image-signature-server-password` | yes      |         |
 *
 * Results consumed: `container-image-signature-file-path`,
 * `container-image-signature-name`.
 *
 * Results produced: `container-image-signature-url`,
 * `container-image-signature-file-md5`, `container-image-signature-file-sha1`.
 */

import { AppError, ErrorCode } from '../errors/types';
import { SignatureUploader } from '../signature/uploader';
import {
  STEP_NAME,
  IMPLEMENTER_NAME,
  CONFIG_SERVER_URL,
  CONFIG_SERVER_USERNAME,
  CONFIG_SERVER_PASSWORD,
  RESULT_SIGNATURE_FILE_PATH,
  RESULT_SIGNATURE_NAME,
  RESULT_SIGNATURE_URL,
  RESULT_SIGNATURE_FILE_MD5,
  RESULT_SIGNATURE_FILE_SHA1,
  ConfigValues,
  ResultValues,
} from '../types/step';
import { isHttpUrl } from '../utils/url';
import { logger } from '../utils/logger';
import { StepResult } from './step-result';

const DEFAULT_CONFIG: ConfigValues = {};

export const REQUIRED_CONFIG_KEYS = [
  CONFIG_SERVER_URL,
  CONFIG_SERVER_USERNAME,
  CONFIG_SERVER_PASSWORD,
] as const;

function requireValue(values: ConfigValues, key: string): string {
  const value = values[key];
  if (value === undefined || value === '') {
    throw new AppError(
      `Missing required configuration: ${key}`,
      ErrorCode.VALIDATION_ERROR,
      { missing: [key] },
      false
    );
  }
  return value;
}

export class PushSignatureStep {
  readonly stepName = STEP_NAME;
  readonly implementerName = IMPLEMENTER_NAME;

  constructor(private readonly uploader: SignatureUploader = new SignatureUploader()) {}

  /**
   * Lowest-precedence configuration values
   */
  static configDefaults(): ConfigValues {
    return { ...DEFAULT_CONFIG };
  }

  /**
   * Check required configuration before any work starts
   */
  validateConfig(config: ConfigValues): void {
    const missing = REQUIRED_CONFIG_KEYS.filter((key) => !config[key]);
    if (missing.length > 0) {
      throw new AppError(
        `Missing required configuration: ${missing.join(', ')}`,
        ErrorCode.VALIDATION_ERROR,
        { missing },
        false
      );
    }

    const serverUrl = requireValue(config, CONFIG_SERVER_URL);
    if (!isHttpUrl(serverUrl)) {
      throw new AppError(
        `${CONFIG_SERVER_URL} must be an http or https URL, got: ${serverUrl}`,
        ErrorCode.VALIDATION_ERROR,
        { key: CONFIG_SERVER_URL },
        false
      );
    }
  }

  /**
   * Run the step. Missing prior results produce a failed StepResult;
   * file and transport errors are thrown.
   */
  async run(config: ConfigValues, previousResults: ResultValues): Promise<StepResult> {
    this.validateConfig(config);

    const stepResult = new StepResult(this.stepName, this.implementerName);

    const filePath = previousResults[RESULT_SIGNATURE_FILE_PATH];
    if (!filePath) {
      return stepResult.fail(`Missing ${RESULT_SIGNATURE_FILE_PATH}`);
    }

    const objectName = previousResults[RESULT_SIGNATURE_NAME];
    if (!objectName) {
      return stepResult.fail(`Missing ${RESULT_SIGNATURE_NAME}`);
    }

    logger.debug(`Pushing signature ${objectName}`);

    const { url, md5, sha1 } = await this.uploader.upload({
      filePath,
      objectName,
      serverBaseURL: requireValue(config, CONFIG_SERVER_URL),
      username: requireValue(config, CONFIG_SERVER_USERNAME),
      password: requireValue(config, CONFIG_SERVER_PASSWORD),
    });

    stepResult.addArtifact(RESULT_SIGNATURE_URL, url, 'URL signature was uploaded to');
    stepResult.addArtifact(RESULT_SIGNATURE_FILE_MD5, md5, 'MD5 hash of signature file');
    stepResult.addArtifact(RESULT_SIGNATURE_FILE_SHA1, sha1, 'SHA1 hash of signature file');
    return stepResult;
  }
}
