/**
 * Configuration and result keys of the push-container-signature step.
 */

export const STEP_NAME = 'push-container-signature';
export const IMPLEMENTER_NAME = 'HttpPut';

// Configuration keys
export const CONFIG_SERVER_URL = 'container-image-signature-server-url';
export const CONFIG_SERVER_USERNAME = 'container-image-signature-server-username';
export const CONFIG_SERVER_PASSWORD = 'container-image-signature-server-password';

// Results consumed from the sign-container-image step
export const RESULT_SIGNATURE_FILE_PATH = 'container-image-signature-file-path';
export const RESULT_SIGNATURE_NAME = 'container-image-signature-name';

// Results produced by this step
export const RESULT_SIGNATURE_URL = 'container-image-signature-url';
export const RESULT_SIGNATURE_FILE_MD5 = 'container-image-signature-file-md5';
export const RESULT_SIGNATURE_FILE_SHA1 = 'container-image-signature-file-sha1';

export type ConfigValues = Record<string, string | undefined>;
export type ResultValues = Record<string, string | undefined>;

export interface StepArtifact {
  name: string;
  value: string;
  description?: string;
}

export interface StepResultJSON {
  stepName: string;
  implementer: string;
  success: boolean;
  message: string;
  artifacts: StepArtifact[];
}
