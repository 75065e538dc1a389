/**
 * Signature server credentials.
 *
 * Username and password normally come from step configuration or the
 * SIGNATURE_SERVER_* environment variables; `--password-stdin` lets a
 * pipeline pipe the password in instead.
 */

import { CONFIG_SERVER_PASSWORD, ConfigValues } from '../types/step';
import { readPasswordFromStdin } from './stdin';

export { readPasswordFromStdin } from './stdin';

export interface CredentialOptions {
  passwordStdin?: boolean;
}

/**
 * Config overrides contributed by credential options
 */
export async function resolveCredentialOverrides(options: CredentialOptions): Promise<ConfigValues> {
  if (options.passwordStdin) {
    return { [CONFIG_SERVER_PASSWORD]: await readPasswordFromStdin() };
  }
  return {};
}
