/**
 * Read the signature server password from piped stdin.
 *
 * Passwords piped via stdin don't leak through `ps` or /proc/pid/environ.
 * A 5-second timeout prevents hanging when nothing is piped.
 */

import { AppError, ErrorCode } from '../errors/types';

const STDIN_TIMEOUT_MS = 5_000;

/**
 * Read password from stdin pipe.
 * Rejects if nothing arrives within 5 s or the input is blank.
 */
export function readPasswordFromStdin(): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = '';
    const timeout = setTimeout(() => {
      reject(new AppError('Timeout reading password from stdin', ErrorCode.VALIDATION_ERROR));
    }, STDIN_TIMEOUT_MS);

    process.stdin.setEncoding('utf8');
    process.stdin.on('data', (chunk) => { data += chunk; });
    process.stdin.on('end', () => {
      clearTimeout(timeout);
      const trimmed = data.trim();
      if (!trimmed) {
        reject(new AppError('No password received from stdin', ErrorCode.VALIDATION_ERROR));
        return;
      }
      resolve(trimmed);
    });
    process.stdin.on('error', (err) => {
      clearTimeout(timeout);
      reject(err);
    });
    process.stdin.resume();
  });
}
