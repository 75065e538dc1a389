import { createHash } from 'crypto';

/**
 * Transfer-integrity digests of a signature file
 */
export interface FileDigests {
  md5: string;
  sha1: string;
}

/**
 * Compute lowercase hex MD5 and SHA-1 over one buffer.
 */
export function computeDigests(contents: Uint8Array): FileDigests {
  return {
    md5: createHash('md5').update(contents).digest('hex'),
    sha1: createHash('sha1').update(contents).digest('hex'),
  };
}
