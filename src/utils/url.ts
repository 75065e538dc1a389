/**
 * Remove one trailing "/" if present.
 *
 * Only a single separator is dropped: "https://host/sig//" becomes
 * "https://host/sig/", not "https://host/sig".
 */
export function stripTrailingSlash(url: string): string {
  return url.replace(/\/$/, '');
}

/**
 * Check that a string parses as an absolute http(s) URL
 */
export function isHttpUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}
