/**
 * Check if debug mode is enabled (DEBUG=true or DEBUG=1)
 */
export function isDebug(): boolean {
  return process.env.DEBUG === 'true' || process.env.DEBUG === '1';
}

/**
 * Check if verbose mode is enabled
 */
export function isVerbose(): boolean {
  return process.env.VERBOSE === 'true' && !isQuiet();
}

/**
 * Check if quiet mode is enabled
 */
export function isQuiet(): boolean {
  return process.env.QUIET === 'true';
}

/**
 * Print minimal output for scripts
 */
export function outputResult(data: string): void {
  console.log(data);
}
