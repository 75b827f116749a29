/**
 * Environment resolution
 */

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.IDXMETA_CLI_DEBUG === "1";
}
