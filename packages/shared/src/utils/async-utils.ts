/**
 * Async helpers shared by the client packages.
 */

/**
 * Pause execution for a specified duration. Negative values resolve on the next tick.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}
