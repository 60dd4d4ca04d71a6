/**
 * Output gate for diagnostics.
 *
 * Hooks keep stdout clean; everything the user needs to read goes to stderr.
 */

/**
 * Write to stderr.
 */
export function printErr(...args: unknown[]): void {
  console.error(...args);
}
