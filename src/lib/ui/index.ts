/**
 * Shared UI primitives for CLI output.
 */

// Output gating
export { printErr } from './output.js';

// Error output
export { printError, errorToDisplay } from './error.js';
export type { ErrorDisplayOptions } from './error.js';
