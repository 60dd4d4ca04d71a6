/**
 * Structured error display.
 */

import * as colors from '../colors.js';
import { CommitMessageFileError, isConfigurationError, isGitCommandError } from '../errors.js';
import { printErr } from './output.js';

export interface ErrorDisplayOptions {
  title: string;
  detail?: string;
  hint?: string;
}

/**
 * Display a structured error to stderr.
 *
 * Output format:
 * ```
 * ✗ {title}                    <- via colors.error()
 *   {detail}                   <- plain text, only if provided
 *   Hint: {hint}               <- via colors.dim(), only if provided
 * ```
 */
export function printError(options: ErrorDisplayOptions): void {
  printErr(colors.error(options.title));
  if (options.detail) {
    printErr(`  ${options.detail}`);
  }
  if (options.hint) {
    printErr(`  ${colors.dim(`Hint: ${options.hint}`)}`);
  }
}

/**
 * Extract display info from an error thrown outside the validation rules.
 */
export function errorToDisplay(error: unknown): ErrorDisplayOptions {
  const message = error instanceof Error ? error.message : String(error);

  if (isConfigurationError(error)) {
    return {
      title: message,
      hint: 'Check the hook arguments in .pre-commit-config.yaml.',
    };
  }

  if (error instanceof CommitMessageFileError) {
    return {
      title: message,
      detail: `File: ${error.filePath}`,
      hint: 'Pass the commit message file git gives to the commit-msg hook.',
    };
  }

  if (isGitCommandError(error)) {
    return {
      title: message,
      detail: error.stderr,
      hint: 'Run the hook inside a git repository, or pass --branch explicitly.',
    };
  }

  return { title: message };
}
