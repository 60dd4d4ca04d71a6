/**
 * issue-hook config - build the immutable hook configuration
 */

import { ConfigurationError } from '../errors.js';
import type { HookConfiguration, HookOptionsInput } from './types.js';

/**
 * Default configuration: no exclusions, single-issue commits, no auto-insert
 */
export function getDefaultConfiguration(): HookConfiguration {
  return Object.freeze({
    excludePatterns: Object.freeze([]),
    allowMultiIssue: false,
    autoPrepend: false,
    autoAppend: false,
  });
}

/**
 * Compile an exclusion pattern, failing with a ConfigurationError when it is not
 * a valid regular expression.
 */
export function compileExcludePattern(pattern: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Invalid --exclude-branches pattern "${pattern}": ${reason}`, {
      option: 'exclude-branches',
      value: pattern,
    });
  }
}

/**
 * Build the hook configuration from raw option values.
 * Every pattern is compiled here so a bad regex fails before any check runs.
 */
export function buildConfiguration(input: HookOptionsInput = {}): HookConfiguration {
  const defaults = getDefaultConfiguration();
  const autoPrepend = input.autoPrepend ?? defaults.autoPrepend;
  const autoAppend = input.autoAppend ?? defaults.autoAppend;

  if (autoPrepend && autoAppend) {
    throw new ConfigurationError('--auto-prepend and --auto-append cannot be used together', {
      option: 'auto-prepend',
    });
  }

  const excludePatterns =
    input.excludeBranches === undefined
      ? defaults.excludePatterns
      : input.excludeBranches.map(compileExcludePattern);

  return Object.freeze({
    excludePatterns: Object.freeze(excludePatterns),
    allowMultiIssue: input.multiIssueCommits ?? defaults.allowMultiIssue,
    autoPrepend,
    autoAppend,
  });
}
