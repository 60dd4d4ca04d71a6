/**
 * Centralized constants and defaults for issue-ref-hook
 */

/**
 * Marker that introduces an issue reference in commit messages (e.g. "#2325")
 */
export const ISSUE_MARKER = '#';

/**
 * Issue reference in free text: marker followed by one or more ASCII digits
 */
export const ISSUE_REFERENCE_PATTERN = /#(\d+)/g;

/**
 * Branch naming convention: leading issue number, dash, then anything
 */
export const BRANCH_FORMAT_PATTERN = /^(\d+)-.+$/;

/**
 * Git comment line in a commit message file ("# Please enter the commit message...")
 */
export const GIT_COMMENT_LINE_PATTERN = /^#(\s|$)/;

/**
 * Name git reports for the current branch when HEAD is detached
 */
export const DETACHED_HEAD = 'HEAD';

/**
 * Environment variable overriding the log level
 */
export const LOG_LEVEL_ENV = 'ISSUE_HOOK_LOG_LEVEL';

/**
 * Process exit codes
 */
export const ExitCode = {
  SUCCESS: 0,
  BRANCH_NAME_ERROR: 1,
  COMMIT_MESSAGE_ERROR: 2,
  CONFIGURATION_ERROR: 3,
  UNEXPECTED_ERROR: 1,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];
