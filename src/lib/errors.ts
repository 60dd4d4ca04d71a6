/**
 * Custom error classes for issue-ref-hook
 *
 * Rule violations are reported as ValidationResult values. These classes cover
 * failures that stop the hook before or outside the rules: bad arguments,
 * an unreadable commit message file, or git itself failing.
 */

/**
 * Base error class for all issue-ref-hook errors
 */
export class IssueHookError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IssueHookError';
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Error thrown when a git command fails
 */
export class GitCommandError extends IssueHookError {
  public readonly command: string;
  public readonly exitCode?: number;
  public readonly stderr?: string;

  constructor(message: string, options: { command: string; exitCode?: number; stderr?: string }) {
    super(message);
    this.name = 'GitCommandError';
    this.command = options.command;
    this.exitCode = options.exitCode;
    this.stderr = options.stderr;
  }
}

/**
 * Error thrown when the hook options are invalid
 */
export class ConfigurationError extends IssueHookError {
  public readonly option?: string;
  public readonly value?: string;

  constructor(message: string, options: { option?: string; value?: string } = {}) {
    super(message);
    this.name = 'ConfigurationError';
    this.option = options.option;
    this.value = options.value;
  }
}

/**
 * Error thrown when the commit message file cannot be read or written
 */
export class CommitMessageFileError extends IssueHookError {
  public readonly filePath: string;
  public readonly operation: 'read' | 'write';

  constructor(message: string, options: { filePath: string; operation: 'read' | 'write' }) {
    super(message);
    this.name = 'CommitMessageFileError';
    this.filePath = options.filePath;
    this.operation = options.operation;
  }
}

/**
 * Type guard to check if error is a ConfigurationError
 */
export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

/**
 * Type guard to check if error is a GitCommandError
 */
export function isGitCommandError(error: unknown): error is GitCommandError {
  return error instanceof GitCommandError;
}
