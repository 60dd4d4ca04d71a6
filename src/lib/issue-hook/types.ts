/**
 * issue-hook types - configuration, phases and validation outcomes
 */

/**
 * Reasons a hook run can be rejected
 */
export type ErrorKind =
  | 'InvalidBranchFormat'
  | 'MissingIssueNumber'
  | 'MultipleIssueNumbersNotAllowed'
  | 'IssueNumberMismatch'
  | 'ConfigurationError';

/**
 * Outcome of a rule or of a whole phase
 */
export type ValidationResult =
  | { kind: 'accepted' }
  | { kind: 'rejected'; reason: ErrorKind; detail: string };

/**
 * Where the issue number gets inserted into the commit message
 */
export type AutoInsertMode = 'prepend' | 'append';

/**
 * Immutable hook configuration, built once per process
 */
export interface HookConfiguration {
  /** Branches matching any of these skip the branch-format rule */
  readonly excludePatterns: readonly RegExp[];
  /** Allow a commit message to reference more than one issue */
  readonly allowMultiIssue: boolean;
  /** Insert the branch issue number at the start of the message */
  readonly autoPrepend: boolean;
  /** Insert the branch issue number at the end of the message */
  readonly autoAppend: boolean;
}

/**
 * Raw option values as they arrive from the command line
 */
export interface HookOptionsInput {
  excludeBranches?: readonly string[];
  multiIssueCommits?: boolean;
  autoPrepend?: boolean;
  autoAppend?: boolean;
}

/**
 * The hook stage being run - discriminated union dispatched once per invocation
 */
export type HookPhase =
  | { kind: 'branch'; branchName: string }
  | { kind: 'commit-msg'; branchName: string; messageFile: string };

/**
 * Inputs to the cross-validation rule
 */
export interface CrossValidationInput {
  /** Issue numbers referenced in the commit message, first occurrence order */
  referenced: readonly bigint[];
  /** Leading issue number of the branch, null when it has none */
  branchIssueNumber: bigint | null;
  /** Whether the branch matched an exclusion pattern */
  excluded: boolean;
  allowMultiIssue: boolean;
}

/**
 * Result of checking a commit message, with the rewritten text when auto-insert applied
 */
export interface CommitMessageCheck {
  result: ValidationResult;
  /** New message to write back, null when the file must stay untouched */
  rewrittenMessage: string | null;
}

/**
 * Commit message file access, injectable for tests
 */
export interface CommitMessageIO {
  read(filePath: string): string;
  write(filePath: string, content: string): void;
}
