/**
 * issue-hook format - human-readable rejection output
 */

import type { ErrorDisplayOptions } from '../ui/index.js';
import type { ErrorKind } from './types.js';

const TITLES: Record<ErrorKind, string> = {
  InvalidBranchFormat: 'Invalid branch name',
  MissingIssueNumber: 'Missing issue number in commit message',
  MultipleIssueNumbersNotAllowed: 'Too many issue numbers in commit message',
  IssueNumberMismatch: 'Commit message issue number does not match the branch',
  ConfigurationError: 'Invalid hook configuration',
};

const HINTS: Record<ErrorKind, string> = {
  InvalidBranchFormat:
    'Rename the branch (git branch -m 123-short-description) or exclude it with --exclude-branches.',
  MissingIssueNumber: 'Reference the issue as "#<number>" in the commit message.',
  MultipleIssueNumbersNotAllowed:
    'Use --multi-issue-commits if you wish to reference more than one issue per commit.',
  IssueNumberMismatch: "Reference the branch's issue number in the commit message.",
  ConfigurationError: 'Check the hook arguments in .pre-commit-config.yaml.',
};

/**
 * Build the printError payload for a rejection
 */
export function rejectionToDisplay(reason: ErrorKind, detail: string): ErrorDisplayOptions {
  return {
    title: TITLES[reason],
    detail,
    hint: HINTS[reason],
  };
}
