/**
 * issue-hook rules - branch format and cross-validation
 *
 * Pure functions: no git, no file system. The validator composes them per phase.
 */

import { BRANCH_FORMAT_PATTERN } from '../constants.js';
import { formatIssueList, formatIssueReference } from './extract.js';
import type { CrossValidationInput, ValidationResult } from './types.js';

const ACCEPTED: ValidationResult = { kind: 'accepted' };

/**
 * Shared accepted result
 */
export function accepted(): ValidationResult {
  return ACCEPTED;
}

/**
 * Branch must start with an issue number followed by a dash: "2325-fix-login".
 * Callers skip this rule for excluded branches.
 */
export function checkBranchFormat(branchName: string): ValidationResult {
  if (BRANCH_FORMAT_PATTERN.test(branchName)) {
    return ACCEPTED;
  }
  return {
    kind: 'rejected',
    reason: 'InvalidBranchFormat',
    detail: `Branch name "${branchName}" must start with an issue number followed by a dash.`,
  };
}

/**
 * Cross-check the issue numbers in a commit message against the branch.
 *
 * | referenced | excluded | multi | outcome                                   |
 * |------------|----------|-------|-------------------------------------------|
 * | 0          | any      | any   | MissingIssueNumber                        |
 * | 1          | false    | any   | accepted iff it is the branch number      |
 * | 1          | true     | any   | accepted                                  |
 * | >1         | any      | false | MultipleIssueNumbersNotAllowed            |
 * | >1         | false    | true  | accepted iff branch number is among them  |
 * | >1         | true     | true  | accepted                                  |
 */
export function crossValidate(input: CrossValidationInput): ValidationResult {
  const { referenced, branchIssueNumber, excluded, allowMultiIssue } = input;

  if (referenced.length === 0) {
    return {
      kind: 'rejected',
      reason: 'MissingIssueNumber',
      detail: "Commit message does not contain an issue number. Did you prepend it with '#'?",
    };
  }

  if (referenced.length > 1 && !allowMultiIssue) {
    return {
      kind: 'rejected',
      reason: 'MultipleIssueNumbersNotAllowed',
      detail: `Commit message contains more than one issue number (${formatIssueList(referenced)}).`,
    };
  }

  if (excluded) {
    return ACCEPTED;
  }

  if (branchIssueNumber !== null && referenced.includes(branchIssueNumber)) {
    return ACCEPTED;
  }

  const branchDescription =
    branchIssueNumber === null
      ? 'the branch has no issue number'
      : `the branch is for issue ${formatIssueReference(branchIssueNumber)}`;

  return {
    kind: 'rejected',
    reason: 'IssueNumberMismatch',
    detail: `Commit message references ${formatIssueList(referenced)} but ${branchDescription}.`,
  };
}
