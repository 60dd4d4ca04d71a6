/**
 * issue-hook extract - pure issue number extraction
 */

import { BRANCH_FORMAT_PATTERN, ISSUE_MARKER, ISSUE_REFERENCE_PATTERN } from '../constants.js';

/**
 * Extract every issue number referenced with the marker ("#2325") from free text.
 *
 * Numbers are returned in order of first appearance with duplicates removed.
 * "#abc" and a bare "#" are not references. Values are bigint so digit runs of
 * any length compare exactly ("#007" and "#7" are the same issue).
 */
export function extractIssueNumbers(text: string): bigint[] {
  const seen = new Set<bigint>();
  for (const match of text.matchAll(ISSUE_REFERENCE_PATTERN)) {
    seen.add(BigInt(match[1]));
  }
  return [...seen];
}

/**
 * Extract the leading issue number from a branch name like "2325-fix-login".
 * Returns null when the branch does not start with digits followed by a dash.
 */
export function extractBranchIssueNumber(branchName: string): bigint | null {
  const match = BRANCH_FORMAT_PATTERN.exec(branchName);
  if (!match) {
    return null;
  }
  return BigInt(match[1]);
}

/**
 * Render an issue number the way it appears in commit messages
 */
export function formatIssueReference(issueNumber: bigint): string {
  return `${ISSUE_MARKER}${issueNumber}`;
}

/**
 * Render a list of issue numbers for diagnostics: "#1, #2"
 */
export function formatIssueList(issueNumbers: readonly bigint[]): string {
  return issueNumbers.map(formatIssueReference).join(', ');
}
