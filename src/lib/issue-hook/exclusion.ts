/**
 * issue-hook exclusion - branch exclusion patterns
 */

/**
 * Check whether a branch is excluded from the branch-format rule.
 *
 * Each pattern is searched for anywhere in the branch name, so "release/" excludes
 * "release/1.2" while "^main$" excludes only "main".
 */
export function isBranchExcluded(branchName: string, patterns: readonly RegExp[]): boolean {
  return patterns.some((pattern) => branchName.search(pattern) !== -1);
}
