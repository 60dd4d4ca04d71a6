import { describe, it, expect } from 'vitest';
import { rejectionToDisplay } from './format.js';

describe('issue-hook/format', () => {
  it('builds title, detail and hint for a rejection', () => {
    expect(rejectionToDisplay('IssueNumberMismatch', 'Commit message references #1')).toEqual({
      title: 'Commit message issue number does not match the branch',
      detail: 'Commit message references #1',
      hint: "Reference the branch's issue number in the commit message.",
    });
  });

  it('points at the multi-issue option for too many references', () => {
    expect(rejectionToDisplay('MultipleIssueNumbersNotAllowed', 'x').hint).toBe(
      'Use --multi-issue-commits if you wish to reference more than one issue per commit.'
    );
  });

  it('points at the exclusion option for bad branch names', () => {
    expect(rejectionToDisplay('InvalidBranchFormat', 'x').hint).toBe(
      'Rename the branch (git branch -m 123-short-description) or exclude it with --exclude-branches.'
    );
  });
});
