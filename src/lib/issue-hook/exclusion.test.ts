import { describe, it, expect } from 'vitest';
import { isBranchExcluded } from './exclusion.js';

describe('issue-hook/exclusion', () => {
  it('returns false when no patterns are configured', () => {
    expect(isBranchExcluded('main', [])).toBe(false);
  });

  it('matches anchored patterns exactly', () => {
    expect(isBranchExcluded('main', [/^main$/])).toBe(true);
    expect(isBranchExcluded('main-backup', [/^main$/])).toBe(false);
  });

  it('searches anywhere in the branch name', () => {
    expect(isBranchExcluded('release/1.2', [/release/])).toBe(true);
    expect(isBranchExcluded('hotfix/release-notes', [/release/])).toBe(true);
  });

  it('returns true when any pattern matches', () => {
    expect(isBranchExcluded('develop', [/^main$/, /^develop$/])).toBe(true);
  });

  it('returns false when no pattern matches', () => {
    expect(isBranchExcluded('feature-x', [/^main$/, /^develop$/])).toBe(false);
  });

  it('gives the same answer on repeated calls with a global pattern', () => {
    const patterns = [/main/g];
    expect(isBranchExcluded('main', patterns)).toBe(true);
    expect(isBranchExcluded('main', patterns)).toBe(true);
  });
});
