import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest';
import { printError, errorToDisplay } from './error.js';
import { setColorEnabled } from '../colors.js';
import { CommitMessageFileError, ConfigurationError, GitCommandError } from '../errors.js';

describe('ui/error', () => {
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    setColorEnabled(false);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('printError', () => {
    it('writes title to stderr with error icon', () => {
      printError({ title: 'Something failed' });
      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(errorSpy).toHaveBeenCalledWith('[ERROR] Something failed');
    });

    it('writes all three lines when title, detail, and hint provided', () => {
      printError({
        title: 'Invalid branch name',
        detail: 'Branch name "main" must start with an issue number followed by a dash.',
        hint: 'exclude it',
      });
      expect(errorSpy).toHaveBeenCalledTimes(3);
      expect(errorSpy.mock.calls[0][0]).toBe('[ERROR] Invalid branch name');
      expect(errorSpy.mock.calls[1][0]).toBe(
        '  Branch name "main" must start with an issue number followed by a dash.'
      );
      expect(errorSpy.mock.calls[2][0]).toBe('  Hint: exclude it');
    });

    it('skips empty detail and hint', () => {
      printError({ title: 'Fail', detail: '', hint: undefined });
      expect(errorSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe('errorToDisplay', () => {
    it('adds a hint for configuration errors', () => {
      expect(errorToDisplay(new ConfigurationError('bad flags'))).toEqual({
        title: 'bad flags',
        hint: 'Check the hook arguments in .pre-commit-config.yaml.',
      });
    });

    it('names the file for commit message file errors', () => {
      const error = new CommitMessageFileError('Cannot read commit message file: ENOENT', {
        filePath: 'missing.txt',
        operation: 'read',
      });
      expect(errorToDisplay(error)).toEqual({
        title: 'Cannot read commit message file: ENOENT',
        detail: 'File: missing.txt',
        hint: 'Pass the commit message file git gives to the commit-msg hook.',
      });
    });

    it('includes stderr from git errors', () => {
      const error = new GitCommandError('Git command failed: git status', {
        command: 'git status',
        stderr: 'fatal: not a git repository',
      });
      expect(errorToDisplay(error).detail).toBe('fatal: not a git repository');
    });

    it('handles plain errors and non-errors', () => {
      expect(errorToDisplay(new Error('boom'))).toEqual({ title: 'boom' });
      expect(errorToDisplay('boom')).toEqual({ title: 'boom' });
    });
  });
});
