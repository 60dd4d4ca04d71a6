import { describe, it, expect, vi, beforeEach } from 'vitest';
import { execSync } from 'child_process';
import * as git from './git.js';
import { GitCommandError } from './errors.js';

// Mock child_process
vi.mock('child_process', () => ({
  execSync: vi.fn(),
}));

const mockExecSync = vi.mocked(execSync);

describe('git', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('exec', () => {
    it('executes git command and returns output with trailing whitespace trimmed', () => {
      mockExecSync.mockReturnValue('2325-test-branch\n');
      expect(git.exec(['rev-parse', '--abbrev-ref', 'HEAD'])).toBe('2325-test-branch');
      expect(mockExecSync).toHaveBeenCalledWith(
        'git rev-parse --abbrev-ref HEAD',
        expect.any(Object)
      );
    });

    it('passes cwd option correctly', () => {
      mockExecSync.mockReturnValue('output');
      git.exec(['status'], { cwd: '/some/path' });
      expect(mockExecSync).toHaveBeenCalledWith(
        'git status',
        expect.objectContaining({ cwd: '/some/path' })
      );
    });

    it('quotes arguments containing spaces', () => {
      mockExecSync.mockReturnValue('');
      git.exec(['log', '--format=%s %b']);
      expect(mockExecSync).toHaveBeenCalledWith('git log "--format=%s %b"', expect.any(Object));
    });

    it('throws GitCommandError with stderr and exit status on failure', () => {
      const error = Object.assign(new Error('Command failed'), {
        stderr: Buffer.from('fatal: not a git repository\n'),
        status: 128,
      });
      mockExecSync.mockImplementation(() => {
        throw error;
      });

      try {
        git.exec(['status']);
        expect.fail('expected exec to throw');
      } catch (thrown) {
        expect(thrown).toBeInstanceOf(GitCommandError);
        if (thrown instanceof GitCommandError) {
          expect(thrown.message).toBe('Git command failed: git status');
          expect(thrown.command).toBe('git status');
          expect(thrown.stderr).toBe('fatal: not a git repository');
          expect(thrown.exitCode).toBe(128);
        }
      }
    });
  });

  describe('getCurrentBranch', () => {
    function failWith(stderr: string, status: number): never {
      throw Object.assign(new Error('Command failed'), { stderr: Buffer.from(stderr), status });
    }

    it('returns the branch name from symbolic-ref', () => {
      mockExecSync.mockReturnValue('2325-test-branch\n');
      expect(git.getCurrentBranch()).toBe('2325-test-branch');
      expect(mockExecSync).toHaveBeenCalledTimes(1);
      expect(mockExecSync).toHaveBeenCalledWith(
        'git symbolic-ref --quiet --short HEAD',
        expect.any(Object)
      );
    });

    it('returns the branch name before the first commit', () => {
      // symbolic-ref resolves an unborn branch; rev-parse would fail here
      mockExecSync.mockImplementation((command) =>
        command === 'git symbolic-ref --quiet --short HEAD'
          ? 'main\n'
          : failWith("fatal: ambiguous argument 'HEAD': unknown revision", 128)
      );
      expect(git.getCurrentBranch('/repo')).toBe('main');
      expect(mockExecSync).toHaveBeenCalledWith(
        'git symbolic-ref --quiet --short HEAD',
        expect.objectContaining({ cwd: '/repo' })
      );
    });

    it('returns null for detached HEAD', () => {
      mockExecSync.mockImplementation((command) =>
        command === 'git rev-parse --abbrev-ref HEAD' ? 'HEAD\n' : failWith('', 1)
      );
      expect(git.getCurrentBranch()).toBeNull();
    });

    it('throws GitCommandError outside a repository', () => {
      mockExecSync.mockImplementation(() => failWith('fatal: not a git repository', 128));
      expect(() => git.getCurrentBranch()).toThrow(GitCommandError);
      expect(() => git.getCurrentBranch()).toThrow('Git command failed: git rev-parse --abbrev-ref HEAD');
    });
  });

  describe('resolveBranchName', () => {
    it('prefers an explicit branch name without calling git', () => {
      expect(git.resolveBranchName('2325-test-branch')).toBe('2325-test-branch');
      expect(mockExecSync).not.toHaveBeenCalled();
    });

    it('asks git when no override is given', () => {
      mockExecSync.mockReturnValue('main\n');
      expect(git.resolveBranchName()).toBe('main');
      expect(git.resolveBranchName('')).toBe('main');
    });

    it('reports a detached HEAD as HEAD', () => {
      mockExecSync.mockImplementation((command) => {
        if (command === 'git rev-parse --abbrev-ref HEAD') {
          return 'HEAD\n';
        }
        throw Object.assign(new Error('Command failed'), { status: 1 });
      });
      expect(git.resolveBranchName()).toBe('HEAD');
    });
  });
});
