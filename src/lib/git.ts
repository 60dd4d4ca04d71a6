import { execSync, ExecSyncOptions } from 'child_process';
import { DETACHED_HEAD } from './constants.js';
import { GitCommandError } from './errors.js';

/**
 * Shell-escape a string for use in a command
 */
function shellEscape(str: string): string {
  // If string contains spaces or special chars, wrap in quotes and escape internal quotes
  if (/[\s"'\\]/.test(str)) {
    return `"${str.replace(/["\\]/g, '\\$&')}"`;
  }
  return str;
}

/**
 * Execute a git command and return output
 */
export function exec(args: string[], options: { cwd?: string } = {}): string {
  const cmd = `git ${args.map(shellEscape).join(' ')}`;
  const execOptions: ExecSyncOptions = {
    encoding: 'utf8',
    cwd: options.cwd,
    stdio: ['pipe', 'pipe', 'pipe'],
  };

  try {
    const result = execSync(cmd, execOptions);
    return result.toString().trimEnd();
  } catch (error) {
    if (!(error instanceof Error)) {
      throw error;
    }
    const stderr = 'stderr' in error && error.stderr ? String(error.stderr).trim() : undefined;
    const exitCode =
      'status' in error && typeof error.status === 'number' ? error.status : undefined;
    throw new GitCommandError(`Git command failed: ${cmd}`, { command: cmd, exitCode, stderr });
  }
}

/**
 * Get the current branch name, or null if detached HEAD.
 * Works on an unborn branch (a repository without commits yet).
 */
export function getCurrentBranch(cwd?: string): string | null {
  try {
    return exec(['symbolic-ref', '--quiet', '--short', 'HEAD'], { cwd });
  } catch (error) {
    if (!(error instanceof GitCommandError)) {
      throw error;
    }
    // HEAD is not a symbolic ref when detached; rev-parse still fails outside a repository
    const result = exec(['rev-parse', '--abbrev-ref', 'HEAD'], { cwd });
    return result === DETACHED_HEAD ? null : result;
  }
}

/**
 * Branch name as the hook sees it: an explicit override wins, a detached HEAD
 * is reported as "HEAD" so it fails the format rule unless excluded.
 */
export function resolveBranchName(override?: string, cwd?: string): string {
  if (override !== undefined && override !== '') {
    return override;
  }
  return getCurrentBranch(cwd) ?? DETACHED_HEAD;
}
