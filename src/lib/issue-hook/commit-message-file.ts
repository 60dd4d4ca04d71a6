/**
 * issue-hook commit message file - the one file the hook reads and writes
 */

import fs from 'fs';
import { CommitMessageFileError } from '../errors.js';
import type { CommitMessageIO } from './types.js';

/**
 * Read the commit message file git passes to the commit-msg hook
 */
export function readCommitMessage(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CommitMessageFileError(`Cannot read commit message file: ${reason}`, {
      filePath,
      operation: 'read',
    });
  }
}

/**
 * Overwrite the commit message file. writeFileSync flushes and closes before returning.
 */
export function writeCommitMessage(filePath: string, content: string): void {
  try {
    fs.writeFileSync(filePath, content, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CommitMessageFileError(`Cannot write commit message file: ${reason}`, {
      filePath,
      operation: 'write',
    });
  }
}

export const fileCommitMessageIO: CommitMessageIO = {
  read: readCommitMessage,
  write: writeCommitMessage,
};
