/**
 * issue-hook auto-insert - add the branch issue number to a commit message
 */

import { GIT_COMMENT_LINE_PATTERN } from '../constants.js';
import { extractIssueNumbers, formatIssueReference } from './extract.js';
import type { AutoInsertMode, HookConfiguration } from './types.js';

/**
 * Which auto-insert mode the configuration enables, if any
 */
export function getAutoInsertMode(config: HookConfiguration): AutoInsertMode | null {
  if (config.autoPrepend) return 'prepend';
  if (config.autoAppend) return 'append';
  return null;
}

/**
 * Insert an issue reference into a commit message.
 *
 * - prepend: "#2325 " goes in front of the message
 * - append: " #2325" goes at the end of the last content line, i.e. the last line
 *   that is neither blank nor a git comment ("# Please enter..."). Anything after it
 *   (trailing newline, comment block) is left as is. A message without content gets
 *   "#2325" as its first line.
 *
 * Returns the message unchanged when it already references the issue, so running
 * the hook twice never inserts twice.
 */
export function insertIssueNumber(
  message: string,
  issueNumber: bigint,
  mode: AutoInsertMode
): string {
  if (extractIssueNumbers(message).includes(issueNumber)) {
    return message;
  }

  const reference = formatIssueReference(issueNumber);

  if (mode === 'prepend') {
    return `${reference} ${message}`;
  }

  const lines = message.split('\n');
  const lastContentIndex = findLastContentLine(lines);

  if (lastContentIndex === -1) {
    return `${reference}\n${message}`;
  }

  const line = lines[lastContentIndex];
  const carriageReturn = line.endsWith('\r') ? '\r' : '';
  const body = line.slice(0, line.length - carriageReturn.length).replace(/[ \t]+$/, '');
  lines[lastContentIndex] = `${body} ${reference}${carriageReturn}`;
  return lines.join('\n');
}

function findLastContentLine(lines: readonly string[]): number {
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i];
    if (line.trim() !== '' && !GIT_COMMENT_LINE_PATTERN.test(line)) {
      return i;
    }
  }
  return -1;
}

/**
 * Decide whether auto-insert should rewrite the message, and to what.
 *
 * Only a message that is missing the branch issue number is touched, and only
 * when adding it cannot break the one-issue-per-commit rule: either the message
 * references nothing yet, or multi-issue commits are allowed. Excluded branches
 * and branches without a leading number never get an insertion.
 */
export function planAutoInsert(input: {
  message: string;
  referenced: readonly bigint[];
  branchIssueNumber: bigint | null;
  excluded: boolean;
  config: HookConfiguration;
}): string | null {
  const { message, referenced, branchIssueNumber, excluded, config } = input;
  const mode = getAutoInsertMode(config);

  if (mode === null || excluded || branchIssueNumber === null) {
    return null;
  }
  if (referenced.includes(branchIssueNumber)) {
    return null;
  }
  if (referenced.length > 0 && !config.allowMultiIssue) {
    return null;
  }

  return insertIssueNumber(message, branchIssueNumber, mode);
}
