/**
 * issue-hook validator - phase orchestration
 *
 * branch phase:     exclusion -> branch format
 * commit-msg phase: exclusion -> cross-validation (with auto-insert plan) -> write back
 */

import { ExitCode } from '../constants.js';
import { logger } from '../logger.js';
import { planAutoInsert, getAutoInsertMode } from './auto-insert.js';
import { fileCommitMessageIO } from './commit-message-file.js';
import { isBranchExcluded } from './exclusion.js';
import { extractBranchIssueNumber, extractIssueNumbers } from './extract.js';
import { accepted, checkBranchFormat, crossValidate } from './rules.js';
import type {
  CommitMessageCheck,
  CommitMessageIO,
  ErrorKind,
  HookConfiguration,
  HookPhase,
  ValidationResult,
} from './types.js';

/**
 * Check the branch name (pre-commit stage)
 */
export function validateBranch(branchName: string, config: HookConfiguration): ValidationResult {
  if (isBranchExcluded(branchName, config.excludePatterns)) {
    logger.debug(`Branch "${branchName}" is excluded from branch name checks`);
    return accepted();
  }
  return checkBranchFormat(branchName);
}

/**
 * Check a commit message against the branch (commit-msg stage).
 * Pure: returns the rewritten message instead of writing it.
 */
export function validateCommitMessage(
  branchName: string,
  message: string,
  config: HookConfiguration
): CommitMessageCheck {
  const excluded = isBranchExcluded(branchName, config.excludePatterns);
  const branchIssueNumber = excluded ? null : extractBranchIssueNumber(branchName);
  const autoInsertMode = getAutoInsertMode(config);

  logger.debug(
    `Branch "${branchName}": excluded=${excluded}, issue=${branchIssueNumber ?? 'none'}`
  );

  if (autoInsertMode !== null && !excluded && branchIssueNumber === null) {
    return {
      result: {
        kind: 'rejected',
        reason: 'InvalidBranchFormat',
        detail:
          `Auto-${autoInsertMode}ing the issue number to the commit message is enabled, ` +
          `but branch "${branchName}" does not begin with an issue number.`,
      },
      rewrittenMessage: null,
    };
  }

  const referenced = extractIssueNumbers(message);
  const planned = planAutoInsert({ message, referenced, branchIssueNumber, excluded, config });
  const candidate = planned ?? message;
  const candidateReferences = planned === null ? referenced : extractIssueNumbers(candidate);

  logger.debug(`Commit message references: [${candidateReferences.join(', ')}]`);

  const result = crossValidate({
    referenced: candidateReferences,
    branchIssueNumber,
    excluded,
    allowMultiIssue: config.allowMultiIssue,
  });

  const rewrittenMessage =
    result.kind === 'accepted' && planned !== null && planned !== message ? planned : null;

  return { result, rewrittenMessage };
}

/**
 * Run one hook phase, reading and (at most once) rewriting the commit message file
 */
export function runHookPhase(
  phase: HookPhase,
  config: HookConfiguration,
  io: CommitMessageIO = fileCommitMessageIO
): ValidationResult {
  switch (phase.kind) {
    case 'branch':
      return validateBranch(phase.branchName, config);

    case 'commit-msg': {
      const message = io.read(phase.messageFile);
      const { result, rewrittenMessage } = validateCommitMessage(
        phase.branchName,
        message,
        config
      );
      if (rewrittenMessage !== null) {
        io.write(phase.messageFile, rewrittenMessage);
        logger.info(`Added issue number to commit message in ${phase.messageFile}`);
      }
      return result;
    }
  }
}

/**
 * Process exit code for a rejection reason
 */
export function exitCodeForReason(reason: ErrorKind): ExitCode {
  switch (reason) {
    case 'InvalidBranchFormat':
      return ExitCode.BRANCH_NAME_ERROR;
    case 'MissingIssueNumber':
    case 'MultipleIssueNumbersNotAllowed':
    case 'IssueNumberMismatch':
      return ExitCode.COMMIT_MESSAGE_ERROR;
    case 'ConfigurationError':
      return ExitCode.CONFIGURATION_ERROR;
  }
}

/**
 * Process exit code for a validation result
 */
export function exitCodeFor(result: ValidationResult): ExitCode {
  return result.kind === 'accepted' ? ExitCode.SUCCESS : exitCodeForReason(result.reason);
}
