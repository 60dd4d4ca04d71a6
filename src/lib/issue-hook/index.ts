/**
 * issue-hook library - public API exports
 */

// Types
export type {
  ErrorKind,
  ValidationResult,
  AutoInsertMode,
  HookConfiguration,
  HookOptionsInput,
  HookPhase,
  CrossValidationInput,
  CommitMessageCheck,
  CommitMessageIO,
} from './types.js';

// Extraction
export {
  extractIssueNumbers,
  extractBranchIssueNumber,
  formatIssueReference,
  formatIssueList,
} from './extract.js';

// Rules
export { isBranchExcluded } from './exclusion.js';
export { checkBranchFormat, crossValidate } from './rules.js';
export { insertIssueNumber, planAutoInsert, getAutoInsertMode } from './auto-insert.js';

// Configuration
export { buildConfiguration, getDefaultConfiguration, compileExcludePattern } from './config.js';

// Orchestration
export {
  validateBranch,
  validateCommitMessage,
  runHookPhase,
  exitCodeFor,
  exitCodeForReason,
} from './validator.js';
export { readCommitMessage, writeCommitMessage, fileCommitMessageIO } from './commit-message-file.js';
export { rejectionToDisplay } from './format.js';
