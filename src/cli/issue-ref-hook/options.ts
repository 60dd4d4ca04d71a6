/**
 * Shared options and execution for the hook commands
 */

import type { Argv } from 'yargs';
import { ExitCode } from '../../lib/constants.js';
import { isConfigurationError } from '../../lib/errors.js';
import * as git from '../../lib/git.js';
import { logger } from '../../lib/logger.js';
import { printError, errorToDisplay } from '../../lib/ui/index.js';
import {
  buildConfiguration,
  exitCodeFor,
  rejectionToDisplay,
  runHookPhase,
  type HookOptionsInput,
  type HookPhase,
} from '../../lib/issue-hook/index.js';

export interface HookArgs {
  'exclude-branches'?: string[];
  'multi-issue-commits'?: boolean;
  'auto-prepend'?: boolean;
  'auto-append'?: boolean;
  branch?: string;
}

/**
 * Register the rule options shared by both hook commands
 */
export function withHookOptions<T>(yargs: Argv<T>) {
  return yargs
    .option('exclude-branches', {
      type: 'string',
      array: true,
      nargs: 1,
      description:
        'Regex for branches exempt from the branch name rule; repeat the flag for each pattern (--exclude-branches a --exclude-branches b)',
    })
    .option('multi-issue-commits', {
      type: 'boolean',
      description: 'Allow a commit message to reference more than one issue',
      default: false,
    })
    .option('auto-prepend', {
      type: 'boolean',
      description: "Prepend the branch's issue number to the commit message when missing",
      default: false,
    })
    .option('auto-append', {
      type: 'boolean',
      description: "Append the branch's issue number to the commit message when missing",
      default: false,
    })
    .option('branch', {
      type: 'string',
      description: 'Branch name to check instead of the current git branch',
    });
}

/**
 * Map parsed CLI arguments to configuration input
 */
export function toOptionsInput(argv: HookArgs): HookOptionsInput {
  return {
    excludeBranches: argv['exclude-branches'] ?? [],
    multiIssueCommits: !!argv['multi-issue-commits'],
    autoPrepend: !!argv['auto-prepend'],
    autoAppend: !!argv['auto-append'],
  };
}

/**
 * Build the configuration, run one phase and report the outcome.
 * Returns the process exit code; the command handler exits with it.
 */
export function executeHookPhase(
  argv: HookArgs,
  createPhase: (branchName: string) => HookPhase
): ExitCode {
  try {
    const config = buildConfiguration(toOptionsInput(argv));
    const branchName = git.resolveBranchName(argv.branch);
    const phase = createPhase(branchName);

    logger.debug(`Running ${phase.kind} check on branch "${branchName}"`);
    const result = runHookPhase(phase, config);

    if (result.kind === 'rejected') {
      printError(rejectionToDisplay(result.reason, result.detail));
    } else {
      logger.info(`${phase.kind} check passed`);
    }
    return exitCodeFor(result);
  } catch (error) {
    printError(errorToDisplay(error));
    return isConfigurationError(error) ? ExitCode.CONFIGURATION_ERROR : ExitCode.UNEXPECTED_ERROR;
  }
}
