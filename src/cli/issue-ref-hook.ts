#!/usr/bin/env node
/**
 * issue-ref-hook - link branches and commit messages to issue numbers
 *
 * Commands:
 *   issue-ref-hook branch              Check the branch name (pre-commit stage)
 *   issue-ref-hook commit-msg <file>   Check the commit message (commit-msg stage)
 *
 * Short Aliases:
 *   issue-ref-hook b   -> issue-ref-hook branch
 *   issue-ref-hook m   -> issue-ref-hook commit-msg
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { branchCommand } from './issue-ref-hook/branch.js';
import { commitMsgCommand } from './issue-ref-hook/commit-msg.js';
import { ExitCode } from '../lib/constants.js';
import { initializeLogger } from '../lib/logger.js';

// Initialize logger early (before yargs) so option handling can log
function initializeLoggerFromCliFlags(): void {
  const args = process.argv.slice(2);

  initializeLogger({
    verbose: args.includes('-v') || args.includes('--verbose'),
    quiet: args.includes('-q') || args.includes('--quiet'),
    noColor: args.includes('--no-color'),
  });
}

initializeLoggerFromCliFlags();

yargs(hideBin(process.argv))
  .scriptName('issue-ref-hook')
  .usage('$0 <command> [options]')
  .option('verbose', {
    alias: 'v',
    type: 'boolean',
    description: 'Show debug output',
    global: true,
  })
  .option('quiet', {
    alias: 'q',
    type: 'boolean',
    description: 'Only print errors',
    global: true,
  })
  .option('color', {
    type: 'boolean',
    description: 'Colorize output (use --no-color to disable)',
    default: true,
    global: true,
  })
  .command(branchCommand)
  .command(commitMsgCommand)
  .demandCommand(1, 'Specify a command: branch or commit-msg')
  .alias('h', 'help')
  .help()
  .version()
  .wrap(Math.min(100, process.stdout.columns ?? 100))
  .example('$0 branch --exclude-branches "^main$"', 'Check the branch, allowing main')
  .example('$0 commit-msg .git/COMMIT_EDITMSG', 'Check a commit message')
  .example(
    '$0 commit-msg "$1" --multi-issue-commits --auto-append',
    'Allow several issues and append the branch issue when missing'
  )
  .strict()
  .fail((msg, err) => {
    if (err) {
      console.error(err.message);
    } else {
      console.error(msg);
    }
    process.exit(ExitCode.UNEXPECTED_ERROR);
  })
  .parseAsync()
  .catch((err) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(ExitCode.UNEXPECTED_ERROR);
  });
