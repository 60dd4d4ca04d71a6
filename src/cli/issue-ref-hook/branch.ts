/**
 * issue-ref-hook branch - check the branch name (pre-commit stage)
 */

import type { CommandModule } from 'yargs';
import { executeHookPhase, withHookOptions, type HookArgs } from './options.js';

export const branchCommand: CommandModule<object, HookArgs> = {
  command: ['branch', 'b'],
  describe: 'Check that the branch name starts with an issue number',
  builder: (yargs) => {
    return withHookOptions(yargs)
      .example('$0 branch', 'Check the current branch')
      .example('$0 branch --exclude-branches "^main$"', 'Allow committing to main')
      .example('$0 branch --branch 2325-fix-login', 'Check a given branch name');
  },
  handler: (argv) => {
    const code = executeHookPhase(argv, (branchName) => ({ kind: 'branch', branchName }));
    process.exit(code);
  },
};
