/**
 * issue-ref-hook commit-msg - check the commit message (commit-msg stage)
 *
 * Git passes the path of the message file; with --auto-prepend or --auto-append
 * the file may be rewritten once.
 */

import type { CommandModule } from 'yargs';
import { executeHookPhase, withHookOptions, type HookArgs } from './options.js';

interface CommitMsgArgs extends HookArgs {
  file?: string;
}

export const commitMsgCommand: CommandModule<object, CommitMsgArgs> = {
  command: ['commit-msg <file>', 'm'],
  describe: "Check that the commit message references the branch's issue number",
  builder: (yargs) => {
    return withHookOptions(yargs)
      .positional('file', {
        describe: 'Path to the file containing the commit message',
        type: 'string',
      })
      .example('$0 commit-msg .git/COMMIT_EDITMSG', 'Check a commit message')
      .example('$0 commit-msg "$1" --auto-prepend', 'Insert the issue number when missing')
      .example('$0 commit-msg "$1" --multi-issue-commits', 'Allow "#2325 closes #99"');
  },
  handler: (argv) => {
    const messageFile = argv.file ?? '';
    const code = executeHookPhase(argv, (branchName) => ({
      kind: 'commit-msg',
      branchName,
      messageFile,
    }));
    process.exit(code);
  },
};
