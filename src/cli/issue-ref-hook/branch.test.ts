import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('./options.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('./options.js')>()),
  executeHookPhase: vi.fn().mockReturnValue(0),
}));

import { branchCommand } from './branch.js';
import { executeHookPhase } from './options.js';

const mockExecuteHookPhase = vi.mocked(executeHookPhase);
const mockExit = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);

describe('branchCommand', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('registers the branch command with its alias', () => {
    expect(branchCommand.command).toEqual(['branch', 'b']);
  });

  it('runs the branch phase on the resolved branch name', async () => {
    const argv = { branch: '2325-test-branch', _: [], $0: 'issue-ref-hook' };
    await branchCommand.handler(argv);

    expect(mockExecuteHookPhase).toHaveBeenCalledWith(argv, expect.any(Function));
    const createPhase = mockExecuteHookPhase.mock.calls[0][1];
    expect(createPhase('2325-test-branch')).toEqual({
      kind: 'branch',
      branchName: '2325-test-branch',
    });
  });

  it('exits with the phase exit code', async () => {
    mockExecuteHookPhase.mockReturnValueOnce(1);
    await branchCommand.handler({ _: [], $0: 'issue-ref-hook' });
    expect(mockExit).toHaveBeenCalledWith(1);
  });
});
