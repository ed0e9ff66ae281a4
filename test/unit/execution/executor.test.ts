import { execOrThrow, withTimeoutCeiling } from '../../../src/execution/executor.js';
import type { Executor } from '../../../src/execution/executor.js';
import { CommandError } from '../../../src/errors.js';
import { FakeExecutor } from '../../helpers/fake-executor.js';

describe('executor helpers', () => {
  it('returns the result of a successful command', async () => {
    const executor = new FakeExecutor().on('uname', { stdout: 'x86_64\n' });
    expect((await execOrThrow(executor, { argv: ['uname', '-p'] }, 1000)).stdout).toBe('x86_64\n');
  });

  it('throws CommandError on a non-zero exit', async () => {
    const executor = new FakeExecutor().on('id', { exitCode: 1, stderr: 'no such user' });
    await expect(execOrThrow(executor, { argv: ['id', '-u', 'hdfs'] }, 1000)).rejects.toThrow(
      new CommandError(['id', '-u', 'hdfs'], 1, '', 'no such user'),
    );
  });

  describe('withTimeoutCeiling', () => {
    function recording(): { executor: Executor; timeouts: number[] } {
      const timeouts: number[] = [];
      return {
        timeouts,
        executor: {
          execute: async (_command, timeoutMs) => {
            timeouts.push(timeoutMs);
            return { stdout: '', stderr: '', exitCode: 0, durationMs: 0 };
          },
        },
      };
    }

    it('caps long timeouts and keeps short ones', async () => {
      const { executor, timeouts } = recording();
      const capped = withTimeoutCeiling(executor, 30_000);
      await capped.execute({ argv: ['true'] }, 600_000);
      await capped.execute({ argv: ['true'] }, 5_000);
      expect(timeouts).toEqual([30_000, 5_000]);
    });

    it('returns the executor unchanged without a ceiling', () => {
      const { executor } = recording();
      expect(withTimeoutCeiling(executor, 0)).toBe(executor);
    });
  });
});
