import { pollUntil, waitForConnect, waitForProcess } from '../../../src/hadoop/wait.js';
import { WaitTimeoutError } from '../../../src/errors.js';
import { FakeExecutor } from '../../helpers/fake-executor.js';

const FAST = { timeoutMs: 200, intervalMs: 5 };

describe('waits', () => {
  it('returns as soon as the probe reports done', async () => {
    let calls = 0;
    await pollUntil('thing', async () => ({ done: ++calls === 3 }), FAST);
    expect(calls).toBe(3);
  });

  it('gives up after the timeout with the last output', async () => {
    const wait = pollUntil('thing', async () => ({ done: false, output: 'still starting' }), { timeoutMs: 50, intervalMs: 10 });
    await expect(wait).rejects.toBeInstanceOf(WaitTimeoutError);
    await expect(wait).rejects.toThrow('Timed-out waiting for thing:\nstill starting');
  });

  it('gives up no later than one interval past the timeout', async () => {
    const timeoutMs = 100;
    const intervalMs = 20;
    const started = Date.now();
    await expect(pollUntil('thing', async () => ({ done: false }), { timeoutMs, intervalMs }))
      .rejects.toBeInstanceOf(WaitTimeoutError);
    const elapsed = Date.now() - started;
    expect(elapsed).toBeGreaterThanOrEqual(timeoutMs);
    // 40ms of slack for timer scheduling
    expect(elapsed).toBeLessThan(timeoutMs + intervalMs + 40);
  });

  it('omits the output when none was seen', async () => {
    await expect(pollUntil('thing', async () => ({ done: false }), { timeoutMs: 20, intervalMs: 5 }))
      .rejects.toThrow(/^Timed-out waiting for thing$/);
  });

  it('waits for a connection through the given check', async () => {
    const check = jest.fn().mockResolvedValueOnce(false).mockResolvedValueOnce(true);
    await waitForConnect('nn1', 8020, FAST, check);
    expect(check).toHaveBeenCalledTimes(2);
    expect(check).toHaveBeenCalledWith('nn1', 8020);
  });

  it('names the endpoint when a connection never succeeds', async () => {
    await expect(waitForConnect('nn1', 8020, { timeoutMs: 20, intervalMs: 5 }, async () => false))
      .rejects.toThrow('Timed-out waiting for connection to nn1 on port 8020');
  });

  it('waits for a Java process to appear', async () => {
    let polls = 0;
    const executor = new FakeExecutor().on('pgrep', () => (++polls < 2 ? { exitCode: 1 } : { stdout: '99\n' }));
    await waitForProcess(executor, 'DataNode', FAST);
    expect(polls).toBe(2);
  });
});
