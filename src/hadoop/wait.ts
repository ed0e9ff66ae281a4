// Bounded polling waits. Each loop probes, sleeps a fixed interval and gives up with
// WaitTimeoutError once the deadline passes, so a wait never outlives timeout + one interval
// (plus the duration of the last probe). None of them can be cancelled early.
import { createConnection } from "node:net";
import { setTimeout as sleep } from "node:timers/promises";
import type { Executor } from "../execution/executor.js";
import { WaitTimeoutError } from "../errors.js";
import { jps } from "./process.js";
import { logger } from "../logger.js";

export interface PollOptions {
  timeoutMs: number;
  intervalMs: number;
}

export interface ProbeResult {
  done: boolean;
  /** Latest observed output, reported if the wait times out. */
  output?: string;
}

export async function pollUntil(description: string, probe: () => Promise<ProbeResult>, options: PollOptions): Promise<void> {
  const start = Date.now();
  let lastOutput: string | undefined;
  while (Date.now() - start < options.timeoutMs) {
    const result = await probe();
    if (result.done) return;
    if (result.output !== undefined) lastOutput = result.output;
    await sleep(options.intervalMs);
  }
  logger.warn({ description, timeoutMs: options.timeoutMs }, "Wait timed out");
  throw new WaitTimeoutError(
    `Timed-out waiting for ${description}${lastOutput ? `:\n${lastOutput}` : ""}`,
    { timeoutMs: options.timeoutMs, lastOutput },
  );
}

/** One TCP connection attempt; true when the endpoint accepted it. */
export function checkConnect(host: string, port: number, timeoutMs = 10_000): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = createConnection({ host, port });
    const finish = (ok: boolean): void => {
      socket.destroy();
      resolve(ok);
    };
    socket.setTimeout(timeoutMs, () => finish(false));
    socket.once("connect", () => finish(true));
    socket.once("error", () => finish(false));
  });
}

export type ConnectCheck = (host: string, port: number) => Promise<boolean>;

export async function waitForConnect(host: string, port: number, options: PollOptions, check: ConnectCheck = checkConnect): Promise<void> {
  await pollUntil(
    `connection to ${host} on port ${port}`,
    async () => ({ done: await check(host, port) }),
    options,
  );
}

/** Wait until jps shows the named Java process. */
export async function waitForProcess(executor: Executor, processName: string, options: PollOptions): Promise<void> {
  logger.debug({ processName }, "Waiting for process");
  await pollUntil(
    `process ${processName}`,
    async () => ({ done: (await jps(executor, processName)).length > 0 }),
    options,
  );
}
