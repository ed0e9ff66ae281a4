// Command execution layer. Every command issued against the host passes through this module.
// LocalExecutor.execute() is the boundary between service code and the OS; tests swap in a
// recording Executor so nothing is spawned.
import { execFile } from "node:child_process";
import type { Command } from "../types/command.js";
import { CommandError } from "../errors.js";
import { logger } from "../logger.js";

/** Result of command execution. */
export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly durationMs: number;
}

export interface Executor {
  execute(command: Command, timeoutMs: number): Promise<ExecResult>;
}

/** Local executor using child_process. Never rejects: failures are reported through exitCode. */
export class LocalExecutor implements Executor {
  async execute(command: Command, timeoutMs: number): Promise<ExecResult> {
    const start = performance.now();
    const [cmd, ...args] = command.argv;
    logger.debug({ argv: command.argv }, "Executing command");

    return new Promise<ExecResult>((resolve) => {
      const child = execFile(
        cmd,
        args,
        {
          timeout: timeoutMs,
          // 10MB ceiling: dfsadmin -report on a large cluster stays well below this.
          maxBuffer: 10 * 1024 * 1024,
          env: command.env ? { ...process.env, ...command.env } : process.env,
        },
        (error, stdout, stderr) => {
          const durationMs = Math.round(performance.now() - start);
          let exitCode = 0;
          if (error) exitCode = typeof error.code === "number" ? error.code : 1;
          resolve({ stdout: stdout ?? "", stderr: stderr ?? "", exitCode, durationMs });
        },
      );

      if (command.stdin && child.stdin) {
        child.stdin.write(command.stdin);
        child.stdin.end();
      }
    });
  }
}

/** Caps every command's timeout at `ceilingMs`. A ceiling of 0 leaves timeouts unchanged. */
export function withTimeoutCeiling(executor: Executor, ceilingMs: number): Executor {
  if (ceilingMs <= 0) return executor;
  return {
    execute: (command, timeoutMs) => executor.execute(command, Math.min(timeoutMs, ceilingMs)),
  };
}

/** Execute and raise CommandError on a non-zero exit, with the captured output attached. */
export async function execOrThrow(executor: Executor, command: Command, timeoutMs: number): Promise<ExecResult> {
  const result = await executor.execute(command, timeoutMs);
  if (result.exitCode !== 0) {
    throw new CommandError(command.argv, result.exitCode, result.stdout, result.stderr);
  }
  return result;
}
