import type { Executor, ExecResult } from "../execution/executor.js";
import { execOrThrow } from "../execution/executor.js";
import { readEtcEnv } from "../edit/environment-file.js";
import { DURATION_TIMEOUTS } from "../types/risk.js";

/** Single-quote an argument for `su -c`. */
export function shellQuote(arg: string): string {
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

export interface RunAsOptions {
  /** Environment file merged under `env`; commands see the same environment a login shell would. */
  environmentFile: string;
  env?: Record<string, string>;
  stdin?: string;
  timeoutMs?: number;
}

/**
 * Run a command as another user through `su`. Throws CommandError on a
 * non-zero exit, with stdout and stderr attached.
 */
export async function runAs(executor: Executor, user: string, argv: readonly string[], options: RunAsOptions): Promise<ExecResult> {
  const env = { ...(await readEtcEnv(options.environmentFile)), ...options.env };
  const quoted = argv.map(shellQuote).join(" ");
  return execOrThrow(
    executor,
    { argv: ["su", user, "-c", quoted], env, stdin: options.stdin },
    options.timeoutMs ?? DURATION_TIMEOUTS.normal,
  );
}

/** pgrep pattern matching a Java main class, without matching the pgrep itself. */
export function jpsPattern(name: string): string {
  return name.replace(/^(.)/, "^[^ ]*java .*[$1]");
}

/** PIDs of running Java processes whose command line names `name`, for any user. */
export async function jps(executor: Executor, name: string): Promise<string[]> {
  const result = await executor.execute({ argv: ["sudo", "pgrep", "-f", jpsPattern(name)] }, DURATION_TIMEOUTS.instant);
  if (result.exitCode !== 0) return [];
  return result.stdout.split("\n").map((l) => l.trim()).filter(Boolean);
}
