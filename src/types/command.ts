/**
 * One process invocation, run with execFile and never through a shell.
 * Commands that must run as the hdfs or yarn user go through `runAs`, which
 * does the one deliberate `su -c` quoting. `env` is merged over the
 * executor's environment. `stdin` answers interactive prompts.
 */
export interface Command {
  readonly argv: string[];
  readonly env?: Record<string, string>;
  readonly stdin?: string;
}
