export enum HadoopErrorCode {
  CONFIG_INVALID = "CONFIG_INVALID",
  PLACEHOLDER_UNRESOLVED = "PLACEHOLDER_UNRESOLVED",
  COMMAND_FAILED = "COMMAND_FAILED",
  WAIT_TIMEOUT = "WAIT_TIMEOUT",
  SPEC_MISMATCH = "SPEC_MISMATCH",
  HA_STATE = "HA_STATE",
}

export class HadoopError extends Error {
  readonly code: HadoopErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: HadoopErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "HadoopError";
    this.code = code;
    this.context = context;
  }
}

/** Descriptor or plugin configuration problem. Fatal; never retried. */
export class ConfigError extends HadoopError {
  constructor(message: string, context?: Record<string, unknown>, code = HadoopErrorCode.CONFIG_INVALID) {
    super(code, message, context);
    this.name = "ConfigError";
  }
}

/** Non-zero exit from an administrative command, with its captured output. */
export class CommandError extends HadoopError {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;

  constructor(argv: readonly string[], exitCode: number, stdout: string, stderr: string) {
    super(HadoopErrorCode.COMMAND_FAILED, `Command exited with ${exitCode}: ${argv.join(" ")}`, {
      argv: [...argv],
      exitCode,
      stdout,
      stderr,
    });
    this.name = "CommandError";
    this.exitCode = exitCode;
    this.stdout = stdout;
    this.stderr = stderr;
  }

  /** Combined output, the way a shell user would have seen it. */
  get output(): string {
    return [this.stdout, this.stderr].filter((s) => s.length > 0).join("\n");
  }
}

/** A bounded polling wait gave up. Distinct from CommandError: the cluster may still be converging. */
export class WaitTimeoutError extends HadoopError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(HadoopErrorCode.WAIT_TIMEOUT, message, context);
    this.name = "WaitTimeoutError";
  }
}

/** A remote unit advertised data that contradicts the local spec. Requires operator intervention. */
export class SpecMismatchError extends HadoopError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(HadoopErrorCode.SPEC_MISMATCH, message, context);
    this.name = "SpecMismatchError";
  }
}

export class HaStateError extends HadoopError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(HadoopErrorCode.HA_STATE, message, context);
    this.name = "HaStateError";
  }
}
