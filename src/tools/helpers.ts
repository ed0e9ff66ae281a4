import { z } from "zod";
import type { PluginContext } from "./context.js";
import type { SuccessResponse, ErrorResponse, BlockedResponse, ErrorCategory, ToolResponse } from "../types/response.js";
import type { ToolMetadata, ExecutionContext } from "../types/tool.js";
import { CommandError, HadoopError, HadoopErrorCode } from "../errors.js";
import { logger } from "../logger.js";

// ── Response Builders ──────────────────────────────────────────────

export function success(tool: string, targetHost: string, durationMs: number | null, commandExecuted: string | null, data: Record<string, unknown>, extra?: Partial<SuccessResponse>): SuccessResponse {
  return { status: "success", tool, target_host: targetHost, duration_ms: durationMs, command_executed: commandExecuted, data, ...extra };
}

export function error(tool: string, targetHost: string, durationMs: number | null, opts: { code: string; category: ErrorCategory; message: string; transient?: boolean; remediation?: string[] }): ErrorResponse {
  return {
    status: "error", tool, target_host: targetHost, duration_ms: durationMs, command_executed: null,
    error_code: opts.code, error_category: opts.category, message: opts.message,
    transient: opts.transient ?? false,
    remediation: opts.remediation ?? [],
  };
}

/** The operation cannot run yet: peer data missing, or another process holds a lock. */
export function blocked(tool: string, targetHost: string, durationMs: number | null, opts: { code: string; category?: "lock" | "state"; message: string; remediation?: string[] }): BlockedResponse {
  return {
    status: "blocked", tool, target_host: targetHost, duration_ms: durationMs, command_executed: null,
    error_code: opts.code, error_category: opts.category ?? "lock", message: opts.message,
    remediation: opts.remediation ?? [],
  };
}

/**
 * Categorize a failed command's output and return the correct response type.
 * Lock contention is reported as blocked, everything else as an error.
 */
export function buildCategorizedResponse(tool: string, targetHost: string, durationMs: number | null, output: string): ErrorResponse | BlockedResponse {
  const cat = categorizeError(output);
  if (cat.code === "RESOURCE_LOCKED") {
    return blocked(tool, targetHost, durationMs, {
      code: cat.code,
      message: output.trim() || "Resource is locked by another process",
      remediation: cat.remediation,
    });
  }
  return error(tool, targetHost, durationMs, { ...cat, message: output.trim() });
}

// ── Error Categorization ───────────────────────────────────────────

interface ErrorPattern {
  test: (output: string) => boolean;
  code: string;
  category: ErrorCategory;
  transient: boolean;
  remediation: string[];
}

// Patterns are matched against lowercased output.
const ERROR_PATTERNS: ErrorPattern[] = [
  { test: (s) => s.includes("permission denied") || s.includes("sudo:") || s.includes("operation not permitted"),
    code: "PERMISSION_DENIED", category: "privilege", transient: false,
    remediation: ["Verify passwordless sudo is configured for this user", "Check that the hdfs, yarn and mapred users exist (dist_materialize)"] },
  { test: (s) => s.includes("connection refused") || (s.includes("call from") && s.includes("failed on connection")),
    code: "NAMENODE_UNREACHABLE", category: "network", transient: true,
    remediation: ["Check that the NameNode is running (hadoop_daemon action=start daemon=namenode)", "Retry once the daemon has finished starting"] },
  { test: (s) => s.includes("safemodeexception") || s.includes("name node is in safe mode"),
    code: "SAFE_MODE", category: "state", transient: true,
    remediation: ["Wait for HDFS to leave safe mode (hdfs_wait_ready)"] },
  { test: (s) => s.includes("no space left on device") || s.includes("cannot allocate memory"),
    code: "RESOURCE_EXHAUSTED", category: "resource", transient: false,
    remediation: ["Free disk space on the name and data directories"] },
  { test: (s) => s.includes("could not get lock") || s.includes("dpkg frontend lock") || s.includes("rpm.lock"),
    code: "RESOURCE_LOCKED", category: "lock", transient: false,
    remediation: ["Another package manager process may be running", "Wait for it to complete, then retry"] },
  { test: (s) => s.includes("could not resolve") || s.includes("unknownhostexception") || s.includes("network is unreachable"),
    code: "NETWORK_ERROR", category: "network", transient: true,
    remediation: ["Check the managed entries in the hosts file", "Verify DNS resolution of the cluster hostnames"] },
];

export function categorizeError(output: string): { code: string; category: ErrorCategory; transient: boolean; remediation: string[] } {
  const lower = output.toLowerCase();
  for (const p of ERROR_PATTERNS) {
    if (p.test(lower)) {
      return { code: p.code, category: p.category, transient: p.transient, remediation: p.remediation };
    }
  }
  return { code: "COMMAND_FAILED", category: "state", transient: false, remediation: [
    "Review the command output above for the specific error",
    "Run cluster_session_info to check the node's recorded state",
  ] };
}

/** Map a HadoopError to the response a tool returns for it. */
export function errorFromException(tool: string, targetHost: string, durationMs: number | null, err: HadoopError): ErrorResponse | BlockedResponse {
  if (err instanceof CommandError) return buildCategorizedResponse(tool, targetHost, durationMs, err.output || err.message);
  switch (err.code) {
    case HadoopErrorCode.WAIT_TIMEOUT:
      return error(tool, targetHost, durationMs, {
        code: err.code, category: "timeout", message: err.message, transient: true,
        remediation: ["The cluster may still be converging; retry later", "Increase the matching timeouts.* value in config.yaml"],
      });
    case HadoopErrorCode.SPEC_MISMATCH:
      return error(tool, targetHost, durationMs, {
        code: err.code, category: "validation", message: err.message,
        remediation: ["Align vendor, Hadoop and Java versions and CPU architecture across the related nodes"],
      });
    case HadoopErrorCode.HA_STATE:
      return error(tool, targetHost, durationMs, {
        code: err.code, category: "state", message: err.message,
        remediation: ["Run cluster_session_info to see the recorded HA state"],
      });
    default:
      return error(tool, targetHost, durationMs, {
        code: err.code, category: "validation", message: err.message,
        remediation: ["Check config.yaml and the distribution descriptor"],
      });
  }
}

/** Input fields shared by every gated tool. */
export const GATE_PARAMS = {
  confirmed: z.boolean().optional().default(false).describe("Pass true to confirm execution after reviewing a confirmation_required response."),
  dry_run: z.boolean().optional().default(false).describe("Preview without executing: returns what would run without making changes."),
};

// ── Tool Registration Helper ───────────────────────────────────────

/**
 * Register a tool on the context's registry. Arguments are validated against
 * the input schema; HadoopErrors thrown by the handler become error responses.
 */
export function registerTool<T extends z.ZodRawShape>(
  ctx: PluginContext,
  metadata: ToolMetadata<z.ZodObject<T>>,
  handler: (args: z.output<z.ZodObject<T>>, execCtx: ExecutionContext) => Promise<ToolResponse>,
): void {
  ctx.registry.register({
    metadata,
    execute: async (raw, execCtx) => {
      const parsed = metadata.inputSchema.safeParse(raw);
      if (!parsed.success) {
        return error(metadata.name, execCtx.targetHost, null, {
          code: "INVALID_ARGUMENTS", category: "validation",
          message: parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; "),
        });
      }
      const start = performance.now();
      try {
        return await handler(parsed.data, execCtx);
      } catch (err) {
        if (!(err instanceof HadoopError)) throw err;
        logger.warn({ tool: metadata.name, code: err.code, error: err.message }, "Tool failed");
        return errorFromException(metadata.name, execCtx.targetHost, Math.round(performance.now() - start), err);
      }
    },
  });
}
