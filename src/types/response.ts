/** Error categories reported to the MCP client. */
export type ErrorCategory =
  | "privilege"
  | "not_found"
  | "dependency"
  | "resource"
  | "lock"
  | "network"
  | "timeout"
  | "validation"
  | "state";

/** Base fields present in every response. */
export interface ResponseBase {
  status: "success" | "error" | "blocked" | "confirmation_required";
  tool: string;
  target_host: string;
  // null = nothing was executed (e.g. awaiting confirmation)
  duration_ms: number | null;
  command_executed: string | null;
}

export interface SuccessResponse extends ResponseBase {
  status: "success";
  data: Record<string, unknown>;
  summary?: string;
  dry_run?: boolean;
  // Set when a flag-guarded operation had already completed
  skipped?: boolean;
}

export interface ErrorResponse extends ResponseBase {
  status: "error";
  error_code: string;
  error_category: ErrorCategory;
  message: string;
  transient: boolean;
  remediation: string[];
}

/**
 * Blocked response: the operation cannot run yet because a precondition
 * (peer data, lock) is not satisfied. Distinct from a hard error.
 */
export interface BlockedResponse extends ResponseBase {
  status: "blocked";
  error_code: string;
  error_category: "lock" | "state";
  message: string;
  remediation: string[];
}

export interface ConfirmationResponse extends ResponseBase {
  status: "confirmation_required";
  risk_level: string;
  dry_run_available: boolean;
  preview: {
    command: string;
    description: string;
    warnings: string[];
    affected_services?: string[];
    escalation_reason?: string;
  };
}

export type ToolResponse = SuccessResponse | ErrorResponse | BlockedResponse | ConfirmationResponse;
