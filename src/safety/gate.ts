// Safety gate: every state-changing tool asks it before running anything.
// Classification: tool default risk → escalations for the current cluster state → threshold check.
import type { RiskLevel } from "../types/risk.js";
import { riskAtLeast } from "../types/risk.js";
import type { ConfirmationResponse } from "../types/response.js";
import { logger } from "../logger.js";

/** Raises the risk of one invocation, e.g. stopping the NameNode that is currently active. */
export interface Escalation {
  readonly reason: string;
  readonly riskLevel: RiskLevel;
}

export interface GateParams {
  toolName: string;
  toolRiskLevel: RiskLevel;
  targetHost: string;
  command: string;
  description: string;
  confirmed?: boolean;
  dryRun?: boolean;
  escalations?: readonly Escalation[];
  affectedServices?: string[];
  /** Omit or set true if the tool takes dry_run. */
  supportsDryRun?: boolean;
}

export class SafetyGate {
  private readonly threshold: RiskLevel;
  private readonly dryRunBypass: boolean;

  constructor(config: { confirmation_threshold: RiskLevel; dry_run_bypass_confirmation: boolean }) {
    this.threshold = config.confirmation_threshold;
    this.dryRunBypass = config.dry_run_bypass_confirmation;
  }

  /** Null when the operation may proceed, otherwise the confirmation request to return. */
  check(params: GateParams): ConfirmationResponse | null {
    if (params.dryRun && this.dryRunBypass) return null;

    // Read-only and low risk never need confirmation
    if (!riskAtLeast(params.toolRiskLevel, "moderate")) return null;

    let effectiveRisk = params.toolRiskLevel;
    let escalationReason: string | undefined;
    const warnings: string[] = [];
    for (const esc of params.escalations ?? []) {
      warnings.push(esc.reason);
      if (!riskAtLeast(effectiveRisk, esc.riskLevel)) {
        effectiveRisk = esc.riskLevel;
        escalationReason = `Escalated from ${params.toolRiskLevel} to ${esc.riskLevel}: ${esc.reason}`;
      }
    }

    if (!riskAtLeast(effectiveRisk, this.threshold)) return null;
    if (params.confirmed) return null;

    logger.info({ tool: params.toolName, effectiveRisk, threshold: this.threshold }, "Confirmation required");

    return {
      status: "confirmation_required",
      tool: params.toolName,
      target_host: params.targetHost,
      // null = no command executed; 0 would be ambiguous with "ran instantly"
      duration_ms: null,
      command_executed: null,
      risk_level: effectiveRisk,
      dry_run_available: params.supportsDryRun !== false,
      preview: {
        command: params.command,
        description: params.description,
        warnings,
        affected_services: params.affectedServices,
        escalation_reason: escalationReason,
      },
    };
  }
}
