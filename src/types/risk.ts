/**
 * How far a tool can disturb the cluster. Reads are `read-only`; daemon
 * control is `moderate`; failover is `high`; formatting a NameNode is `critical`.
 */
export type RiskLevel = "read-only" | "low" | "moderate" | "high" | "critical";

export const RISK_ORDER: Record<RiskLevel, number> = {
  "read-only": 0,
  "low": 1,
  "moderate": 2,
  "high": 3,
  "critical": 4,
};

export function riskAtLeast(level: RiskLevel, floor: RiskLevel): boolean {
  return RISK_ORDER[level] >= RISK_ORDER[floor];
}

/**
 * Timeout class of a command. Probes (`pgrep`, `getent`, `uname`) are
 * instant; `haadmin` and `hdfs dfs` are slow because the IPC client retries
 * an unreachable NameNode; package installs and NameNode format or bootstrap
 * are long_running.
 */
export type DurationCategory = "instant" | "quick" | "normal" | "slow" | "long_running";

export const DURATION_TIMEOUTS: Record<DurationCategory, number> = {
  instant: 5_000,
  quick: 15_000,
  normal: 30_000,
  slow: 120_000,
  long_running: 900_000,
};
