export type { DistroContext, DistroFamily, PackageManager, FirewallBackend } from "./distro.js";
export type { RiskLevel, DurationCategory } from "./risk.js";
export { RISK_ORDER, DURATION_TIMEOUTS, riskAtLeast } from "./risk.js";
export type { Command } from "./command.js";
export type { PluginConfig, TimeoutConfig, OptionValue } from "./config.js";
export type { ToolResponse, SuccessResponse, ErrorResponse, BlockedResponse, ConfirmationResponse, ErrorCategory } from "./response.js";
export type { ToolMetadata, RegisteredTool, ExecutionContext } from "./tool.js";
export type { PortRule, GroupCreateParams, UserCreateParams, DirectoryParams } from "./provisioning.js";
