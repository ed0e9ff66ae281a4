import type { z } from "zod";
import type { RiskLevel, DurationCategory } from "./risk.js";
import type { ToolResponse } from "./response.js";

/** Metadata declared by every tool at registration time. */
export interface ToolMetadata<S extends z.AnyZodObject = z.AnyZodObject> {
  readonly name: string;
  readonly description: string;
  readonly module: string;
  readonly riskLevel: RiskLevel;
  readonly duration: DurationCategory;
  readonly inputSchema: S;
  readonly annotations?: {
    readOnlyHint?: boolean;
    destructiveHint?: boolean;
    idempotentHint?: boolean;
    openWorldHint?: boolean;
  };
}

/** A registered tool with its execute function. Arguments are validated against inputSchema before the handler runs. */
export interface RegisteredTool {
  readonly metadata: ToolMetadata;
  readonly execute: (args: Record<string, unknown>, context: ExecutionContext) => Promise<ToolResponse>;
}

/** Context passed to tool execute functions. */
export interface ExecutionContext {
  readonly targetHost: string;
}
