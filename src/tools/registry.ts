import type { RegisteredTool } from "../types/tool.js";
import { logger } from "../logger.js";

/** The node's tool set, keyed by MCP tool name. Filled once by `createPluginContext`. */
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  register(tool: RegisteredTool): void {
    if (this.tools.has(tool.metadata.name)) {
      logger.warn({ tool: tool.metadata.name }, "Tool registered twice; the later module wins");
    }
    this.tools.set(tool.metadata.name, tool);
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  getAll(): ReadonlyMap<string, RegisteredTool> {
    return this.tools;
  }

  /** Tool count per module (session, dist, config, hdfs, daemons, relations). */
  countByModule(): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const tool of this.tools.values()) {
      counts[tool.metadata.module] = (counts[tool.metadata.module] ?? 0) + 1;
    }
    return counts;
  }

  get size(): number {
    return this.tools.size;
  }
}
