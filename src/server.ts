#!/usr/bin/env node

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { logger } from "./logger.js";
import { loadConfig } from "./config/loader.js";
import { detectDistro } from "./distro/detector.js";
import { LocalExecutor } from "./execution/executor.js";
import { createPluginContext } from "./bootstrap.js";
import type { ToolResponse } from "./types/response.js";

async function main(): Promise<void> {
  logger.info("Starting hadoop-ha-mcp server");

  // ── Phase 1: Load config ──────────────────────────────────────
  const { config, configPath, firstRun } = loadConfig(process.env.HADOOP_HA_CONFIG);
  logger.info({ configPath, firstRun }, "Configuration loaded");

  // ── Phase 2: Detect distro ────────────────────────────────────
  const distro = detectDistro(config.distro);

  // ── Phase 3: Descriptor, state and tools ──────────────────────
  const ctx = await createPluginContext({ config, distro, executor: new LocalExecutor(), configPath, firstRun });

  // ── Phase 4: Create MCP server and register tools ─────────────
  const server = new McpServer({ name: "hadoop-ha-mcp", version: "0.1.0" });

  for (const [name, tool] of ctx.registry.getAll()) {
    const meta = tool.metadata;
    server.registerTool(
      name,
      {
        title: name,
        description: meta.description,
        inputSchema: meta.inputSchema.shape,
        annotations: {
          readOnlyHint: meta.annotations?.readOnlyHint ?? meta.riskLevel === "read-only",
          destructiveHint: meta.annotations?.destructiveHint ?? false,
          idempotentHint: meta.annotations?.idempotentHint ?? false,
          openWorldHint: meta.annotations?.openWorldHint ?? false,
        },
      },
      async (args: Record<string, unknown>) => {
        try {
          const response: ToolResponse = await tool.execute(args, { targetHost: ctx.targetHost });
          return { content: [{ type: "text" as const, text: JSON.stringify(response, null, 2) }] };
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          logger.error({ tool: name, error: message }, "Tool execution error");
          return {
            content: [{
              type: "text" as const,
              text: JSON.stringify({
                status: "error",
                tool: name,
                target_host: ctx.targetHost,
                duration_ms: null,
                command_executed: null,
                error_code: "INTERNAL_ERROR",
                error_category: "state",
                message,
                transient: false,
                remediation: ["Check server logs for details"],
              }),
            }],
          };
        }
      },
    );
  }

  // ── Phase 5: Connect transport ────────────────────────────────
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ tools: ctx.registry.size, nodeId: ctx.ha.nodeId }, "hadoop-ha-mcp server running on stdio");
}

main().catch((err) => {
  logger.fatal({ error: err }, "Fatal startup error");
  process.exit(1);
});
