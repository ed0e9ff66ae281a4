import { z } from "zod";
import type { PluginContext } from "../context.js";
import { GATE_PARAMS, blocked, registerTool, success } from "../helpers.js";
import { InMemoryRelationData, isReady } from "../../relations/relation.js";
import { nameNodePeers } from "../../relations/catalog.js";
import { HA_FLAGS } from "../../hadoop/ha-coordinator.js";

const UnitDataSchema = z.record(z.record(z.string())).describe("Remote unit name → data that unit published");

function elapsed(start: number): number {
  return Math.round(performance.now() - start);
}

export function registerHdfsTools(ctx: PluginContext): void {
  // ── hdfs_ha_bootstrap ───────────────────────────────────────────
  registerTool(ctx, {
    name: "hdfs_ha_bootstrap",
    description: "Bootstrap this NameNode for HA. The first node of `order` formats and initializes the shared edits; the others bootstrap as standby. Waits for peer NameNodes with a matching spec. High risk.",
    module: "hdfs", riskLevel: "high", duration: "long_running",
    inputSchema: z.object({
      order: z.array(z.string().min(1)).min(1).describe("NameNode ids in bootstrap order; the first one formats"),
      peers: UnitDataSchema.optional().default({}),
      ...GATE_PARAMS,
    }),
    annotations: { destructiveHint: true },
  }, async (args) => {
    if (args.order.length > 1) {
      const peers = InMemoryRelationData.from({ "namenode-peers": args.peers });
      if (!(await isReady(nameNodePeers(() => ctx.base.spec()), peers))) {
        return blocked("hdfs_ha_bootstrap", ctx.targetHost, null, {
          code: "PEERS_NOT_READY", category: "state",
          message: "No peer NameNode has published its address and spec yet",
          remediation: ["Retry once the other NameNodes have installed the Hadoop base"],
        });
      }
    }
    const first = args.order[0] === ctx.ha.nodeId;
    const plan = first ? ["format", "initializeSharedEdits"] : ["bootstrapStandby"];
    const gate = ctx.safetyGate.check({
      toolName: "hdfs_ha_bootstrap", toolRiskLevel: "high", targetHost: ctx.targetHost,
      command: plan.map((step) => `hdfs namenode -${step}`).join(" && "),
      description: `Bootstrap NameNode ${ctx.ha.nodeId} as ${first ? "the first NameNode" : "a standby"}`,
      confirmed: args.confirmed, dryRun: args.dry_run, affectedServices: ["namenode"],
    });
    if (gate) return gate;
    if (args.dry_run) {
      return success("hdfs_ha_bootstrap", ctx.targetHost, null, null, { plan, ha_state: ctx.ha.state() }, { dry_run: true });
    }
    const start = performance.now();
    const result = await ctx.ha.bootstrap(args.order);
    return success("hdfs_ha_bootstrap", ctx.targetHost, elapsed(start), null, { ...result, ha_state: ctx.ha.state() }, {
      skipped: result.actions.length === 0,
    });
  });

  // ── hdfs_format ─────────────────────────────────────────────────
  registerTool(ctx, {
    name: "hdfs_format",
    description: "Format this NameNode. Runs at most once per node; later calls are skipped. Critical risk: formatting discards the namespace.",
    module: "hdfs", riskLevel: "critical", duration: "slow",
    inputSchema: z.object({ ...GATE_PARAMS }),
    annotations: { destructiveHint: true, idempotentHint: true },
  }, async (args) => {
    const command = "hdfs namenode -format -noninteractive";
    const gate = ctx.safetyGate.check({
      toolName: "hdfs_format", toolRiskLevel: "critical", targetHost: ctx.targetHost,
      command, description: `Format NameNode ${ctx.ha.nodeId}`,
      confirmed: args.confirmed, dryRun: args.dry_run, affectedServices: ["namenode"],
    });
    if (gate) return gate;
    if (args.dry_run) {
      return success("hdfs_format", ctx.targetHost, null, null, { preview_command: command, already_formatted: ctx.store.flag(HA_FLAGS.formatted) }, { dry_run: true });
    }
    const start = performance.now();
    const formatted = await ctx.ha.format();
    return success("hdfs_format", ctx.targetHost, elapsed(start), formatted ? command : null, { formatted, ha_state: ctx.ha.state() }, {
      skipped: !formatted,
    });
  });

  // ── hdfs_transition_to_active ───────────────────────────────────
  registerTool(ctx, {
    name: "hdfs_transition_to_active",
    description: "Promote a NameNode to active with haadmin. High risk.",
    module: "hdfs", riskLevel: "high", duration: "slow",
    inputSchema: z.object({
      node_id: z.string().min(1).describe("NameNode id to promote"),
      ...GATE_PARAMS,
    }),
  }, async (args) => {
    const command = `hdfs haadmin -transitionToActive ${args.node_id}`;
    const gate = ctx.safetyGate.check({
      toolName: "hdfs_transition_to_active", toolRiskLevel: "high", targetHost: ctx.targetHost,
      command, description: `Make ${args.node_id} the active NameNode`,
      confirmed: args.confirmed, dryRun: args.dry_run, affectedServices: ["namenode"],
    });
    if (gate) return gate;
    if (args.dry_run) return success("hdfs_transition_to_active", ctx.targetHost, null, null, { preview_command: command }, { dry_run: true });
    const start = performance.now();
    await ctx.ha.transitionToActive(args.node_id);
    return success("hdfs_transition_to_active", ctx.targetHost, elapsed(start), command, { node_id: args.node_id, ha_state: ctx.ha.state() });
  });

  // ── hdfs_ensure_active ──────────────────────────────────────────
  registerTool(ctx, {
    name: "hdfs_ensure_active",
    description: "Two-NameNode failover check: if neither candidate reports active, promote the preferred leader. Exactly two candidates are supported. High risk.",
    module: "hdfs", riskLevel: "high", duration: "slow",
    inputSchema: z.object({
      candidates: z.array(z.string().min(1)).describe("The two NameNode ids"),
      preferred_leader: z.string().min(1),
      ...GATE_PARAMS,
    }),
  }, async (args) => {
    const gate = ctx.safetyGate.check({
      toolName: "hdfs_ensure_active", toolRiskLevel: "high", targetHost: ctx.targetHost,
      command: `hdfs haadmin -transitionToActive ${args.preferred_leader} (only if no NameNode is active)`,
      description: `Ensure one of ${args.candidates.join(", ")} is active`,
      confirmed: args.confirmed, dryRun: args.dry_run, affectedServices: ["namenode"],
    });
    if (gate) return gate;
    if (args.dry_run) {
      const states: Record<string, string> = {};
      for (const node of args.candidates) states[node] = await ctx.ha.serviceState(node);
      return success("hdfs_ensure_active", ctx.targetHost, null, null, { states }, { dry_run: true });
    }
    const start = performance.now();
    const result = await ctx.ha.ensureHAActive(args.candidates, args.preferred_leader);
    return success("hdfs_ensure_active", ctx.targetHost, elapsed(start), null, { ...result, ha_state: ctx.ha.state() });
  });

  // ── hdfs_service_state ──────────────────────────────────────────
  registerTool(ctx, {
    name: "hdfs_service_state",
    description: "HA service state of a NameNode (active, standby, or the connection error).",
    module: "hdfs", riskLevel: "read-only", duration: "quick",
    inputSchema: z.object({ node_id: z.string().min(1) }),
    annotations: { readOnlyHint: true, idempotentHint: true },
  }, async (args) => {
    const start = performance.now();
    const state = await ctx.ha.serviceState(args.node_id);
    return success("hdfs_service_state", ctx.targetHost, elapsed(start), null, { node_id: args.node_id, state });
  });

  // ── hdfs_create_dirs ────────────────────────────────────────────
  registerTool(ctx, {
    name: "hdfs_create_dirs",
    description: "Create the cluster-wide HDFS directories (staging, user, job history, app logs). Runs once per node. Moderate risk.",
    module: "hdfs", riskLevel: "moderate", duration: "slow",
    inputSchema: z.object({ ...GATE_PARAMS }),
    annotations: { idempotentHint: true },
  }, async (args) => {
    const gate = ctx.safetyGate.check({
      toolName: "hdfs_create_dirs", toolRiskLevel: "moderate", targetHost: ctx.targetHost,
      command: "hdfs dfs -mkdir/-chmod/-chown ...", description: "Create the cluster HDFS directories",
      confirmed: args.confirmed, dryRun: args.dry_run,
    });
    if (gate) return gate;
    if (args.dry_run) return success("hdfs_create_dirs", ctx.targetHost, null, null, { already_created: ctx.store.flag(HA_FLAGS.dirsCreated) }, { dry_run: true });
    const start = performance.now();
    const created = await ctx.ha.createClusterDirectories();
    return success("hdfs_create_dirs", ctx.targetHost, elapsed(start), null, { created }, { skipped: !created });
  });

  // ── hdfs_wait_ready ─────────────────────────────────────────────
  registerTool(ctx, {
    name: "hdfs_wait_ready",
    description: "Wait until HDFS reports live DataNodes and has left safe mode.",
    module: "hdfs", riskLevel: "read-only", duration: "long_running",
    inputSchema: z.object({
      timeout_seconds: z.number().positive().optional().describe("Defaults to timeouts.hdfs_ready_seconds"),
    }),
    annotations: { readOnlyHint: true, idempotentHint: true },
  }, async (args) => {
    const start = performance.now();
    await ctx.hdfs.waitForReady(args.timeout_seconds ?? ctx.config.timeouts.hdfs_ready_seconds);
    return success("hdfs_wait_ready", ctx.targetHost, elapsed(start), null, { ready: true });
  });
}
