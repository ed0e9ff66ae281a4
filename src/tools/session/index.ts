import { z } from "zod";
import type { PluginContext } from "../context.js";
import { registerTool, success } from "../helpers.js";
import { getKvHosts } from "../../hosts/etc-hosts.js";

export function registerSessionTools(ctx: PluginContext): void {
  registerTool(ctx, {
    name: "cluster_session_info",
    description: "Node and cluster context: distribution identity, node id, HA state, recorded one-time flags, interop spec. Call this first in every session.",
    module: "session",
    riskLevel: "read-only",
    duration: "instant",
    inputSchema: z.object({
      include_flags: z.boolean().optional().default(true).describe("Include the recorded state entries"),
    }),
    annotations: { readOnlyHint: true, destructiveHint: false, idempotentHint: true },
  }, async (args) => {
    const data: Record<string, unknown> = {
      target_host: ctx.targetHost,
      node_id: ctx.ha.nodeId,
      cluster_name: ctx.config.cluster_name,
      distro: { family: ctx.distro.family, name: ctx.distro.name, version: ctx.distro.version, firewall: ctx.distro.firewall_backend },
      dist: { file: ctx.dist.source, vendor: ctx.dist.vendor, hadoop_version: ctx.dist.hadoopVersion },
      hadoop_installed: ctx.base.isInstalled(),
      ha_state: ctx.ha.state(),
      spec: await ctx.base.spec(),
      managed_hosts: getKvHosts(ctx.store),
      tools_registered: ctx.registry.size,
      tools_by_module: ctx.registry.countByModule(),
    };
    if (args.include_flags) data.flags = ctx.store.snapshot();

    if (ctx.firstRun) {
      data.setup = {
        first_run: true,
        config_path: ctx.configPath,
        hints: [
          `Review the configuration at ${ctx.configPath}; set dist_file and node_id for this node.`,
          ...(ctx.config.java_installer ? [] : ["Set java_installer so the Hadoop base can be installed."]),
        ],
      };
    }
    return success("cluster_session_info", ctx.targetHost, null, null, data);
  });
}
