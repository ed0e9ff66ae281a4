import { z } from "zod";
import type { PluginContext } from "../context.js";
import type { Escalation } from "../../safety/gate.js";
import type { HdfsDaemon } from "../../hadoop/hdfs.js";
import type { YarnDaemon } from "../../hadoop/yarn.js";
import { GATE_PARAMS, registerTool, success } from "../helpers.js";

const HDFS_DAEMONS = ["namenode", "secondarynamenode", "datanode", "journalnode"] as const satisfies readonly HdfsDaemon[];
const YARN_DAEMONS = ["resourcemanager", "nodemanager", "historyserver"] as const satisfies readonly YarnDaemon[];

function isHdfsDaemon(daemon: HdfsDaemon | YarnDaemon): daemon is HdfsDaemon {
  return (HDFS_DAEMONS as readonly string[]).includes(daemon);
}

export function registerDaemonTools(ctx: PluginContext): void {
  registerTool(ctx, {
    name: "hadoop_daemon",
    description: "Start, stop or restart a Hadoop daemon on this node. Start is skipped when the daemon is already running. Moderate risk; stopping the active NameNode is high risk.",
    module: "daemons", riskLevel: "moderate", duration: "slow",
    inputSchema: z.object({
      daemon: z.enum([...HDFS_DAEMONS, ...YARN_DAEMONS]),
      action: z.enum(["start", "stop", "restart"]),
      ...GATE_PARAMS,
    }),
    annotations: { destructiveHint: false },
  }, async (args) => {
    const { daemon, action } = args;
    const escalations: Escalation[] = [];
    if (daemon === "namenode" && action !== "start" && ctx.ha.state() === "active") {
      escalations.push({ reason: "This NameNode is the active one; clients fail over until the standby takes over", riskLevel: "high" });
    }
    const gate = ctx.safetyGate.check({
      toolName: "hadoop_daemon", toolRiskLevel: "moderate", targetHost: ctx.targetHost,
      command: `${action} ${daemon}`, description: `${action} the ${daemon} daemon`,
      confirmed: args.confirmed, dryRun: args.dry_run, escalations, affectedServices: [daemon],
    });
    if (gate) return gate;
    if (args.dry_run) return success("hadoop_daemon", ctx.targetHost, null, null, { daemon, action }, { dry_run: true });

    const start = performance.now();
    let started: boolean | undefined;
    if (isHdfsDaemon(daemon)) {
      if (action === "start") started = await ctx.hdfs.start(daemon);
      else if (action === "stop") await ctx.hdfs.stop(daemon);
      else await ctx.hdfs.restart(daemon);
    } else {
      if (action === "start") started = await ctx.yarn.start(daemon);
      else if (action === "stop") await ctx.yarn.stop(daemon);
      else await ctx.yarn.restart(daemon);
    }
    return success("hadoop_daemon", ctx.targetHost, Math.round(performance.now() - start), null, { daemon, action, result: "ok" }, {
      skipped: started === false,
    });
  });
}
