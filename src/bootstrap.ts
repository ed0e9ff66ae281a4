// Builds the plugin context: one DistConfig, one flag store and one set of Hadoop
// services per process, shared by every tool module.
import { hostname } from "node:os";
import type { PluginConfig } from "./types/config.js";
import type { DistroContext } from "./types/distro.js";
import type { Executor } from "./execution/executor.js";
import { withTimeoutCeiling } from "./execution/executor.js";
import type { PluginContext } from "./tools/context.js";
import { createDistroCommands } from "./distro/commands/factory.js";
import { DistConfig } from "./dist/dist-config.js";
import { FlagStore } from "./state/flag-store.js";
import { HadoopBase } from "./hadoop/hadoop-base.js";
import { HDFS } from "./hadoop/hdfs.js";
import { YARN } from "./hadoop/yarn.js";
import { HaCoordinator } from "./hadoop/ha-coordinator.js";
import { SafetyGate } from "./safety/gate.js";
import { ToolRegistry } from "./tools/registry.js";
import { registerSessionTools } from "./tools/session/index.js";
import { registerDistTools } from "./tools/dist/index.js";
import { registerConfigTools } from "./tools/config/index.js";
import { registerHdfsTools } from "./tools/hdfs/index.js";
import { registerDaemonTools } from "./tools/daemons/index.js";
import { registerRelationTools } from "./tools/relations/index.js";
import { logger } from "./logger.js";

export interface ContextOptions {
  config: PluginConfig;
  distro: DistroContext;
  executor: Executor;
  configPath: string;
  firstRun: boolean;
  /** Defaults to the machine hostname. */
  targetHost?: string;
}

export async function createPluginContext(options: ContextOptions): Promise<PluginContext> {
  const { config, distro } = options;
  const executor = withTimeoutCeiling(options.executor, config.errors.command_timeout_ceiling * 1000);
  const targetHost = options.targetHost ?? hostname();
  const nodeId = config.node_id ?? targetHost;

  // Option values are read on every resolution so templates follow config changes.
  const dist = DistConfig.load(config.dist_file, () => config.options);
  const store = await FlagStore.open(config.state_file);
  const commands = createDistroCommands(distro);

  const base = new HadoopBase({ dist, executor, commands, distro, store, config, nodeId });
  const hdfs = new HDFS(base);
  const yarn = new YARN(base);
  const ha = new HaCoordinator(hdfs, store, nodeId, config.timeouts.ha_connect_retries);

  const ctx: PluginContext = {
    config, distro, commands, executor, dist, store, base, hdfs, yarn, ha,
    safetyGate: new SafetyGate(config.safety),
    registry: new ToolRegistry(),
    targetHost,
    configPath: options.configPath,
    firstRun: options.firstRun,
  };

  registerSessionTools(ctx);
  registerDistTools(ctx);
  registerConfigTools(ctx);
  registerHdfsTools(ctx);
  registerDaemonTools(ctx);
  registerRelationTools(ctx);
  logger.info({ toolCount: ctx.registry.size, nodeId }, "All tool modules registered");
  return ctx;
}
