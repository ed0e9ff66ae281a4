import type { DistroContext } from "../types/distro.js";
import type { PluginConfig } from "../types/config.js";
import type { DistroCommands } from "../distro/commands/interface.js";
import type { Executor } from "../execution/executor.js";
import type { DistConfig } from "../dist/dist-config.js";
import type { FlagStore } from "../state/flag-store.js";
import type { HadoopBase } from "../hadoop/hadoop-base.js";
import type { HDFS } from "../hadoop/hdfs.js";
import type { YARN } from "../hadoop/yarn.js";
import type { HaCoordinator } from "../hadoop/ha-coordinator.js";
import type { SafetyGate } from "../safety/gate.js";
import type { ToolRegistry } from "./registry.js";

/**
 * Shared plugin context: the glue between all components.
 * Created once at startup, passed to all tool modules.
 */
export interface PluginContext {
  readonly config: PluginConfig;
  readonly distro: DistroContext;
  readonly commands: DistroCommands;
  readonly executor: Executor;
  readonly dist: DistConfig;
  readonly store: FlagStore;
  readonly base: HadoopBase;
  readonly hdfs: HDFS;
  readonly yarn: YARN;
  readonly ha: HaCoordinator;
  readonly safetyGate: SafetyGate;
  readonly registry: ToolRegistry;
  readonly targetHost: string;
  readonly configPath: string;
  readonly firstRun: boolean;
}
