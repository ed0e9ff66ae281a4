// NameNode HA lifecycle for one node. The state is persisted in the flag store and
// only moves forward, so every operation can be re-run after a crash without
// reformatting or re-bootstrapping a NameNode that already holds metadata.
import type { HDFS } from "./hdfs.js";
import type { FlagStore } from "../state/flag-store.js";
import { HaStateError } from "../errors.js";
import { logger } from "../logger.js";

export const HA_STATES = [
  "uninitialized",
  "formatted",
  "shared-edits-ready",
  "standby-bootstrapped",
  "active",
  "standby",
] as const;

export type HaState = (typeof HA_STATES)[number];

// active and standby share the final rank: failover may swap them.
const RANK: Record<HaState, number> = {
  "uninitialized": 0,
  "formatted": 1,
  "shared-edits-ready": 2,
  "standby-bootstrapped": 3,
  "active": 4,
  "standby": 4,
};

export const HA_FLAGS = {
  formatted: "hdfs.namenode.formatted",
  dirsCreated: "hdfs.namenode.dirs.created",
  state: "hdfs.namenode.ha-state",
} as const;

function isHaState(value: unknown): value is HaState {
  return typeof value === "string" && (HA_STATES as readonly string[]).includes(value);
}

/** HDFS directories every cluster needs, with their modes and owners. */
const CLUSTER_DIRECTORIES: ReadonlyArray<readonly string[]> = [
  ["-mkdir", "-p", "/tmp/hadoop/mapred/staging"],
  ["-chmod", "-R", "1777", "/tmp/hadoop/mapred/staging"],
  ["-mkdir", "-p", "/tmp/hadoop-yarn/staging"],
  ["-chmod", "-R", "1777", "/tmp/hadoop-yarn"],
  ["-mkdir", "-p", "/user/ubuntu"],
  ["-chown", "-R", "ubuntu", "/user/ubuntu"],
  // JobHistory
  ["-mkdir", "-p", "/mr-history/tmp"],
  ["-chmod", "-R", "1777", "/mr-history/tmp"],
  ["-mkdir", "-p", "/mr-history/done"],
  ["-chmod", "-R", "1777", "/mr-history/done"],
  ["-chown", "-R", "mapred:hdfs", "/mr-history"],
  ["-mkdir", "-p", "/app-logs"],
  ["-chmod", "-R", "1777", "/app-logs"],
  ["-chown", "yarn", "/app-logs"],
];

export interface BootstrapResult {
  role: "first" | "standby";
  /** Steps actually run; empty when the node was already bootstrapped. */
  actions: string[];
}

export interface EnsureActiveResult {
  /** Service state reported for each candidate. */
  states: Record<string, string>;
  promoted: string | null;
}

export class HaCoordinator {
  constructor(
    private readonly hdfs: HDFS,
    private readonly store: FlagStore,
    readonly nodeId: string,
    /** Overrides the client's connect retries for service-state queries. */
    private readonly connectRetries: number | null = null,
  ) {}

  state(): HaState {
    const value = this.store.get(HA_FLAGS.state);
    return isHaState(value) ? value : "uninitialized";
  }

  private rank(): number {
    return RANK[this.state()];
  }

  private async advance(to: HaState): Promise<void> {
    const from = this.state();
    if (RANK[to] < RANK[from]) {
      throw new HaStateError(`Cannot move HA state from ${from} back to ${to}`, { from, to });
    }
    if (from === to) return;
    logger.info({ from, to }, "HA state change");
    await this.store.set(HA_FLAGS.state, to);
  }

  /**
   * Format this NameNode. Runs at most once per node; re-running after a
   * successful format issues no command.
   */
  async format(): Promise<boolean> {
    if (this.store.flag(HA_FLAGS.formatted)) {
      logger.debug("NameNode already formatted");
      return false;
    }
    if (this.rank() > RANK.formatted) {
      // Bootstrapped from a peer: formatting would discard the shared namespace.
      throw new HaStateError(`Refusing to format a NameNode in state ${this.state()}`, { state: this.state() });
    }
    await this.store.runOnce(HA_FLAGS.formatted, async () => {
      await this.hdfs.stop("namenode");
      logger.info("Formatting NameNode");
      await this.hdfs.formatNamenode();
    });
    await this.advance("formatted");
    return true;
  }

  async initializeSharedEdits(): Promise<void> {
    if (!this.store.flag(HA_FLAGS.formatted)) {
      throw new HaStateError("Shared edits can only be initialized on the formatted NameNode", { state: this.state() });
    }
    logger.info("Initializing shared edits");
    await this.hdfs.initializeSharedEdits();
    await this.advance("shared-edits-ready");
  }

  async bootstrapStandby(): Promise<void> {
    if (this.store.flag(HA_FLAGS.formatted)) {
      throw new HaStateError("The formatted NameNode cannot be bootstrapped as a standby", { state: this.state() });
    }
    logger.info("Bootstrapping standby NameNode");
    await this.hdfs.bootstrapStandby();
    await this.advance("standby-bootstrapped");
  }

  /**
   * Cluster bootstrap. The first node of `order` formats and initializes the
   * shared edits; every other node copies the namespace as a standby. Steps
   * already reflected in the persisted state are skipped.
   */
  async bootstrap(order: readonly string[]): Promise<BootstrapResult> {
    const index = order.indexOf(this.nodeId);
    if (index < 0) {
      throw new HaStateError(`Node ${this.nodeId} is not in the bootstrap order`, { nodeId: this.nodeId, order: [...order] });
    }
    const actions: string[] = [];
    if (index === 0) {
      if (await this.format()) actions.push("format");
      if (this.rank() < RANK["shared-edits-ready"]) {
        await this.initializeSharedEdits();
        actions.push("initializeSharedEdits");
      }
      return { role: "first", actions };
    }
    if (this.rank() < RANK["standby-bootstrapped"]) {
      await this.bootstrapStandby();
      actions.push("bootstrapStandby");
    }
    return { role: "standby", actions };
  }

  async transitionToActive(nodeId: string): Promise<void> {
    logger.info({ nodeId }, "Transitioning NameNode to active");
    await this.hdfs.transitionToActive(nodeId);
    if (nodeId === this.nodeId) await this.advance("active");
  }

  /** Reported HA state of a NameNode; unreachable nodes yield the error text. */
  async serviceState(nodeId: string): Promise<string> {
    return this.hdfs.serviceState(nodeId, this.connectRetries);
  }

  /**
   * Make sure one of exactly two NameNodes is active. With no arbiter, a pair
   * where neither reports active gets the preferred leader promoted; any
   * other situation is left alone. More candidates need real leader election.
   */
  async ensureHAActive(candidates: readonly string[], preferredLeader: string): Promise<EnsureActiveResult> {
    if (candidates.length !== 2 || candidates[0] === candidates[1]) {
      throw new HaStateError(`Automatic failover needs exactly two distinct NameNodes, got ${candidates.length}`, {
        candidates: [...candidates],
      });
    }
    if (!candidates.includes(preferredLeader)) {
      throw new HaStateError(`Preferred leader ${preferredLeader} is not a candidate`, {
        candidates: [...candidates],
        preferredLeader,
      });
    }

    const states: Record<string, string> = {};
    for (const node of candidates) states[node] = await this.serviceState(node);
    logger.info({ states }, "NameNode service states");

    const local = states[this.nodeId]?.toLowerCase();
    if (local === "active" || local === "standby") await this.advance(local);

    if (Object.values(states).some((s) => s.toLowerCase() === "active")) {
      return { states, promoted: null };
    }
    await this.transitionToActive(preferredLeader);
    return { states, promoted: preferredLeader };
  }

  /** Create the cluster-wide HDFS directories, once. */
  async createClusterDirectories(): Promise<boolean> {
    return this.store.runOnce(HA_FLAGS.dirsCreated, async () => {
      logger.info("Creating HDFS directories");
      for (const args of CLUSTER_DIRECTORIES) await this.hdfs.dfs(...args);
    });
  }
}
