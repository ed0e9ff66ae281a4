// HDFS daemons, HDFS configuration files and raw `hdfs` administrative commands.
// One-time and state-changing HA operations are sequenced by HaCoordinator.
import { setTimeout as sleep } from "node:timers/promises";
import type { HadoopBase } from "./hadoop-base.js";
import type { ExecResult } from "../execution/executor.js";
import { editPropertyFile } from "../edit/property-file.js";
import { CommandError } from "../errors.js";
import { jps } from "./process.js";
import { pollUntil } from "./wait.js";
import { DURATION_TIMEOUTS } from "../types/risk.js";
import { logger } from "../logger.js";

export type HdfsDaemon = "namenode" | "secondarynamenode" | "datanode" | "journalnode";

/** Java main class shown by jps for each daemon. */
export const HDFS_PROCESS_NAMES: Record<HdfsDaemon, string> = {
  namenode: "NameNode",
  secondarynamenode: "SecondaryNameNode",
  datanode: "DataNode",
  journalnode: "JournalNode",
};

// NameNodes take a while after launch before they accept connections.
const SLOW_STARTERS: ReadonlySet<HdfsDaemon> = new Set(["namenode", "secondarynamenode"]);

const BASE_CODECS = [
  "org.apache.hadoop.io.compress.GzipCodec",
  "org.apache.hadoop.io.compress.DefaultCodec",
  "org.apache.hadoop.io.compress.BZip2Codec",
  "org.apache.hadoop.io.compress.SnappyCodec",
];

export class HDFS {
  constructor(readonly base: HadoopBase) {}

  private get settleMs(): number {
    return this.base.node.config.timeouts.start_settle_seconds * 1000;
  }

  private get restartDelayMs(): number {
    return this.base.node.config.timeouts.restart_delay_seconds * 1000;
  }

  private get clusterName(): string {
    return this.base.node.config.cluster_name;
  }

  /** Start a daemon unless jps already shows it. Returns false when it was running. */
  async start(daemon: HdfsDaemon): Promise<boolean> {
    if ((await jps(this.base.node.executor, HDFS_PROCESS_NAMES[daemon])).length > 0) {
      logger.debug({ daemon }, "Daemon already running");
      return false;
    }
    logger.info({ daemon }, "Starting HDFS daemon");
    await this.hadoopDaemon("start", daemon);
    if (SLOW_STARTERS.has(daemon)) await sleep(this.settleMs);
    return true;
  }

  async stop(daemon: HdfsDaemon): Promise<void> {
    logger.info({ daemon }, "Stopping HDFS daemon");
    await this.hadoopDaemon("stop", daemon);
  }

  async restart(daemon: HdfsDaemon): Promise<void> {
    await this.stop(daemon);
    await sleep(this.restartDelayMs);
    await this.start(daemon);
  }

  /** core-site.xml and hdfs-site.xml settings shared by every HDFS role, for an HA nameservice. */
  async configureHdfsBase(clusterName: string, namenodes: readonly string[], port: number, webhdfsPort: number): Promise<void> {
    const dist = this.base.dist;
    await editPropertyFile(this.base.confFile("core-site.xml"), (props) => {
      props.set("hadoop.proxyuser.hue.hosts", "*");
      props.set("hadoop.proxyuser.hue.groups", "*");
      props.set("hadoop.proxyuser.oozie.groups", "*");
      props.set("hadoop.proxyuser.oozie.hosts", "*");
      props.set("io.compression.codecs", BASE_CODECS.join(", "));
      props.set("fs.defaultFS", `hdfs://${clusterName}`);
    });
    const nameDir = `${dist.path("hdfs_dir_base")}/cache/hadoop/dfs/name`;
    await editPropertyFile(this.base.confFile("hdfs-site.xml"), (props) => {
      props.set("dfs.webhdfs.enabled", "true");
      props.set("dfs.namenode.name.dir", nameDir);
      props.set("dfs.datanode.data.dir", nameDir);
      props.set("dfs.permissions", "false");
      props.set("dfs.nameservices", clusterName);
      props.set(
        `dfs.client.failover.proxy.provider.${clusterName}`,
        "org.apache.hadoop.hdfs.server.namenode.ha.ConfiguredFailoverProxyProvider",
      );
      props.set("dfs.ha.fencing.methods", "sshfence");
      props.set("dfs.ha.fencing.ssh.private-key-files", this.base.sshPrivateKey("hdfs"));
      props.set(`dfs.ha.namenodes.${clusterName}`, namenodes.join(","));
      for (const host of namenodes) {
        props.set(`dfs.namenode.rpc-address.${clusterName}.${host}`, `${host}:${port}`);
        props.set(`dfs.namenode.http-address.${clusterName}.${host}`, `${host}:${webhdfsPort}`);
      }
    });
  }

  async configureNamenode(namenodes: readonly string[]): Promise<void> {
    const dist = this.base.dist;
    const options = this.base.node.config.options;
    const host = this.base.node.nodeId;
    const webPort = dist.requirePort("nn_webapp_http");
    await this.configureHdfsBase(this.clusterName, namenodes, dist.requirePort("namenode"), webPort);
    await editPropertyFile(this.base.confFile("hdfs-site.xml"), (props) => {
      props.set("dfs.replication", options.dfs_replication ?? 3);
      props.set("dfs.blocksize", Math.trunc(Number(options.dfs_blocksize ?? 134217728)));
      props.set("dfs.namenode.datanode.registration.ip-hostname-check", "true");
      props.set(`dfs.namenode.http-address.${this.clusterName}.${host}`, `${host}:${webPort}`);
    });
  }

  async configureDatanode(clusterName: string, namenodes: readonly string[], port: number, webhdfsPort: number): Promise<void> {
    await this.configureHdfsBase(clusterName, namenodes, port, webhdfsPort);
    const dnPort = this.base.dist.requirePort("dn_webapp_http");
    await editPropertyFile(this.base.confFile("hdfs-site.xml"), (props) => {
      props.set("dfs.datanode.http.address", `0.0.0.0:${dnPort}`);
    });
  }

  async configureJournalnode(): Promise<void> {
    const dist = this.base.dist;
    const rpc = dist.requirePort("journalnode");
    const http = dist.requirePort("jn_webapp_http");
    await editPropertyFile(this.base.confFile("hdfs-site.xml"), (props) => {
      props.set("dfs.journalnode.rpc-address", `0.0.0.0:${rpc}`);
      props.set("dfs.journalnode.http-address", `0.0.0.0:${http}`);
    });
  }

  async configureClient(clusterName: string, namenodes: readonly string[], port: number, webhdfsPort: number): Promise<void> {
    await this.configureHdfsBase(clusterName, namenodes, port, webhdfsPort);
  }

  /** Point the NameNodes at the quorum journal. */
  async registerJournalnodes(nodes: readonly string[], port: number): Promise<void> {
    const quorum = nodes.map((host) => `${host}:${port}`).join(";");
    await editPropertyFile(this.base.confFile("hdfs-site.xml"), (props) => {
      props.set("dfs.namenode.shared.edits.dir", `qjournal://${quorum}/${this.clusterName}`);
    });
  }

  async registerSlaves(slaves: readonly string[]): Promise<void> {
    await this.base.registerSlaves(slaves);
  }

  /** Have a running NameNode re-read the slaves file. */
  async reloadSlaves(): Promise<boolean> {
    if ((await jps(this.base.node.executor, HDFS_PROCESS_NAMES.namenode)).length === 0) return false;
    await this.hdfs("dfsadmin", "-refreshNodes");
    return true;
  }

  async formatNamenode(): Promise<void> {
    // -noninteractive makes this fail on an already formatted name dir instead of prompting.
    await this.hdfs("namenode", "-format", "-noninteractive");
  }

  async initializeSharedEdits(): Promise<void> {
    await this.hdfs("namenode", "-initializeSharedEdits", "-nonInteractive", "-force");
  }

  async bootstrapStandby(): Promise<void> {
    await this.hdfs("namenode", "-bootstrapStandby", "-nonInteractive", "-force");
  }

  async transitionToActive(serviceId: string): Promise<void> {
    await this.hdfs("haadmin", "-transitionToActive", serviceId);
  }

  /**
   * HA service state of a NameNode as reported by haadmin. A failing query
   * yields its output (usually a connection error) rather than throwing.
   */
  async serviceState(serviceId: string, retries: number | null = null): Promise<string> {
    const args: [string, ...string[]] = ["haadmin"];
    if (retries !== null) args.push(`-Dipc.client.connect.max.retries.on.timeouts=${retries}`);
    args.push("-getServiceState", serviceId);
    try {
      return (await this.hdfs(...args)).stdout.trim();
    } catch (err) {
      if (err instanceof CommandError) return err.output.trim();
      throw err;
    }
  }

  /** `hdfs dfs ...` */
  async dfs(...args: string[]): Promise<ExecResult> {
    return this.hdfs("dfs", ...args);
  }

  /**
   * Wait until HDFS has live DataNodes and has left safe mode. Failing
   * commands are expected while the NameNode comes up and are retried.
   */
  async waitForReady(timeoutSeconds = this.base.node.config.timeouts.hdfs_ready_seconds): Promise<void> {
    await pollUntil(
      "HDFS",
      async () => {
        try {
          const report = (await this.hdfs("dfsadmin", "-report")).stdout;
          const datanodes = report.includes("Datanodes available") || report.includes("Live datanodes");
          const safemode = (await this.hdfs("dfsadmin", "-safemode", "get")).stdout;
          return { done: datanodes && safemode.includes("Safe mode is OFF"), output: safemode };
        } catch (err) {
          if (err instanceof CommandError) return { done: false, output: err.output };
          throw err;
        }
      },
      this.base.pollOptions(timeoutSeconds),
    );
  }

  private async hadoopDaemon(action: "start" | "stop", daemon: HdfsDaemon): Promise<void> {
    await this.base.run(
      "hdfs",
      "sbin/hadoop-daemon.sh",
      ["--config", this.base.dist.path("hadoop_conf"), action, daemon],
      DURATION_TIMEOUTS.slow,
    );
  }

  private async hdfs(command: string, ...args: string[]): Promise<ExecResult> {
    return this.base.run("hdfs", "bin/hdfs", [command, ...args], DURATION_TIMEOUTS.long_running);
  }
}
