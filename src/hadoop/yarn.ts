import fs from "node:fs/promises";
import { setTimeout as sleep } from "node:timers/promises";
import type { HadoopBase } from "./hadoop-base.js";
import { execOrThrow } from "../execution/executor.js";
import { editPropertyFile } from "../edit/property-file.js";
import { jps } from "./process.js";
import { DURATION_TIMEOUTS } from "../types/risk.js";
import { logger } from "../logger.js";

export type YarnDaemon = "resourcemanager" | "nodemanager" | "historyserver";

export const YARN_PROCESS_NAMES: Record<YarnDaemon, string> = {
  resourcemanager: "ResourceManager",
  nodemanager: "NodeManager",
  historyserver: "JobHistoryServer",
};

export const YARN_FLAGS = { demoInstalled: "yarn.client.demo.installed" } as const;

/** Where a YARN client or NodeManager finds the ResourceManager and JobHistory server. */
export interface ResourceManagerEndpoint {
  host: string;
  port: number;
  historyHttp: number;
  historyIpc: number;
}

export class YARN {
  constructor(readonly base: HadoopBase) {}

  async start(daemon: YarnDaemon): Promise<boolean> {
    if ((await jps(this.base.node.executor, YARN_PROCESS_NAMES[daemon])).length > 0) {
      logger.debug({ daemon }, "Daemon already running");
      return false;
    }
    logger.info({ daemon }, "Starting YARN daemon");
    await this.daemon("start", daemon);
    return true;
  }

  async stop(daemon: YarnDaemon): Promise<void> {
    logger.info({ daemon }, "Stopping YARN daemon");
    await this.daemon("stop", daemon);
  }

  async restart(daemon: YarnDaemon): Promise<void> {
    await this.stop(daemon);
    await sleep(this.base.node.config.timeouts.restart_delay_seconds * 1000);
    await this.start(daemon);
  }

  /** This node as ResourceManager and JobHistory server. */
  localEndpoint(): ResourceManagerEndpoint {
    const dist = this.base.dist;
    return {
      host: this.base.node.nodeId,
      port: dist.requirePort("resourcemanager"),
      historyHttp: dist.requirePort("jh_webapp_http"),
      historyIpc: dist.requirePort("jobhistory"),
    };
  }

  async configureYarnBase(endpoint: ResourceManagerEndpoint | null): Promise<void> {
    await editPropertyFile(this.base.confFile("yarn-site.xml"), (props) => {
      props.set("yarn.nodemanager.aux-services", "mapreduce_shuffle");
      props.set("yarn.nodemanager.vmem-check-enabled", "false");
      if (endpoint) {
        props.set("yarn.resourcemanager.hostname", endpoint.host);
        props.set("yarn.resourcemanager.address", `${endpoint.host}:${endpoint.port}`);
        props.set("yarn.log.server.url", `${endpoint.host}:${endpoint.historyHttp}/jobhistory/logs/`);
      }
    });
    await editPropertyFile(this.base.confFile("mapred-site.xml"), (props) => {
      if (endpoint) {
        props.set("mapreduce.jobhistory.address", `${endpoint.host}:${endpoint.historyIpc}`);
        props.set("mapreduce.jobhistory.webapp.address", `${endpoint.host}:${endpoint.historyHttp}`);
      }
      props.set("mapreduce.framework.name", "yarn");
      props.set("mapreduce.jobhistory.intermediate-done-dir", "/mr-history/tmp");
      props.set("mapreduce.jobhistory.done-dir", "/mr-history/done");
      props.set("mapreduce.map.output.compress", "true");
      props.set("mapred.map.output.compress.codec", "org.apache.hadoop.io.compress.SnappyCodec");
      props.set(
        "mapreduce.application.classpath",
        [
          "$HADOOP_HOME/share/hadoop/mapreduce/*",
          "$HADOOP_HOME/share/hadoop/mapreduce/lib/*",
          "$HADOOP_HOME/share/hadoop/tools/lib/*",
        ].join(","),
      );
    });
  }

  async configureResourceManager(): Promise<void> {
    await this.configureYarnBase(this.localEndpoint());
    const webPort = this.base.dist.requirePort("rm_webapp_http");
    await editPropertyFile(this.base.confFile("yarn-site.xml"), (props) => {
      props.set("yarn.resourcemanager.webapp.address", `0.0.0.0:${webPort}`);
    });
  }

  async configureJobHistory(): Promise<void> {
    const endpoint = this.localEndpoint();
    await this.configureYarnBase(endpoint);
    // Listen on every interface.
    await editPropertyFile(this.base.confFile("mapred-site.xml"), (props) => {
      props.set("mapreduce.jobhistory.address", `0.0.0.0:${endpoint.historyIpc}`);
      props.set("mapreduce.jobhistory.webapp.address", `0.0.0.0:${endpoint.historyHttp}`);
      props.set("mapreduce.jobhistory.intermediate-done-dir", "/mr-history/tmp");
      props.set("mapreduce.jobhistory.done-dir", "/mr-history/done");
    });
  }

  async configureNodeManager(endpoint: ResourceManagerEndpoint): Promise<void> {
    await this.configureYarnBase(endpoint);
  }

  async configureClient(endpoint: ResourceManagerEndpoint): Promise<void> {
    await this.configureYarnBase(endpoint);
  }

  /** Install the TeraSort demo script for `user`, once. */
  async installDemo(source: string, user = "ubuntu"): Promise<boolean> {
    const target = `/home/${user}/terasort.sh`;
    return this.base.store.runOnce(YARN_FLAGS.demoInstalled, async () => {
      await fs.copyFile(source, target);
      await fs.chmod(target, 0o755);
      await execOrThrow(this.base.node.executor, { argv: ["sudo", "chown", `${user}:hadoop`, target] }, DURATION_TIMEOUTS.instant);
    });
  }

  /** Rewrite the slaves file and have a running ResourceManager pick it up. */
  async registerSlaves(slaves: readonly string[]): Promise<void> {
    await this.base.registerSlaves(slaves);
    if ((await jps(this.base.node.executor, YARN_PROCESS_NAMES.resourcemanager)).length > 0) {
      await this.base.run("mapred", "bin/yarn", ["rmadmin", "-refreshNodes"]);
    }
  }

  private async daemon(action: "start" | "stop", daemon: YarnDaemon): Promise<void> {
    const conf = this.base.dist.path("hadoop_conf");
    if (daemon === "historyserver") {
      await this.base.run("mapred", "sbin/mr-jobhistory-daemon.sh", ["--config", conf, action, daemon]);
    } else {
      await this.base.run("yarn", "sbin/yarn-daemon.sh", ["--config", conf, action, daemon]);
    }
  }
}
