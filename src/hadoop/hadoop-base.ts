// Shared installation and configuration steps for every Hadoop role on a node.
import fs from "node:fs/promises";
import { join } from "node:path";
import type { DistConfig, Provisioner } from "../dist/dist-config.js";
import type { Executor, ExecResult } from "../execution/executor.js";
import { execOrThrow } from "../execution/executor.js";
import type { DistroCommands } from "../distro/commands/interface.js";
import type { DistroContext } from "../types/distro.js";
import type { PluginConfig } from "../types/config.js";
import type { FlagStore } from "../state/flag-store.js";
import type { Spec } from "../relations/spec.js";
import type { PollOptions } from "./wait.js";
import { DURATION_TIMEOUTS } from "../types/risk.js";
import { editEnvironmentFile, readEtcEnv } from "../edit/environment-file.js";
import { reEditInPlace } from "../edit/line-pattern.js";
import { manageEtcHosts, resolvePrivateAddress, updateKvHosts } from "../hosts/etc-hosts.js";
import { runAs } from "./process.js";
import { ConfigError } from "../errors.js";
import { logger } from "../logger.js";

export const BASE_FLAGS = {
  installed: "hadoop.base.installed",
  javaHome: "java.home",
  javaVersion: "java.version",
  javaRelease: "java.version.release",
} as const;

/** Everything a Hadoop service needs from the node it runs on. */
export interface NodeContext extends Provisioner {
  readonly dist: DistConfig;
  readonly executor: Executor;
  readonly commands: DistroCommands;
  readonly distro: DistroContext;
  readonly store: FlagStore;
  readonly config: PluginConfig;
  /** Hostname this node is known by in the cluster. */
  readonly nodeId: string;
}

export interface JavaInfo {
  javaHome: string;
  version: string;
  release: string;
}

export interface InstallOptions {
  force?: boolean;
  /** Private address to record for this node in the hosts file. */
  privateAddress?: string;
}

export class HadoopBase {
  private arch: string | undefined;

  constructor(readonly node: NodeContext) {}

  get dist(): DistConfig {
    return this.node.dist;
  }

  get store(): FlagStore {
    return this.node.store;
  }

  /** Path of a file in the Hadoop configuration directory. */
  confFile(name: string): string {
    return join(this.dist.path("hadoop_conf"), name);
  }

  /** Polling parameters for a wait of `timeoutSeconds`. */
  pollOptions(timeoutSeconds: number): PollOptions {
    return {
      timeoutMs: timeoutSeconds * 1000,
      intervalMs: this.node.config.timeouts.poll_interval_seconds * 1000,
    };
  }

  async cpuArch(): Promise<string> {
    if (this.arch === undefined) {
      const result = await execOrThrow(this.node.executor, { argv: ["uname", "-p"] }, DURATION_TIMEOUTS.instant);
      this.arch = result.stdout.trim();
    }
    return this.arch;
  }

  /** Interop spec of this node; null until Java has been installed. */
  async spec(): Promise<Spec | null> {
    const java = this.store.getString(BASE_FLAGS.javaVersion);
    if (!java) return null;
    return {
      vendor: this.dist.vendor,
      hadoop: this.dist.hadoopVersion,
      java,
      arch: await this.cpuArch(),
    };
  }

  /** The part of the spec a client without Java still has to agree on. */
  clientSpec(): Spec {
    return { hadoop: this.dist.hadoopVersion };
  }

  isInstalled(): boolean {
    return this.store.flag(BASE_FLAGS.installed);
  }

  /** Returns false when the base was already installed and `force` was not given. */
  async install(options: InstallOptions = {}): Promise<boolean> {
    if (!options.force && this.isInstalled()) {
      logger.debug("Hadoop base already installed");
      return false;
    }
    logger.info({ vendor: this.dist.vendor, version: this.dist.hadoopVersion }, "Installing Hadoop base");
    if (options.privateAddress) await this.configureHostsFile(options.privateAddress);
    await this.dist.materialize(this.node);
    await this.installJava();
    await this.setupHadoopConfig();
    await this.configureHadoop();
    await this.store.set(BASE_FLAGS.installed, true);
    logger.info("Hadoop base installed");
    return true;
  }

  /**
   * Map this node's private address to its node id in the hosts file and set
   * the hostname to match; Hadoop daemons resolve their own hostname at startup.
   */
  async configureHostsFile(privateAddress: string): Promise<void> {
    const ip = await resolvePrivateAddress(privateAddress);
    await updateKvHosts(this.store, { [ip]: this.node.nodeId });
    await manageEtcHosts(this.store, this.node.config.hosts_file);
    await execOrThrow(
      this.node.executor,
      { argv: ["sudo", "hostnamectl", "set-hostname", this.node.nodeId] },
      DURATION_TIMEOUTS.quick,
    );
  }

  /**
   * Run the configured Java installer. It must be idempotent and print exactly
   * two lines: JAVA_HOME and the Java version (`1.8.0_91` style).
   */
  async installJava(): Promise<JavaInfo> {
    const installer = this.node.config.java_installer;
    if (!installer) throw new ConfigError("java_installer is not configured");
    const env = await readEtcEnv(this.node.config.environment_file);
    const result = await execOrThrow(this.node.executor, { argv: [installer], env }, DURATION_TIMEOUTS.long_running);
    const lines = result.stdout.trim().split(/\r?\n/);
    if (lines.length !== 2) {
      throw new ConfigError(`Unexpected output from java installer: ${result.stdout}`, { installer });
    }
    const [javaHome, javaVersion] = lines.map((l) => l.trim());
    const sep = javaVersion.indexOf("_");
    const version = sep < 0 ? javaVersion : javaVersion.slice(0, sep);
    const release = sep < 0 ? "" : javaVersion.slice(sep + 1);
    await this.store.update({
      [BASE_FLAGS.javaHome]: javaHome,
      [BASE_FLAGS.javaVersion]: version,
      [BASE_FLAGS.javaRelease]: release,
    });
    logger.info({ javaHome, version, release }, "Java installed");
    return { javaHome, version, release };
  }

  /** Replace the config dir with a fresh copy of the distribution's defaults. */
  async setupHadoopConfig(): Promise<void> {
    const defaults = join(this.dist.path("hadoop"), "etc", "hadoop");
    const conf = this.dist.path("hadoop_conf");
    await fs.rm(conf, { recursive: true, force: true });
    await fs.cp(defaults, conf, { recursive: true });
    await fs.rm(join(conf, "slaves"), { force: true });
    const mapredSite = join(conf, "mapred-site.xml");
    try {
      await fs.access(mapredSite);
    } catch {
      await fs.copyFile(join(conf, "mapred-site.xml.template"), mapredSite);
    }
  }

  /** Point the login environment and hadoop-env.sh at this install. */
  async configureHadoop(): Promise<void> {
    const javaHome = this.store.getString(BASE_FLAGS.javaHome);
    if (!javaHome) throw new ConfigError("Java is not installed; java.home is not recorded");
    const hadoopHome = this.dist.path("hadoop");
    const javaBin = join(javaHome, "bin");
    const hadoopBin = join(hadoopHome, "bin");
    const hadoopSbin = join(hadoopHome, "sbin");

    await editEnvironmentFile(this.node.config.environment_file, (env) => {
      const path = (env.get("PATH") ?? "").split(":").filter(Boolean);
      // The selected Java must win over any system one.
      if (!path.includes(javaBin)) path.unshift(javaBin);
      if (!path.includes(hadoopBin)) path.push(hadoopBin);
      if (!path.includes(hadoopSbin)) path.push(hadoopSbin);
      env.set("JAVA_HOME", javaHome);
      env.set("PATH", path.join(":"));
      env.set("HADOOP_LIBEXEC_DIR", join(hadoopHome, "libexec"));
      env.set("HADOOP_INSTALL", hadoopHome);
      env.set("HADOOP_HOME", hadoopHome);
      env.set("HADOOP_COMMON_HOME", hadoopHome);
      env.set("HADOOP_HDFS_HOME", hadoopHome);
      env.set("HADOOP_MAPRED_HOME", hadoopHome);
      env.set("HADOOP_MAPRED_LOG_DIR", this.dist.path("mapred_log_dir"));
      env.set("HADOOP_YARN_HOME", hadoopHome);
      env.set("HADOOP_CONF_DIR", this.dist.path("hadoop_conf"));
      env.set("YARN_LOG_DIR", this.dist.path("yarn_log_dir"));
      env.set("HADOOP_LOG_DIR", this.dist.path("hdfs_log_dir"));
    });

    await reEditInPlace(this.confFile("hadoop-env.sh"), {
      "export JAVA_HOME *=.*": `export JAVA_HOME=${javaHome}`,
    });
  }

  /** Rewrite the slaves file read by the start/stop scripts and node refreshes. */
  async registerSlaves(slaves: readonly string[]): Promise<void> {
    const file = this.confFile("slaves");
    const lines = ["# DO NOT EDIT", "# This file is automatically managed by hadoop-ha", ...slaves];
    await fs.writeFile(file, lines.map((l) => `${l}\n`).join(""), "utf-8");
    const conf = this.dist.dirs.hadoop_conf;
    await execOrThrow(
      this.node.executor,
      { argv: ["sudo", "chown", `${conf.owner ?? "root"}:${conf.group ?? "root"}`, file] },
      DURATION_TIMEOUTS.instant,
    );
  }

  /**
   * Run a Hadoop command (`bin/hdfs`, `sbin/hadoop-daemon.sh`, ...) from the
   * install dir as `user`. Throws CommandError on failure.
   */
  async run(user: string, command: string, args: readonly string[], timeoutMs = DURATION_TIMEOUTS.slow): Promise<ExecResult> {
    return runAs(this.node.executor, user, [join(this.dist.path("hadoop"), command), ...args], {
      environmentFile: this.node.config.environment_file,
      timeoutMs,
    });
  }

  /** Open the ports exposed by `service`. Returns the ports touched. */
  async openPorts(service: string): Promise<number[]> {
    return this.setPorts(service, "open");
  }

  async closePorts(service: string): Promise<number[]> {
    return this.setPorts(service, "close");
  }

  private async setPorts(service: string, action: "open" | "close"): Promise<number[]> {
    const ports = this.dist.exposedPorts(service);
    if (this.node.distro.firewall_backend === "none") {
      logger.debug({ service, ports }, "No firewall backend, leaving ports alone");
      return [];
    }
    for (const port of ports) {
      const rule = { port, protocol: "tcp" as const, comment: service };
      const command = action === "open" ? this.node.commands.firewallOpenPort(rule) : this.node.commands.firewallClosePort(rule);
      logger.info({ service, port, action }, "Updating firewall");
      await execOrThrow(this.node.executor, command, DURATION_TIMEOUTS.quick);
    }
    return ports;
  }

  /** Private key used for sshfence. */
  sshPrivateKey(user: string): string {
    return `/home/${user}/.ssh/id_rsa`;
  }
}
