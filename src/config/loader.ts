// Config loader: reads ~/.config/hadoop-ha/config.yaml and validates it against PluginConfigSchema.
// On first run (no config file), writes DEFAULT_CONFIG_YAML and returns firstRun: true.
// Unset keys take their schema defaults, so users only write what they override.
import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import { PluginConfigSchema } from "../types/config.js";
import type { PluginConfig } from "../types/config.js";
import { ConfigError } from "../errors.js";
import { logger } from "../logger.js";

const DEFAULT_CONFIG_DIR = join(homedir(), ".config", "hadoop-ha");
const DEFAULT_CONFIG_PATH = join(DEFAULT_CONFIG_DIR, "config.yaml");

/** Default config YAML written on first run. */
const DEFAULT_CONFIG_YAML = `# hadoop-ha configuration
# Generated automatically on first run. All values shown are defaults.

dist_file: /etc/hadoop-ha/dist.yaml
state_file: /var/lib/hadoop-ha/state.json
environment_file: /etc/environment
hosts_file: /etc/hosts

# HDFS nameservice id
cluster_name: hadoop
# Defaults to the machine hostname
node_id: null
# Script printing JAVA_HOME and the Java version on two lines
java_installer: null

# Values for {config[...]} placeholders in dist.yaml
options:
  dfs_replication: 3
  dfs_blocksize: 134217728

timeouts:
  hdfs_ready_seconds: 400
  connect_seconds: 60
  poll_interval_seconds: 2
  restart_delay_seconds: 30
  start_settle_seconds: 30
  ha_connect_retries: null

safety:
  confirmation_threshold: high
  dry_run_bypass_confirmation: true

errors:
  command_timeout_ceiling: 0

# Distro override (auto-detected if omitted)
# distro:
#   family: debian
#   firewall_backend: ufw
`;

export interface ConfigResult {
  config: PluginConfig;
  configPath: string;
  firstRun: boolean;
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    logger.info({ configPath }, "No config file found, generating defaults (first run)");
    try {
      mkdirSync(dirname(configPath), { recursive: true });
      writeFileSync(configPath, DEFAULT_CONFIG_YAML, "utf-8");
    } catch (err) {
      logger.warn({ configPath, error: err }, "Could not write default config file");
    }
    return { config: PluginConfigSchema.parse({}), configPath, firstRun: true };
  }

  const raw = readFileSync(configPath, "utf-8");
  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new ConfigError(`Failed to parse ${configPath}`, { cause: err instanceof Error ? err.message : String(err) });
  }
  const result = PluginConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in ${configPath}`, {
      issues: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
  }
  return { config: result.data, configPath, firstRun: false };
}
