import { z } from "zod";

const RiskLevelSchema = z.enum(["read-only", "low", "moderate", "high", "critical"]);

/** External option values: interpolated into `{config[...]}` placeholders and read by service configuration. */
export const OptionValueSchema = z.union([z.string(), z.number(), z.boolean()]);
export type OptionValue = z.infer<typeof OptionValueSchema>;

/**
 * Full plugin configuration. Every field has a default, so an empty or
 * partial config.yaml parses into a complete object.
 */
export const PluginConfigSchema = z.object({
  dist_file: z.string().min(1).default("/etc/hadoop-ha/dist.yaml"),
  state_file: z.string().min(1).default("/var/lib/hadoop-ha/state.json"),
  environment_file: z.string().min(1).default("/etc/environment"),
  hosts_file: z.string().min(1).default("/etc/hosts"),
  cluster_name: z.string().min(1).default("hadoop"),
  // null = use the machine hostname
  node_id: z.string().min(1).nullable().default(null),
  java_installer: z.string().min(1).nullable().default(null),
  options: z.record(OptionValueSchema).default({
    dfs_replication: 3,
    dfs_blocksize: 134217728,
  }),
  timeouts: z.object({
    hdfs_ready_seconds: z.number().positive().default(400),
    connect_seconds: z.number().positive().default(60),
    poll_interval_seconds: z.number().positive().default(2),
    restart_delay_seconds: z.number().nonnegative().default(30),
    start_settle_seconds: z.number().nonnegative().default(30),
    ha_connect_retries: z.number().int().nonnegative().nullable().default(null),
  }).default({}),
  safety: z.object({
    confirmation_threshold: RiskLevelSchema.default("high"),
    dry_run_bypass_confirmation: z.boolean().default(true),
  }).default({}),
  errors: z.object({
    // Seconds; 0 = use per-category timeouts
    command_timeout_ceiling: z.number().nonnegative().default(0),
  }).default({}),
  distro: z.object({
    family: z.enum(["debian", "rhel"]).optional(),
    firewall_backend: z.enum(["ufw", "firewalld", "none"]).optional(),
  }).optional(),
});

export type PluginConfig = z.infer<typeof PluginConfigSchema>;
export type TimeoutConfig = PluginConfig["timeouts"];
