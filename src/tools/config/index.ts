import { join } from "node:path";
import { z } from "zod";
import type { PluginContext } from "../context.js";
import { GATE_PARAMS, registerTool, success } from "../helpers.js";
import { editPropertyFile, readPropertyFile } from "../../edit/property-file.js";

// A bare file name inside the config dir; no path separators.
const ConfigFileSchema = z.string().regex(/^[A-Za-z0-9._-]+\.xml$/, "expected a property file name such as hdfs-site.xml");

export function registerConfigTools(ctx: PluginContext): void {
  // ── hadoop_config_read ──────────────────────────────────────────
  registerTool(ctx, {
    name: "hadoop_config_read",
    description: "Read properties from a Hadoop XML property file in the config dir (core-site.xml, hdfs-site.xml, yarn-site.xml, mapred-site.xml).",
    module: "config", riskLevel: "read-only", duration: "instant",
    inputSchema: z.object({
      file: ConfigFileSchema.describe("Property file name"),
      name: z.string().min(1).optional().describe("Return a single property"),
    }),
    annotations: { readOnlyHint: true, idempotentHint: true },
  }, async (args) => {
    const path = join(ctx.dist.path("hadoop_conf"), args.file);
    const props = await readPropertyFile(path);
    if (args.name) {
      return success("hadoop_config_read", ctx.targetHost, null, null, { file: path, name: args.name, value: props.get(args.name) ?? null });
    }
    return success("hadoop_config_read", ctx.targetHost, null, null, { file: path, properties: Object.fromEntries(props) }, {
      summary: `${props.size} properties`,
    });
  });

  // ── hadoop_config_edit ──────────────────────────────────────────
  registerTool(ctx, {
    name: "hadoop_config_edit",
    description: "Set or remove properties in a Hadoop XML property file. A null value removes the property; descriptions of changed properties are kept. Moderate risk.",
    module: "config", riskLevel: "moderate", duration: "instant",
    inputSchema: z.object({
      file: ConfigFileSchema.describe("Property file name"),
      set: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])).describe("Property name → value; null removes"),
      ...GATE_PARAMS,
    }),
    annotations: { destructiveHint: false, idempotentHint: true },
  }, async (args) => {
    const path = join(ctx.dist.path("hadoop_conf"), args.file);
    const gate = ctx.safetyGate.check({
      toolName: "hadoop_config_edit", toolRiskLevel: "moderate", targetHost: ctx.targetHost,
      command: `edit ${path}`, description: `Change ${Object.keys(args.set).length} properties in ${args.file}`,
      confirmed: args.confirmed, dryRun: args.dry_run,
    });
    if (gate) return gate;

    const current = await readPropertyFile(path);
    const added: string[] = [];
    const modified: string[] = [];
    const removed: string[] = [];
    for (const [name, value] of Object.entries(args.set)) {
      const old = current.get(name);
      if (value === null) {
        if (old !== undefined) removed.push(name);
      } else if (old === undefined) {
        added.push(name);
      } else if (old !== String(value)) {
        modified.push(name);
      }
    }
    const changes = { added, modified, removed };
    if (args.dry_run) return success("hadoop_config_edit", ctx.targetHost, null, null, { file: path, changes }, { dry_run: true });

    const start = performance.now();
    await editPropertyFile(path, (props) => {
      props.assign(args.set);
    });
    return success("hadoop_config_edit", ctx.targetHost, Math.round(performance.now() - start), null, { file: path, changes });
  });
}
