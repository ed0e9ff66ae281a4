import { z } from "zod";
import type { PluginContext } from "../context.js";
import type { Relation } from "../../relations/relation.js";
import { InMemoryRelationData, filteredData, isReady } from "../../relations/relation.js";
import {
  dataNode, hadoopPlugin, nameNode, nameNodeMaster, nameNodePeers, nodeManager, resourceManager, resourceManagerMaster,
} from "../../relations/catalog.js";
import { registerTool, success } from "../helpers.js";

const RELATIONS = [
  "namenode", "namenode-master", "namenode-peers", "resourcemanager", "resourcemanager-master",
  "datanode", "nodemanager", "hadoop-plugin",
] as const;

type RelationId = (typeof RELATIONS)[number];

/** The consumer view of a relation, checked against this node's spec where the relation carries one. */
export function relationView(ctx: PluginContext, id: RelationId): Relation {
  const spec = () => ctx.base.spec();
  switch (id) {
    case "namenode": return nameNode({ spec });
    case "namenode-master": return nameNodeMaster({ spec });
    case "namenode-peers": return nameNodePeers(spec);
    case "resourcemanager": return resourceManager({ spec });
    case "resourcemanager-master": return resourceManagerMaster({ spec });
    case "datanode": return dataNode();
    case "nodemanager": return nodeManager();
    case "hadoop-plugin": return hadoopPlugin();
  }
}

export function registerRelationTools(ctx: PluginContext): void {
  registerTool(ctx, {
    name: "relation_check",
    description: "Evaluate a relation against the data remote units published: which units are complete, and whether the relation is ready. A spec mismatch is reported as a validation error.",
    module: "relations", riskLevel: "read-only", duration: "instant",
    inputSchema: z.object({
      relation: z.enum(RELATIONS),
      units: z.record(z.record(z.string())).describe("Remote unit name → data that unit published"),
    }),
    annotations: { readOnlyHint: true, idempotentHint: true },
  }, async (args) => {
    const relation = relationView(ctx, args.relation);
    const data = InMemoryRelationData.from({ [relation.name]: args.units });
    const complete = Object.keys(await filteredData(relation, data));
    const ready = await isReady(relation, data);
    return success("relation_check", ctx.targetHost, null, null, {
      relation: args.relation,
      wire_name: relation.name,
      required_keys: relation.requiredKeys,
      complete_units: complete,
      ready,
    });
  });
}
