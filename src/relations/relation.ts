// Relation readiness and the data a node advertises to its peers. The data a peer
// unit has published is a flat string bag; how it travels between nodes is up to
// the caller, which hands it in through a RelationData.
import type { Spec } from "./spec.js";
import { parseSpec, specMatches } from "./spec.js";
import { SpecMismatchError } from "../errors.js";
import { logger } from "../logger.js";

export type UnitData = Readonly<Record<string, string>>;

/** A fixed spec, or a callback evaluated on every check (the spec can change once Java is installed). */
export type SpecSource = Spec | null | (() => Spec | null | Promise<Spec | null>);

export interface RelationData {
  /** Data published by each remote unit of a relation, keyed by unit name. */
  units(relation: string): Readonly<Record<string, UnitData>>;
}

export interface ProvideContext {
  /** Every relation the local node depends on is ready. */
  readonly allReady: boolean;
  readonly data: RelationData;
}

interface RelationBase {
  readonly name: string;
  readonly requiredKeys: readonly string[];
  readonly spec?: SpecSource;
}

export interface ProviderRelation extends RelationBase {
  readonly role: "provider";
  provide(ctx: ProvideContext): Promise<Record<string, string>>;
}

export interface ConsumerRelation extends RelationBase {
  readonly role: "consumer";
}

export type Relation = ProviderRelation | ConsumerRelation;

export async function resolveSpec(relation: Relation): Promise<Spec | null> {
  const source = relation.spec;
  const spec = typeof source === "function" ? await source() : source;
  if (!spec || Object.keys(spec).length === 0) return null;
  return spec;
}

/** Units that published every required key, plus `spec` when a local spec exists. */
export async function filteredData(relation: Relation, data: RelationData): Promise<Record<string, UnitData>> {
  const required = [...relation.requiredKeys];
  if ((await resolveSpec(relation)) && !required.includes("spec")) required.push("spec");
  const result: Record<string, UnitData> = {};
  for (const [unit, bag] of Object.entries(data.units(relation.name))) {
    if (required.every((key) => Object.hasOwn(bag, key))) result[unit] = bag;
  }
  return result;
}

/**
 * Ready once at least one unit has complete data. With a local spec, every
 * complete unit must also advertise a matching spec; a mismatch is an error,
 * not "not ready", since waiting will not fix it.
 */
export async function isReady(relation: Relation, data: RelationData): Promise<boolean> {
  const units = await filteredData(relation, data);
  if (Object.keys(units).length === 0) return false;
  const local = await resolveSpec(relation);
  if (!local) return true;
  for (const [unit, bag] of Object.entries(units)) {
    const remote = parseSpec(bag.spec, unit);
    if (!specMatches(local, remote)) {
      logger.error({ relation: relation.name, unit, local, remote }, "Spec mismatch");
      throw new SpecMismatchError(
        `Spec mismatch with related unit ${unit}: ${bag.spec} != ${JSON.stringify(local)}`,
        { relation: relation.name, unit, local, remote },
      );
    }
  }
  return true;
}

/** Data to publish on a relation: the provider's own keys plus the local spec. */
export async function provideData(relation: Relation, ctx: ProvideContext): Promise<Record<string, string>> {
  const data = relation.role === "provider" ? await relation.provide(ctx) : {};
  const spec = await resolveSpec(relation);
  if (spec) data.spec = JSON.stringify(spec);
  return data;
}

/** Relation data held in memory, filled in by whatever transport the caller uses. */
export class InMemoryRelationData implements RelationData {
  private readonly relations = new Map<string, Map<string, UnitData>>();

  static from(relations: Record<string, Record<string, UnitData>>): InMemoryRelationData {
    const data = new InMemoryRelationData();
    for (const [relation, units] of Object.entries(relations)) {
      for (const [unit, bag] of Object.entries(units)) data.setUnit(relation, unit, bag);
    }
    return data;
  }

  setUnit(relation: string, unit: string, bag: UnitData): void {
    let units = this.relations.get(relation);
    if (!units) {
      units = new Map();
      this.relations.set(relation, units);
    }
    units.set(unit, { ...bag });
  }

  removeUnit(relation: string, unit: string): void {
    this.relations.get(relation)?.delete(unit);
  }

  units(relation: string): Readonly<Record<string, UnitData>> {
    return Object.fromEntries(this.relations.get(relation) ?? []);
  }
}
