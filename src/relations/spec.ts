import { z } from "zod";
import { SpecMismatchError } from "../errors.js";

/**
 * Everything about a node's environment that affects interoperability with a
 * peer: vendor, Hadoop version, Java version, CPU architecture.
 */
export type Spec = Readonly<Record<string, string>>;

const SpecSchema = z.record(z.string());

/**
 * True iff every key of `local` is present in `remote` with an equal value.
 * `remote` may carry extra keys, so a consumer can require a subset of what a
 * provider advertises but never the reverse.
 */
export function specMatches(local: Spec, remote: Spec): boolean {
  return Object.entries(local).every(([key, value]) => Object.hasOwn(remote, key) && remote[key] === value);
}

/** Decode an advertised spec. Anything but a JSON object of strings is a mismatch. */
export function parseSpec(json: string, unit?: string): Spec {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    throw new SpecMismatchError(`Unparsable spec${unit ? ` from related unit ${unit}` : ""}: ${json}`, { unit, spec: json });
  }
  const parsed = SpecSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SpecMismatchError(`Malformed spec${unit ? ` from related unit ${unit}` : ""}: ${json}`, { unit, spec: json });
  }
  return parsed.data;
}
