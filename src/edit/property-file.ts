// Structured editor for Hadoop XML property files (core-site.xml, hdfs-site.xml, ...).
// editPropertyFile() is a scoped session: parse, hand out a mutable PropertyMap, then
// diff against the original and rewrite on every exit path.
import fs from "node:fs/promises";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import { ConfigError } from "../errors.js";
import { logger } from "../logger.js";

/** One on-disk property record. */
export interface PropertyEntry {
  readonly name: string;
  readonly value: string;
  readonly description?: string;
  /** Other child elements (`final`, `source`, ...) in document order, kept as-is. */
  readonly extra?: readonly (readonly [tag: string, text: string])[];
}

/** Values callers may assign. `null` is the "no value" marker and removes the entry. */
export type PropertyValue = string | number | boolean | null;

const INDENT = "    ";

const parser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  trimValues: true,
  htmlEntities: true,
  isArray: (_tagName: string, jPath: string) => jPath === "configuration.property",
});

function textOf(node: unknown): string | undefined {
  if (node === undefined || node === null) return undefined;
  if (typeof node === "string") return node;
  if (typeof node === "number" || typeof node === "boolean") return String(node);
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Parse property-file XML into ordered entries. Empty input is an empty set. */
export function parsePropertyXml(xml: string, source = "<input>"): PropertyEntry[] {
  if (xml.trim() === "") return [];
  const valid = XMLValidator.validate(xml);
  if (valid !== true) {
    throw new ConfigError(`Malformed XML in ${source}: ${valid.err.msg}`, { line: valid.err.line });
  }
  const doc: unknown = parser.parse(xml);
  if (!isRecord(doc) || !("configuration" in doc)) {
    throw new ConfigError(`${source} has no <configuration> root element`);
  }
  const root = doc.configuration;
  if (!isRecord(root)) return [];
  const rawProps = root.property;
  if (!Array.isArray(rawProps)) return [];

  const entries: PropertyEntry[] = [];
  const seen = new Set<string>();
  for (const raw of rawProps) {
    const name = isRecord(raw) ? textOf(raw.name) : undefined;
    if (!isRecord(raw) || !name) {
      throw new ConfigError(`${source} contains a <property> without a <name>`);
    }
    if (seen.has(name)) {
      throw new ConfigError(`${source} defines property '${name}' more than once`);
    }
    seen.add(name);
    const description = textOf(raw.description);
    const extra = extraChildren(raw, name, source);
    entries.push({
      name,
      value: textOf(raw.value) ?? "",
      ...(description !== undefined && description !== "" ? { description } : {}),
      ...(extra.length > 0 ? { extra } : {}),
    });
  }
  return entries;
}

const KNOWN_CHILDREN = new Set(["name", "value", "description", "#text"]);

function extraChildren(raw: Record<string, unknown>, name: string, source: string): [string, string][] {
  const extra: [string, string][] = [];
  for (const [tag, node] of Object.entries(raw)) {
    if (KNOWN_CHILDREN.has(tag)) continue;
    for (const item of Array.isArray(node) ? node : [node]) {
      const text = textOf(item);
      if (text === undefined) {
        throw new ConfigError(`${source}: property '${name}' has a nested <${tag}> element`);
      }
      extra.push([tag, text]);
    }
  }
  return extra;
}

function escapeXml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

/**
 * Canonical rendering: 4-space indentation, one element per line, trailing newline.
 * Extra children follow name, value and description.
 */
export function serializePropertyXml(entries: readonly PropertyEntry[]): string {
  const lines = ['<?xml version="1.0"?>', "<configuration>"];
  for (const entry of entries) {
    lines.push(`${INDENT}<property>`);
    lines.push(`${INDENT}${INDENT}<name>${escapeXml(entry.name)}</name>`);
    lines.push(`${INDENT}${INDENT}<value>${escapeXml(entry.value)}</value>`);
    if (entry.description !== undefined) {
      lines.push(`${INDENT}${INDENT}<description>${escapeXml(entry.description)}</description>`);
    }
    for (const [tag, text] of entry.extra ?? []) {
      lines.push(`${INDENT}${INDENT}<${tag}>${escapeXml(text)}</${tag}>`);
    }
    lines.push(`${INDENT}</property>`);
  }
  lines.push("</configuration>");
  return lines.join("\n") + "\n";
}

/** Mutable name → value view handed to an edit session. */
export class PropertyMap {
  private readonly values: Map<string, string>;

  constructor(entries: readonly PropertyEntry[]) {
    this.values = new Map(entries.map((e) => [e.name, e.value]));
  }

  get(name: string): string | undefined {
    return this.values.get(name);
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  set(name: string, value: PropertyValue): this {
    if (value === null) {
      this.values.delete(name);
    } else {
      this.values.set(name, String(value));
    }
    return this;
  }

  /** Set several properties at once; `null` values delete. */
  assign(values: Record<string, PropertyValue>): this {
    for (const [name, value] of Object.entries(values)) this.set(name, value);
    return this;
  }

  delete(name: string): boolean {
    return this.values.delete(name);
  }

  keys(): string[] {
    return [...this.values.keys()];
  }

  entries(): [string, string][] {
    return [...this.values.entries()];
  }

  get size(): number {
    return this.values.size;
  }
}

/**
 * Merge the final view back onto the original entries: removed names are
 * dropped, changed values keep their description, added names are appended
 * without one, everything else passes through untouched.
 */
export function mergeProperties(original: readonly PropertyEntry[], props: PropertyMap): PropertyEntry[] {
  const originalNames = new Set(original.map((e) => e.name));
  const merged: PropertyEntry[] = [];
  for (const entry of original) {
    const value = props.get(entry.name);
    if (value === undefined) continue;
    merged.push(value === entry.value ? entry : { ...entry, value });
  }
  for (const [name, value] of props.entries()) {
    if (!originalNames.has(name)) merged.push({ name, value });
  }
  return merged;
}

async function readIfExists(file: string): Promise<string> {
  try {
    return await fs.readFile(file, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return "";
    throw err;
  }
}

/** Read-only view of a property file. A missing file reads as empty. */
export async function readPropertyFile(file: string): Promise<Map<string, string>> {
  const entries = parsePropertyXml(await readIfExists(file), file);
  return new Map(entries.map((e) => [e.name, e.value]));
}

/**
 * Edit a property file in place.
 *
 *     await editPropertyFile(hdfsSite, (props) => {
 *       props.set("dfs.replication", 3);
 *       props.delete("dfs.obsolete");
 *     });
 *
 * The file is rewritten even when `edit` throws; the error is rethrown afterwards.
 * Not locked: concurrent editors of one file are last-writer-wins.
 */
export async function editPropertyFile<T>(file: string, edit: (props: PropertyMap) => T | Promise<T>): Promise<T> {
  const original = parsePropertyXml(await readIfExists(file), file);
  const props = new PropertyMap(original);
  try {
    return await edit(props);
  } finally {
    const merged = mergeProperties(original, props);
    await fs.writeFile(file, serializePropertyXml(merged), "utf-8");
    logger.debug({ file, properties: merged.length }, "Property file written");
  }
}
