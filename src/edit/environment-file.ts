// Flat KEY=value editor for /etc/environment-style files.
// Unlike the property editor this regenerates the whole file, quoting every value.
import fs from "node:fs/promises";

const QUOTE_CHARS = " '\"";

function stripChars(value: string, chars: string): string {
  let start = 0;
  let end = value.length;
  while (start < end && chars.includes(value[start])) start++;
  while (end > start && chars.includes(value[end - 1])) end--;
  return value.slice(start, end);
}

/** Parse `KEY=value` lines. Blank lines, comments and lines without `=` are skipped. */
export function parseEnvironment(content: string): Map<string, string> {
  const env = new Map<string, string>();
  for (const rawLine of content.split("\n")) {
    const line = rawLine.trim();
    if (line === "" || line.startsWith("#")) continue;
    const eq = line.indexOf("=");
    if (eq < 0) continue;
    env.set(line.slice(0, eq).trim(), stripChars(line.slice(eq + 1), QUOTE_CHARS));
  }
  return env;
}

export function serializeEnvironment(env: ReadonlyMap<string, string>): string {
  return [...env].map(([key, value]) => `${key}="${value}"\n`).join("");
}

async function readIfExists(file: string): Promise<string> {
  try {
    return await fs.readFile(file, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return "";
    throw err;
  }
}

/**
 * Edit an environment file in place. The whole file is regenerated from the
 * final map on every exit path, with all values double-quoted.
 */
export async function editEnvironmentFile<T>(file: string, edit: (env: Map<string, string>) => T | Promise<T>): Promise<T> {
  const env = parseEnvironment(await readIfExists(file));
  try {
    return await edit(env);
  } finally {
    await fs.writeFile(file, serializeEnvironment(env), "utf-8");
  }
}

/**
 * The environment commands should run with: the file's values plus any
 * `*_proxy` variables of the current process, which the file does not carry.
 */
export async function readEtcEnv(file: string): Promise<Record<string, string>> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined && key.toLowerCase().endsWith("_proxy")) env[key] = value;
  }
  for (const [key, value] of parseEnvironment(await readIfExists(file))) {
    env[key] = value;
  }
  return env;
}
