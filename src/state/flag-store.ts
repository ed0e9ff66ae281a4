import fs from "node:fs/promises";
import path from "node:path";
import { ConfigError } from "../errors.js";
import { logger } from "../logger.js";

export type FlagValue = string | number | boolean;

/**
 * Durable per-node key/value state: one-time operation flags
 * (`hdfs.namenode.formatted`), recorded facts (`java.home`) and key ranges
 * (`etc_host.<ip>`). Backed by a JSON file that is rewritten after every write.
 *
 * Not locked: one orchestration process per node is assumed.
 */
export class FlagStore {
  private constructor(
    private readonly filePath: string,
    private readonly values: Map<string, FlagValue>,
  ) {}

  static async open(filePath: string): Promise<FlagStore> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return new FlagStore(filePath, new Map());
      throw err;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      throw new ConfigError(`State file ${filePath} is not valid JSON`);
    }
    if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
      throw new ConfigError(`State file ${filePath} must contain a JSON object`);
    }
    const values = new Map<string, FlagValue>();
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
        values.set(key, value);
      } else {
        logger.warn({ filePath, key }, "Ignoring non-scalar state entry");
      }
    }
    return new FlagStore(filePath, values);
  }

  get path(): string {
    return this.filePath;
  }

  get(key: string): FlagValue | undefined {
    return this.values.get(key);
  }

  getString(key: string): string | undefined {
    const value = this.values.get(key);
    return value === undefined ? undefined : String(value);
  }

  /** True only for a stored `true`. */
  flag(key: string): boolean {
    return this.values.get(key) === true;
  }

  async set(key: string, value: FlagValue): Promise<void> {
    this.values.set(key, value);
    await this.flush();
  }

  async unset(key: string): Promise<void> {
    if (this.values.delete(key)) await this.flush();
  }

  /** Insert or overwrite every entry, keys prefixed. */
  async update(entries: Record<string, FlagValue>, prefix = ""): Promise<void> {
    for (const [key, value] of Object.entries(entries)) {
      this.values.set(prefix + key, value);
    }
    await this.flush();
  }

  /** All entries under `prefix`, with the prefix stripped from their keys. */
  getRange(prefix: string): Record<string, FlagValue> {
    const result: Record<string, FlagValue> = {};
    for (const [key, value] of this.values) {
      if (key.startsWith(prefix)) result[key.slice(prefix.length)] = value;
    }
    return result;
  }

  async unsetRange(keys: string[], prefix = ""): Promise<void> {
    for (const key of keys) this.values.delete(prefix + key);
    await this.flush();
  }

  snapshot(): Record<string, FlagValue> {
    return Object.fromEntries(this.values);
  }

  /**
   * Run a one-time operation. Skipped when `flag` is already set; the flag
   * is set only after `op` resolves, so a failed run is retried next time.
   */
  async runOnce(flag: string, op: () => Promise<void>): Promise<boolean> {
    if (this.flag(flag)) {
      logger.debug({ flag }, "Already done, skipping");
      return false;
    }
    await op();
    await this.set(flag, true);
    return true;
  }

  private async flush(): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(this.snapshot(), null, 2) + "\n", "utf-8");
    await fs.rename(tmp, this.filePath);
  }
}
