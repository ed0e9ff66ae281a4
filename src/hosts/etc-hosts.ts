// /etc/hosts management. Host entries learned from peers are kept in the flag store
// under `etc_host.<ip>`; the hosts file is regenerated from that range, leaving every
// line without the managed marker untouched.
import fs from "node:fs/promises";
import { lookup } from "node:dns/promises";
import type { FlagStore } from "../state/flag-store.js";
import { ConfigError } from "../errors.js";
import { logger } from "../logger.js";

export const MANAGED_MARKER = "# HADOOP-HA MANAGED";
const KV_PREFIX = "etc_host.";
const IPV4 = /^\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}/;
const CONTAINS_IPV4 = /\d{1,3}[-.]\d{1,3}[-.]\d{1,3}[-.]\d{1,3}/;

/** IP → hostname entries recorded in the store. */
export function getKvHosts(store: FlagStore): Record<string, string> {
  const hosts: Record<string, string> = {};
  for (const [ip, name] of Object.entries(store.getRange(KV_PREFIX))) {
    if (typeof name === "string") hosts[ip] = name;
  }
  return hosts;
}

export async function updateKvHosts(store: FlagStore, ipsToNames: Record<string, string>): Promise<void> {
  await store.update(ipsToNames, KV_PREFIX);
}

/** Record one host, dropping any other IP previously recorded for it. */
export async function updateKvHost(store: FlagStore, ip: string, host: string): Promise<void> {
  await removeKvHosts(store, [host]);
  await store.update({ [ip]: host }, KV_PREFIX);
}

export async function removeKvHosts(store: FlagStore, hosts: readonly string[]): Promise<void> {
  const ips = Object.entries(getKvHosts(store))
    .filter(([, name]) => hosts.includes(name))
    .map(([ip]) => ip);
  await store.unsetRange(ips, KV_PREFIX);
}

/**
 * Rewrite the managed entries of a hosts file. Each hostname gets one line;
 * an entry whose address is not IPv4 is written commented out.
 */
export async function updateEtcHosts(file: string, ipsToNames: Record<string, string>): Promise<void> {
  let content = "";
  try {
    content = await fs.readFile(file, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== "ENOENT") throw err;
  }
  const lines = content === "" ? [] : content.replace(/\n$/, "").split("\n");
  const kept = lines.filter((line) => !line.includes(MANAGED_MARKER));

  const managed = new Map<string, string>();
  for (const [ip, name] of Object.entries(ipsToNames)) managed.set(name, ip);
  for (const [name, ip] of managed) {
    const line = `${ip} ${name}  ${MANAGED_MARKER}`;
    kept.push(IPV4.test(ip) ? line : `# ${line} (INVALID IP)`);
  }

  await fs.writeFile(file, kept.map((l) => `${l}\n`).join(""), "utf-8");
}

export async function manageEtcHosts(store: FlagStore, file: string): Promise<void> {
  const hosts = getKvHosts(store);
  logger.debug({ file, hosts }, "Updating hosts file");
  await updateEtcHosts(file, hosts);
}

export type AddressLookup = (host: string) => Promise<string>;

const dnsLookup: AddressLookup = async (host) => (await lookup(host, { family: 4 })).address;

/**
 * IPv4 address for a node's private address. Hostnames are resolved through
 * DNS; failing that, an address embedded in the name (`ip-10-0-0-5`) is used.
 */
export async function resolvePrivateAddress(addr: string, resolve: AddressLookup = dnsLookup): Promise<string> {
  if (IPV4.test(addr)) return addr;
  try {
    return await resolve(addr);
  } catch (err) {
    logger.error({ addr, err: err instanceof Error ? err.message : String(err) }, "Unable to resolve private IP, will attempt to guess");
    const contained = CONTAINS_IPV4.exec(addr);
    if (!contained) throw new ConfigError(`Unable to resolve or guess IP from private-address: ${addr}`, { addr });
    return contained[0].replace(/-/g, ".");
  }
}
