import { readFileSync } from "node:fs";
import { execSync } from "node:child_process";
import type { DistroContext, DistroFamily, FirewallBackend, PackageManager } from "../types/distro.js";
import { logger } from "../logger.js";

/** Parse /etc/os-release into key-value pairs. */
export function parseOsRelease(content: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const line of content.split("\n")) {
    const match = line.match(/^([A-Z_]+)=(.*)$/);
    if (match) {
      result[match[1]] = match[2].replace(/^["']|["']$/g, "");
    }
  }
  return result;
}

/** Resolve distro family from os-release fields. */
export function resolveFamily(osRelease: Record<string, string>): DistroFamily {
  const idLike = (osRelease.ID_LIKE ?? "").toLowerCase();
  const id = (osRelease.ID ?? "").toLowerCase();
  if (id === "debian" || id === "ubuntu" || idLike.includes("debian") || idLike.includes("ubuntu")) return "debian";
  if (id === "fedora" || id === "rhel" || id === "centos" || id === "rocky" || id === "alma" || idLike.includes("rhel") || idLike.includes("fedora")) return "rhel";
  logger.warn({ id, idLike }, "Unknown distro family, defaulting to debian");
  return "debian";
}

function commandExists(cmd: string): boolean {
  try {
    execSync(`command -v ${cmd}`, { stdio: "ignore" });
    return true;
  } catch {
    return false;
  }
}

/**
 * Detect the local distro. Accepts optional overrides from config.yaml;
 * only explicitly set fields are replaced.
 */
export function detectDistro(overrides?: { family?: DistroFamily; firewall_backend?: FirewallBackend }): DistroContext {
  let osRelease: Record<string, string> = {};
  try {
    osRelease = parseOsRelease(readFileSync("/etc/os-release", "utf-8"));
  } catch {
    logger.warn("Could not read /etc/os-release, using probe-based detection");
  }

  const family = overrides?.family ?? resolveFamily(osRelease);
  const packageManager: PackageManager = family === "debian" ? "apt" : "dnf";

  let firewall: FirewallBackend = "none";
  if (overrides?.firewall_backend) firewall = overrides.firewall_backend;
  else if (commandExists("ufw")) firewall = "ufw";
  else if (commandExists("firewall-cmd")) firewall = "firewalld";

  const context: DistroContext = {
    family,
    name: osRelease.NAME ?? osRelease.ID ?? "Unknown",
    version: osRelease.VERSION_ID ?? "unknown",
    package_manager: packageManager,
    firewall_backend: firewall,
  };
  logger.info({ distro: context }, "Distro detection complete");
  return context;
}
