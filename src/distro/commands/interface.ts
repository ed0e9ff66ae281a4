import type { Command } from "../../types/command.js";
import type { DirectoryParams, GroupCreateParams, PortRule, UserCreateParams } from "../../types/provisioning.js";

/**
 * Distro-specific command dispatch interface.
 * Provisioning code calls these methods to express intent;
 * implementations translate to distro-specific commands.
 */
export interface DistroCommands {
  // Package management
  packageRefresh(): Command;
  packageInstall(packages: string[]): Command;

  // Groups and users. The *Exists probes exit 0 when the entity exists.
  groupExists(name: string): Command;
  groupCreate(params: GroupCreateParams): Command;
  userExists(username: string): Command;
  userCreate(params: UserCreateParams): Command;
  userAddToGroups(username: string, groups: string[]): Command;

  // Create-if-missing; always (re)applies owner and mode.
  directoryCreate(params: DirectoryParams): Command;

  // Firewall
  firewallOpenPort(rule: PortRule): Command;
  firewallClosePort(rule: PortRule): Command;
}

/** Mode bits rendered the way install(1) and chmod(1) take them. */
export function formatMode(perms: number): string {
  return perms.toString(8).padStart(4, "0");
}
