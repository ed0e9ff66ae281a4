import type { Command } from "../../types/command.js";
import type { DirectoryParams, GroupCreateParams, PortRule, UserCreateParams } from "../../types/provisioning.js";
import type { DistroCommands } from "./interface.js";
import { formatMode } from "./interface.js";

/** Debian/Ubuntu command implementations. */
export class DebianCommands implements DistroCommands {
  private readonly env = { DEBIAN_FRONTEND: "noninteractive" };

  packageRefresh(): Command {
    return { argv: ["sudo", "apt-get", "update"], env: this.env };
  }

  packageInstall(packages: string[]): Command {
    return { argv: ["sudo", "apt-get", "install", "-y", ...packages], env: this.env };
  }

  groupExists(name: string): Command {
    return { argv: ["getent", "group", name] };
  }

  groupCreate(params: GroupCreateParams): Command {
    const argv = ["sudo", "addgroup"];
    if (params.system) argv.push("--system");
    argv.push(params.name);
    return { argv };
  }

  userExists(username: string): Command {
    return { argv: ["id", "-u", username] };
  }

  userCreate(params: UserCreateParams): Command {
    const argv = ["sudo", "adduser", "--disabled-password", "--gecos", ""];
    if (params.shell) argv.push("--shell", params.shell);
    if (params.primaryGroup) argv.push("--ingroup", params.primaryGroup);
    argv.push(params.username);
    return { argv };
  }

  userAddToGroups(username: string, groups: string[]): Command {
    return { argv: ["sudo", "usermod", "-aG", groups.join(","), username] };
  }

  directoryCreate(params: DirectoryParams): Command {
    return {
      argv: ["sudo", "install", "-d", "-o", params.owner, "-g", params.group, "-m", formatMode(params.perms), params.path],
    };
  }

  firewallOpenPort(rule: PortRule): Command {
    const argv = ["sudo", "ufw", "allow", `${rule.port}/${rule.protocol ?? "tcp"}`];
    if (rule.comment) argv.push("comment", rule.comment);
    return { argv };
  }

  firewallClosePort(rule: PortRule): Command {
    return { argv: ["sudo", "ufw", "delete", "allow", `${rule.port}/${rule.protocol ?? "tcp"}`] };
  }
}
