import type { Command } from "../../types/command.js";
import type { DirectoryParams, GroupCreateParams, PortRule, UserCreateParams } from "../../types/provisioning.js";
import type { DistroCommands } from "./interface.js";
import { formatMode } from "./interface.js";

/** RHEL/Fedora/Rocky command implementations. */
export class RHELCommands implements DistroCommands {
  packageRefresh(): Command {
    return { argv: ["sudo", "dnf", "makecache"] };
  }

  packageInstall(packages: string[]): Command {
    return { argv: ["sudo", "dnf", "install", "-y", ...packages] };
  }

  groupExists(name: string): Command {
    return { argv: ["getent", "group", name] };
  }

  groupCreate(params: GroupCreateParams): Command {
    const argv = ["sudo", "groupadd"];
    if (params.system) argv.push("--system");
    argv.push(params.name);
    return { argv };
  }

  userExists(username: string): Command {
    return { argv: ["id", "-u", username] };
  }

  userCreate(params: UserCreateParams): Command {
    const argv = ["sudo", "useradd", "--create-home"];
    if (params.shell) argv.push("--shell", params.shell);
    if (params.primaryGroup) argv.push("-g", params.primaryGroup);
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
    return { argv: ["sudo", "firewall-cmd", `--add-port=${rule.port}/${rule.protocol ?? "tcp"}`] };
  }

  firewallClosePort(rule: PortRule): Command {
    return { argv: ["sudo", "firewall-cmd", `--remove-port=${rule.port}/${rule.protocol ?? "tcp"}`] };
  }
}
