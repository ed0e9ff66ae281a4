// Factory for distro-specific command adapters.
// Called at server startup after detectDistro(); the returned DistroCommands is shared
// by DistConfig provisioning and port exposure.

import type { DistroContext } from "../../types/distro.js";
import type { DistroCommands } from "./interface.js";
import { DebianCommands } from "./debian.js";
import { RHELCommands } from "./rhel.js";

export function createDistroCommands(distro: DistroContext): DistroCommands {
  switch (distro.family) {
    case "debian": return new DebianCommands();
    case "rhel": return new RHELCommands();
  }
}
