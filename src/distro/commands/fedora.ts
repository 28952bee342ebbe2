import type { Command } from "../../types/command.js";
import type { DistroCommands, WaydroidPlan } from "./interface.js";
import { udevAccessCommands } from "./shared.js";

/** Fedora command implementations. */
export class FedoraCommands implements DistroCommands {
  readonly family = "fedora";
  readonly adbGroup = "plugdev";

  refreshIndex(): Command {
    return { argv: ["sudo", "dnf", "makecache", "-y"], inherit: true };
  }

  queryInstalled(pkg: string): Command {
    return { argv: ["rpm", "-q", pkg] };
  }

  install(packages: string[]): Command {
    return { argv: ["sudo", "dnf", "install", "-y", ...packages], inherit: true };
  }

  waydroidInstall(): WaydroidPlan {
    return { requires: null, commands: [this.install(["waydroid"])] };
  }

  deviceAccess(user: string): Command[] {
    return udevAccessCommands(this.adbGroup, user);
  }
}
