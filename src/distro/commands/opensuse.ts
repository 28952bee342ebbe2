import type { Command } from "../../types/command.js";
import type { DistroCommands, WaydroidPlan } from "./interface.js";
import { udevAccessCommands } from "./shared.js";

/** openSUSE Tumbleweed/Leap command implementations. */
export class OpenSuseCommands implements DistroCommands {
  readonly family = "opensuse";
  readonly adbGroup = "plugdev";

  refreshIndex(): Command {
    return { argv: ["sudo", "zypper", "--non-interactive", "refresh"], inherit: true };
  }

  queryInstalled(pkg: string): Command {
    return { argv: ["rpm", "-q", pkg] };
  }

  install(packages: string[]): Command {
    return { argv: ["sudo", "zypper", "--non-interactive", "install", ...packages], inherit: true };
  }

  waydroidInstall(): WaydroidPlan {
    return { requires: null, commands: [this.install(["waydroid"])] };
  }

  deviceAccess(user: string): Command[] {
    return udevAccessCommands(this.adbGroup, user);
  }
}
