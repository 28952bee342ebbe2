import type { Command } from "../../types/command.js";
import type { DistroCommands, WaydroidPlan } from "./interface.js";
import { udevAccessCommands } from "./shared.js";

/** Debian/Ubuntu command implementations. */
export class DebianCommands implements DistroCommands {
  readonly family = "debian";
  readonly adbGroup = "plugdev";
  private readonly env = { DEBIAN_FRONTEND: "noninteractive" };

  refreshIndex(): Command {
    return { argv: ["sudo", "apt-get", "update"], env: this.env, inherit: true };
  }

  queryInstalled(pkg: string): Command {
    // dpkg-query also lists removed-but-configured packages; only "install ok installed" counts.
    return { argv: ["bash", "-c", `dpkg-query -W -f='\${Status}' ${pkg} 2>/dev/null | grep -q 'install ok installed'`] };
  }

  install(packages: string[]): Command {
    return { argv: ["sudo", "-E", "apt-get", "install", "-y", ...packages], env: this.env, inherit: true };
  }

  waydroidInstall(): WaydroidPlan {
    return {
      requires: "curl",
      commands: [
        { argv: ["bash", "-c", "set -o pipefail; curl -fsSL https://repo.waydro.id | sudo bash"], inherit: true },
        this.install(["waydroid"]),
      ],
    };
  }

  deviceAccess(user: string): Command[] {
    return udevAccessCommands(this.adbGroup, user);
  }
}
