import type { Command } from "../../types/command.js";
import type { DistroCommands, WaydroidPlan } from "./interface.js";
import { udevAccessCommands } from "./shared.js";

/** Arch/Manjaro/EndeavourOS command implementations. */
export class ArchCommands implements DistroCommands {
  readonly family = "arch";
  readonly adbGroup = "adbusers";

  refreshIndex(): Command {
    // Arch does not support partial upgrades: syncing the index means upgrading.
    return { argv: ["sudo", "pacman", "-Syu", "--noconfirm"], inherit: true };
  }

  queryInstalled(pkg: string): Command {
    return { argv: ["pacman", "-Q", pkg] };
  }

  install(packages: string[]): Command {
    return { argv: ["sudo", "pacman", "-S", "--noconfirm", "--needed", ...packages], inherit: true };
  }

  waydroidInstall(aurHelper: string): WaydroidPlan {
    // AUR helpers escalate with sudo themselves and refuse to run as root.
    return {
      requires: aurHelper,
      commands: [{ argv: [aurHelper, "-S", "--noconfirm", "--needed", "waydroid"], inherit: true }],
    };
  }

  deviceAccess(user: string): Command[] {
    return udevAccessCommands(this.adbGroup, user);
  }
}
