import type { Command } from "../../types/command.js";
import type { DistroFamily } from "../../types/distro.js";

/** Commands needed to get Waydroid onto the host. */
export interface WaydroidPlan {
  /** Binary that must already be on PATH (a second-order package manager), if any. */
  readonly requires: string | null;
  readonly commands: Command[];
}

/**
 * Distro-specific command dispatch interface.
 * Stages call these methods to express intent;
 * implementations translate to the family's package manager.
 */
export interface DistroCommands {
  readonly family: DistroFamily;
  /** Group granting USB access to Android devices. */
  readonly adbGroup: string;

  /** Synchronise the package index (and upgrade where partial upgrades are unsupported). */
  refreshIndex(): Command;
  /** Exit code 0 means the package is installed. */
  queryInstalled(pkg: string): Command;
  install(packages: string[]): Command;

  waydroidInstall(aurHelper: string): WaydroidPlan;
  deviceAccess(user: string): Command[];
}
