import type { DistributionInfo } from "../types/distro.js";
import type { InstallReport } from "../types/packages.js";
import type { SetupContext } from "../execution/helpers.js";
import { executeCommand, commandExists } from "../execution/helpers.js";
import { formatCommand } from "../execution/executor.js";
import { createDistroCommands } from "../distro/commands/factory.js";
import { SetupError, SetupErrorCode } from "../shared/errors.js";
import { ok, fail, type Result } from "../shared/result.js";
import { logger } from "../shared/logger.js";

/** Install Waydroid unless `waydroid` already resolves on PATH. */
export async function installWaydroid(distro: DistributionInfo, ctx: SetupContext): Promise<Result<InstallReport>> {
  const commands = createDistroCommands(distro);
  if (!commands.ok) return commands;

  if (await commandExists(ctx, "waydroid")) {
    logger.info("Waydroid already installed, skipping");
    return ok({ installed: [], skipped: ["waydroid"], failed: [] });
  }

  const plan = commands.value.waydroidInstall(ctx.config.waydroid.aur_helper);
  if (plan.requires && !(await commandExists(ctx, plan.requires))) {
    return fail(new SetupError(
      SetupErrorCode.INSTALL_FAILED,
      `Waydroid on ${distro.name} needs '${plan.requires}', which is not installed`,
      { requires: plan.requires },
    ));
  }

  logger.info({ distro: distro.name }, "Installing Waydroid");
  for (const cmd of plan.commands) {
    const r = await executeCommand(ctx, cmd, "long_running");
    if (r.exitCode !== 0) {
      return fail(new SetupError(SetupErrorCode.INSTALL_FAILED, `Waydroid install failed (exit ${r.exitCode})`, {
        command: formatCommand(cmd),
        stderr: r.stderr.trim(),
      }));
    }
  }
  return ok({ installed: ["waydroid"], skipped: [], failed: [] });
}
