import type { DistributionInfo } from "../types/distro.js";
import type { SetupContext } from "../execution/helpers.js";
import { executeCommand } from "../execution/helpers.js";
import { formatCommand } from "../execution/executor.js";
import { createDistroCommands } from "../distro/commands/factory.js";
import { SetupError, SetupErrorCode } from "../shared/errors.js";
import { ok, fail, type Result } from "../shared/result.js";
import { logger } from "../shared/logger.js";

/** Let `user` talk to USB-attached devices through adb (group + udev reload). */
export async function configureDeviceAccess(distro: DistributionInfo, user: string, ctx: SetupContext): Promise<Result<{ group: string }>> {
  const commands = createDistroCommands(distro);
  if (!commands.ok) return commands;

  const group = commands.value.adbGroup;
  logger.info({ user, group }, "Granting USB device access");
  for (const cmd of commands.value.deviceAccess(user)) {
    const r = await executeCommand(ctx, cmd, "normal");
    if (r.exitCode !== 0) {
      return fail(new SetupError(SetupErrorCode.INSTALL_FAILED, `Device access setup failed (exit ${r.exitCode})`, {
        command: formatCommand(cmd),
        stderr: r.stderr.trim(),
      }));
    }
  }
  return ok({ group });
}
