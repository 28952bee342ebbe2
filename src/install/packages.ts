import type { DistributionInfo } from "../types/distro.js";
import type { InstallReport, PackageSpec } from "../types/packages.js";
import type { SetupContext } from "../execution/helpers.js";
import { executeCommand } from "../execution/helpers.js";
import { formatCommand } from "../execution/executor.js";
import { createDistroCommands } from "../distro/commands/factory.js";
import { packageNameFor } from "../catalog/loader.js";
import { SetupError, SetupErrorCode } from "../shared/errors.js";
import { ok, fail, type Result } from "../shared/result.js";
import { logger } from "../shared/logger.js";

/** Synchronise the package index before installing anything. */
export async function refreshIndex(distro: DistributionInfo, ctx: SetupContext): Promise<Result<void>> {
  const commands = createDistroCommands(distro);
  if (!commands.ok) return commands;

  const cmd = commands.value.refreshIndex();
  logger.info({ distro: distro.name }, "Refreshing package index");
  const r = await executeCommand(ctx, cmd, "long_running");
  if (r.exitCode !== 0) {
    return fail(new SetupError(SetupErrorCode.INSTALL_FAILED, `Package index refresh failed (exit ${r.exitCode})`, {
      command: formatCommand(cmd),
      stderr: r.stderr.trim(),
    }));
  }
  return ok(undefined);
}

/**
 * Install every package not already present. Presence is queried per package
 * and present packages are never passed to the install subcommand.
 *
 * `fail-fast` stops at the first failed install; `collect` keeps going and
 * reports every failure in one INSTALL_FAILED error at the end.
 */
export async function installPackages(
  distro: DistributionInfo,
  packages: readonly PackageSpec[],
  ctx: SetupContext,
): Promise<Result<InstallReport>> {
  const commands = createDistroCommands(distro);
  if (!commands.ok) return commands;
  const family = commands.value.family;

  const report: InstallReport = { installed: [], skipped: [], failed: [] };
  const failFast = ctx.config.install.failure_mode === "fail-fast";

  for (const spec of packages) {
    const pkg = packageNameFor(spec, family);
    if (pkg === null) {
      logger.debug({ pkg: spec.name, family }, "Package not needed on this family");
      continue;
    }

    const query = await executeCommand(ctx, commands.value.queryInstalled(pkg), "quick");
    if (query.exitCode === 0) {
      logger.info({ pkg }, "Already installed, skipping");
      report.skipped.push(pkg);
      continue;
    }

    logger.info({ pkg }, "Installing package");
    const cmd = commands.value.install([pkg]);
    const r = await executeCommand(ctx, cmd, "long_running");
    if (r.exitCode === 0) {
      report.installed.push(pkg);
      continue;
    }

    logger.error({ pkg, exitCode: r.exitCode }, "Package install failed");
    report.failed.push(pkg);
    if (failFast) {
      return fail(new SetupError(SetupErrorCode.INSTALL_FAILED, `Failed to install ${pkg} (exit ${r.exitCode})`, {
        command: formatCommand(cmd),
        stderr: r.stderr.trim(),
        report,
      }));
    }
  }

  if (report.failed.length > 0) {
    return fail(new SetupError(SetupErrorCode.INSTALL_FAILED, `Failed to install: ${report.failed.join(", ")}`, { report }));
  }
  logger.info({ installed: report.installed.length, skipped: report.skipped.length }, "Package installation complete");
  return ok(report);
}
