import { existsSync } from "node:fs";
import { cp, mkdir, mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Command } from "../types/command.js";
import type { SetupContext } from "../execution/helpers.js";
import { executeCommand } from "../execution/helpers.js";
import { formatCommand } from "../execution/executor.js";
import { resolveToolsUrl } from "./url-resolver.js";
import { SetupError, SetupErrorCode, describeError } from "../shared/errors.js";
import { ok, fail, type Result } from "../shared/result.js";
import { logger } from "../shared/logger.js";

/** Outcome of a fetch stage. */
export interface FetchReport {
  readonly skipped: boolean;
  readonly source?: string;
}

// sdkmanager asks once per licence; more answers than licences is harmless.
const LICENSE_ANSWERS = "y\n".repeat(64);

/** Presence of this directory means the command-line tools are installed. */
export function sdkMarkerPath(installDir: string): string {
  return join(installDir, "cmdline-tools", "latest");
}

export function sdkManagerPath(installDir: string): string {
  return join(sdkMarkerPath(installDir), "bin", "sdkmanager");
}

/**
 * Download and unpack the command-line tools into `installDir`, accept the
 * licences and install the configured SDK packages. A no-op (no network, no
 * processes) when the marker directory already exists.
 */
export async function fetchSdk(
  installDir: string,
  ctx: SetupContext,
  options: { javaHome?: string } = {},
): Promise<Result<FetchReport>> {
  const marker = sdkMarkerPath(installDir);
  if (existsSync(marker)) {
    logger.info({ marker }, "Android command-line tools already present, skipping");
    return ok({ skipped: true });
  }

  const url = await resolveToolsUrl(ctx);
  if (!url.ok) return url;

  let workDir: string;
  try {
    workDir = await mkdtemp(join(tmpdir(), "flutter-android-setup-"));
  } catch (err) {
    return fail(new SetupError(SetupErrorCode.IO_ERROR, `Could not create download directory: ${describeError(err)}`));
  }
  ctx.cleanup.register("sdk-download", () => rm(workDir, { recursive: true, force: true }));

  const archive = join(workDir, "commandlinetools.zip");
  const extractDir = join(workDir, "extract");

  logger.info({ url: url.value }, "Downloading Android command-line tools");
  const download = await runStep(ctx, { argv: ["curl", "-fL", "--progress-bar", "-o", archive, url.value], inherit: true }, SetupErrorCode.FETCH_FAILED, "Download failed");
  if (!download.ok) return download;

  const extract = await runStep(ctx, { argv: ["unzip", "-q", "-o", archive, "-d", extractDir] }, SetupErrorCode.FETCH_FAILED, "Extraction failed");
  if (!extract.ok) return extract;

  const unpacked = join(extractDir, "cmdline-tools");
  if (!existsSync(unpacked)) {
    return fail(new SetupError(SetupErrorCode.FETCH_FAILED, "Archive did not contain a cmdline-tools directory", { archive }));
  }
  try {
    await mkdir(join(installDir, "cmdline-tools"), { recursive: true });
    await cp(unpacked, marker, { recursive: true });
  } catch (err) {
    await removeIncomplete(marker);
    return fail(new SetupError(SetupErrorCode.FETCH_FAILED, `Could not move command-line tools into place: ${describeError(err)}`, { marker }));
  }
  logger.info({ marker }, "Android command-line tools unpacked");

  // The marker only survives a completed sdkmanager run.
  const installed = await installSdkPackages(ctx, installDir, options.javaHome);
  if (!installed.ok) {
    await removeIncomplete(marker);
    return installed;
  }

  return ok({ skipped: false, source: url.value });
}

async function installSdkPackages(ctx: SetupContext, installDir: string, javaHome?: string): Promise<Result<void>> {
  const sdkmanager = sdkManagerPath(installDir);
  const env: Record<string, string> = { ANDROID_HOME: installDir, ANDROID_SDK_ROOT: installDir };
  if (javaHome) env.JAVA_HOME = javaHome;
  const sdkRoot = `--sdk_root=${installDir}`;

  logger.info("Accepting Android SDK licences");
  const licences = await runStep(ctx, { argv: [sdkmanager, sdkRoot, "--licenses"], env, stdin: LICENSE_ANSWERS, inherit: true }, SetupErrorCode.INSTALL_FAILED, "Licence acceptance failed");
  if (!licences.ok) return licences;

  const packages = ctx.config.sdk.packages;
  logger.info({ packages }, "Installing Android SDK packages");
  return runStep(ctx, { argv: [sdkmanager, sdkRoot, ...packages], env, stdin: LICENSE_ANSWERS, inherit: true }, SetupErrorCode.INSTALL_FAILED, "SDK package installation failed");
}

async function removeIncomplete(marker: string): Promise<void> {
  try {
    await rm(marker, { recursive: true, force: true });
  } catch (err) {
    logger.warn({ marker, error: describeError(err) }, "Could not remove incomplete command-line tools");
  }
}

async function runStep(ctx: SetupContext, cmd: Command, code: SetupErrorCode, message: string): Promise<Result<void>> {
  const r = await executeCommand(ctx, cmd, "long_running");
  if (r.exitCode !== 0) {
    logger.error({ command: formatCommand(cmd), exitCode: r.exitCode }, message);
    return fail(new SetupError(code, `${message} (exit ${r.exitCode})`, { command: formatCommand(cmd), stderr: r.stderr.trim() }));
  }
  return ok(undefined);
}
