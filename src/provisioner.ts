// Provisioning pipeline. Runs every stage in order and stops at the first failed Result.
// Stages: detect → refresh index → packages → JAVA_HOME → Flutter → Android SDK →
// shell profile → Waydroid (optional) → device access (optional) → flutter doctor.
// Cleanup hooks registered by stages run once the pipeline ends, success or not.
import type { DistributionInfo, ToolPaths } from "./types/distro.js";
import type { InstallReport, PackageSpec } from "./types/packages.js";
import type { SetupContext } from "./execution/helpers.js";
import type { PromptPort } from "./prompt.js";
import { detect, detectToolHomes, type ProbeHost } from "./distro/detector.js";
import { refreshIndex, installPackages } from "./install/packages.js";
import { installWaydroid } from "./install/waydroid.js";
import { configureDeviceAccess } from "./install/device-access.js";
import { javaHomeCandidates, resolveJavaHome } from "./env/java.js";
import { resolveProfileFile } from "./env/profile.js";
import { writeEnv, type WriteReport } from "./env/writer.js";
import { fetchFlutter } from "./sdk/flutter.js";
import { fetchSdk, type FetchReport } from "./sdk/fetcher.js";
import { verify } from "./verify.js";
import { expandHome } from "./shared/paths.js";
import { SetupError } from "./shared/errors.js";
import { ok, fail, type Result } from "./shared/result.js";
import { logger } from "./shared/logger.js";

export interface ProvisionOptions {
  readonly probeHost: ProbeHost;
  readonly prompt: PromptPort;
  readonly packages: readonly PackageSpec[];
  /** Account granted USB device access. */
  readonly user: string;
  readonly skipVerify?: boolean;
}

export interface ProvisionSummary {
  readonly distro: DistributionInfo;
  readonly paths: ToolPaths;
  readonly packages: InstallReport;
  readonly flutter: FetchReport;
  readonly sdk: FetchReport;
  readonly profile: WriteReport;
  readonly waydroid: InstallReport | null;
  readonly deviceGroup: string | null;
  readonly verified: boolean | null;
}

/** Run the whole pipeline; cleanup hooks always run before this resolves. */
export async function provision(ctx: SetupContext, options: ProvisionOptions): Promise<Result<ProvisionSummary>> {
  try {
    return await runPipeline(ctx, options);
  } finally {
    await ctx.cleanup.runAll();
  }
}

async function wantsWaydroid(ctx: SetupContext, prompt: PromptPort): Promise<Result<boolean>> {
  switch (ctx.config.waydroid.mode) {
    case "always": return ok(true);
    case "never": return ok(false);
    case "prompt":
      try {
        return ok(await prompt.confirm("Install Waydroid (Android emulator)?", false));
      } catch (err) {
        if (err instanceof SetupError) return fail(err);
        throw err;
      }
  }
}

async function runPipeline(ctx: SetupContext, options: ProvisionOptions): Promise<Result<ProvisionSummary>> {
  const distro = await detect(options.probeHost, { override: ctx.config.distro });
  if (!distro.ok) return distro;

  // Asked up front so the long installs below run unattended.
  const waydroid = await wantsWaydroid(ctx, options.prompt);
  if (!waydroid.ok) return waydroid;

  if (ctx.config.install.refresh_index) {
    const refreshed = await refreshIndex(distro.value, ctx);
    if (!refreshed.ok) return refreshed;
  }

  const packages = await installPackages(distro.value, options.packages, ctx);
  if (!packages.ok) return packages;

  const existing = detectToolHomes(ctx.env);
  const javaHome = resolveJavaHome(javaHomeCandidates(distro.value.family, ctx.config.java.candidates, existing.javaHome));
  if (!javaHome.ok) return javaHome;

  const paths: ToolPaths = {
    flutterHome: existing.flutterHome ?? expandHome(ctx.config.paths.flutter_home, ctx.home),
    androidHome: existing.androidHome ?? expandHome(ctx.config.paths.android_home, ctx.home),
    javaHome: javaHome.value,
  };
  logger.info({ paths }, "Toolchain locations resolved");

  const flutter = await fetchFlutter(paths.flutterHome, ctx);
  if (!flutter.ok) return flutter;

  const sdk = await fetchSdk(paths.androidHome, ctx, { javaHome: paths.javaHome });
  if (!sdk.ok) return sdk;

  const profileFile = resolveProfileFile(ctx.env, ctx.home, ctx.config.profile.file);
  const profile = await writeEnv(paths, profileFile);
  if (!profile.ok) return profile;

  let waydroidReport: InstallReport | null = null;
  if (waydroid.value) {
    const installed = await installWaydroid(distro.value, ctx);
    if (!installed.ok) return installed;
    waydroidReport = installed.value;
  }

  let deviceGroup: string | null = null;
  if (ctx.config.device_access.enabled) {
    const access = await configureDeviceAccess(distro.value, options.user, ctx);
    if (!access.ok) return access;
    deviceGroup = access.value.group;
  }

  const verified = options.skipVerify ? null : (await verify(paths, ctx)).passed;

  return ok({
    distro: distro.value,
    paths,
    packages: packages.value,
    flutter: flutter.value,
    sdk: sdk.value,
    profile: profile.value,
    waydroid: waydroidReport,
    deviceGroup,
    verified,
  });
}
