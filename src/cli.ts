#!/usr/bin/env node

import { Command } from "commander";
import { homedir, userInfo } from "node:os";
import * as clack from "@clack/prompts";

import { logger } from "./shared/logger.js";
import { SetupError, describeError } from "./shared/errors.js";
import { loadConfig } from "./config/loader.js";
import { applyCliOverrides, type CliOptions } from "./config/overrides.js";
import { loadCatalog, selectPackages } from "./catalog/loader.js";
import { LocalExecutor } from "./execution/executor.js";
import { CleanupRegistry } from "./execution/cleanup.js";
import type { SetupContext } from "./execution/helpers.js";
import type { PackageSpec } from "./types/packages.js";
import { createProbeHost } from "./distro/detector.js";
import { createClackPrompt, createFixedPrompt } from "./prompt.js";
import { provision } from "./provisioner.js";

function buildProgram(): Command {
  return new Command()
    .name("flutter-android-setup")
    .description("Provision this Linux workstation for Flutter and Android development")
    .version("0.1.0")
    .option("-c, --config <path>", "config file (default ~/.config/flutter-android-setup/config.yaml)")
    .option("-y, --yes", "never prompt; Waydroid is skipped unless --waydroid is given")
    .option("--waydroid", "install Waydroid without asking")
    .option("--no-waydroid", "do not install Waydroid")
    .option("--profile <file>", "shell profile to write the exports to")
    .option("--skip-verify", "do not run flutter doctor at the end");
}

async function main(): Promise<number> {
  const program = buildProgram();
  program.parse(process.argv);
  const opts = program.opts<CliOptions>();
  const interactive = Boolean(process.stdin.isTTY && process.stdout.isTTY);

  // ── Phase 1: Load config ──────────────────────────────────────
  let ctx: SetupContext;
  let packages: PackageSpec[];
  try {
    const { config, configPath, firstRun } = loadConfig(opts.config ?? process.env.FLUTTER_ANDROID_SETUP_CONFIG);
    logger.info({ configPath, firstRun }, "Configuration loaded");
    const effective = applyCliOverrides(config, opts, interactive);
    packages = selectPackages(loadCatalog(), effective.install.extra_packages, effective.install.skip_packages);
    ctx = {
      config: effective,
      executor: new LocalExecutor(),
      cleanup: new CleanupRegistry(),
      env: process.env,
      home: homedir(),
    };
  } catch (err) {
    if (err instanceof SetupError) {
      logger.error({ code: err.code, context: err.context }, err.message);
      return 1;
    }
    throw err;
  }

  // ── Phase 2: Run the pipeline ─────────────────────────────────
  if (interactive) clack.intro("flutter-android-setup");
  ctx.cleanup.installSignalHandlers();
  const result = await provision(ctx, {
    probeHost: createProbeHost(ctx.executor),
    prompt: interactive && !opts.yes ? createClackPrompt() : createFixedPrompt(false),
    packages,
    user: process.env.USER ?? userInfo().username,
    skipVerify: opts.skipVerify,
  });
  ctx.cleanup.removeSignalHandlers();

  if (!result.ok) {
    logger.error({ code: result.error.code, context: result.error.context }, result.error.message);
    return 1;
  }

  const { profile, deviceGroup } = result.value;
  const lines = [`Reload your shell: source ${profile.profileFile} (or open a new terminal)`];
  if (deviceGroup) lines.push(`Log out and back in for '${deviceGroup}' group membership to apply`);
  lines.push("Check the installation with: flutter doctor -v");
  if (interactive) {
    clack.outro(lines.join("\n"));
  } else {
    logger.info({ profileFile: profile.profileFile }, lines.join("; "));
  }
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    logger.fatal({ error: describeError(err) }, "Fatal error");
    process.exit(1);
  },
);
