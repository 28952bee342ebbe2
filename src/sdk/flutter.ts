import { existsSync, readdirSync } from "node:fs";
import { mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { SetupContext } from "../execution/helpers.js";
import { executeCommand } from "../execution/helpers.js";
import { formatCommand } from "../execution/executor.js";
import type { FetchReport } from "./fetcher.js";
import { SetupError, SetupErrorCode, describeError } from "../shared/errors.js";
import { ok, fail, type Result } from "../shared/result.js";
import { logger } from "../shared/logger.js";

export function flutterBinPath(flutterHome: string): string {
  return join(flutterHome, "bin", "flutter");
}

/** Clone the Flutter SDK into `flutterHome` unless a checkout is already there. */
export async function fetchFlutter(flutterHome: string, ctx: SetupContext): Promise<Result<FetchReport>> {
  if (existsSync(flutterBinPath(flutterHome))) {
    logger.info({ flutterHome }, "Flutter SDK already present, skipping");
    return ok({ skipped: true });
  }
  if (existsSync(flutterHome) && readdirSync(flutterHome).length > 0) {
    return fail(new SetupError(
      SetupErrorCode.FETCH_FAILED,
      `${flutterHome} exists but is not a Flutter SDK checkout`,
      { flutterHome },
    ));
  }

  try {
    await mkdir(dirname(flutterHome), { recursive: true });
  } catch (err) {
    return fail(new SetupError(SetupErrorCode.IO_ERROR, `Could not create ${dirname(flutterHome)}: ${describeError(err)}`));
  }

  const { repository, channel } = ctx.config.flutter;
  const cmd = { argv: ["git", "clone", "--depth", "1", "--branch", channel, repository, flutterHome], inherit: true };
  logger.info({ repository, channel, flutterHome }, "Cloning Flutter SDK");
  const r = await executeCommand(ctx, cmd, "long_running");
  if (r.exitCode !== 0) {
    return fail(new SetupError(SetupErrorCode.FETCH_FAILED, `Flutter clone failed (exit ${r.exitCode})`, {
      command: formatCommand(cmd),
      stderr: r.stderr.trim(),
    }));
  }
  return ok({ skipped: false, source: repository });
}
