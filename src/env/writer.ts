import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import type { ToolPaths } from "../types/distro.js";
import { renderEnvBlock, profileSyntax, upsertBlock, type UpsertAction } from "./profile.js";
import { SetupError, SetupErrorCode, describeError } from "../shared/errors.js";
import { ok, fail, type Result } from "../shared/result.js";
import { logger } from "../shared/logger.js";

export interface WriteReport {
  readonly profileFile: string;
  readonly action: UpsertAction;
}

async function readProfile(profileFile: string): Promise<string> {
  try {
    return await readFile(profileFile, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return "";
    throw err;
  }
}

/**
 * Persist the toolchain exports into the shell profile. Idempotent: repeated
 * runs keep exactly one fenced block, rewritten in place when paths change.
 */
export async function writeEnv(paths: ToolPaths, profileFile: string): Promise<Result<WriteReport>> {
  try {
    const current = await readProfile(profileFile);
    const updated = upsertBlock(current, renderEnvBlock(paths, profileSyntax(profileFile)));
    if (!updated) {
      return fail(new SetupError(
        SetupErrorCode.IO_ERROR,
        `${profileFile} has an unterminated flutter-android-setup block; remove it and re-run`,
        { profileFile },
      ));
    }

    if (updated.action !== "unchanged") {
      await mkdir(dirname(profileFile), { recursive: true });
      await writeFile(profileFile, updated.content, "utf-8");
    }
    logger.info({ profileFile, action: updated.action }, "Shell profile updated");
    return ok({ profileFile, action: updated.action });
  } catch (err) {
    return fail(new SetupError(SetupErrorCode.IO_ERROR, `Could not update ${profileFile}: ${describeError(err)}`, { profileFile }));
  }
}
