import type { SetupContext } from "../execution/helpers.js";
import { executeCommand } from "../execution/helpers.js";
import { SetupError, SetupErrorCode } from "../shared/errors.js";
import { ok, fail, type Result } from "../shared/result.js";
import { logger } from "../shared/logger.js";

const ARCHIVE_PATTERN = /commandlinetools-linux-(\d+)_latest\.zip/;

/** Archive URL for a pinned command-line tools build number. */
export function toolsUrlForVersion(downloadBase: string, version: string): string {
  return `${downloadBase.replace(/\/+$/, "")}/commandlinetools-linux-${version}_latest.zip`;
}

/** Pull the Linux archive URL out of the download page markup, or null. */
export function extractToolsUrl(html: string, downloadBase: string): string | null {
  const match = html.match(ARCHIVE_PATTERN);
  return match ? toolsUrlForVersion(downloadBase, match[1]) : null;
}

/**
 * Resolve the command-line tools archive URL.
 * Order: pinned URL, pinned build number, then the vendor download page.
 */
export async function resolveToolsUrl(ctx: SetupContext): Promise<Result<string>> {
  const sdk = ctx.config.sdk;
  if (sdk.cmdline_tools_url) {
    logger.info({ url: sdk.cmdline_tools_url }, "Using pinned command-line tools URL");
    return ok(sdk.cmdline_tools_url);
  }
  if (sdk.cmdline_tools_version) {
    return ok(toolsUrlForVersion(sdk.download_base, sdk.cmdline_tools_version));
  }

  logger.info({ page: sdk.download_page }, "Resolving command-line tools URL from download page");
  const r = await executeCommand(ctx, { argv: ["curl", "-fsSL", sdk.download_page] }, "normal");
  if (r.exitCode !== 0) {
    return fail(new SetupError(SetupErrorCode.FETCH_FAILED, `Could not fetch ${sdk.download_page} (exit ${r.exitCode})`, {
      stderr: r.stderr.trim(),
    }));
  }

  const url = extractToolsUrl(r.stdout, sdk.download_base);
  if (!url) {
    return fail(new SetupError(
      SetupErrorCode.RESOLUTION_FAILED,
      "No commandlinetools-linux archive found on the download page; pin sdk.cmdline_tools_version in the config",
      { page: sdk.download_page },
    ));
  }
  logger.info({ url }, "Resolved command-line tools URL");
  return ok(url);
}
