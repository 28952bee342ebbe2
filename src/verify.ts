import type { ToolPaths } from "./types/distro.js";
import type { SetupContext } from "./execution/helpers.js";
import { executeCommand } from "./execution/helpers.js";
import { flutterBinPath } from "./sdk/flutter.js";
import { logger } from "./shared/logger.js";

/**
 * Run `flutter doctor` against the freshly installed toolchain. Never fatal:
 * doctor findings are advice, so a non-zero exit is only logged.
 */
export async function verify(paths: ToolPaths, ctx: SetupContext): Promise<{ passed: boolean }> {
  const env: Record<string, string> = {
    FLUTTER_HOME: paths.flutterHome,
    ANDROID_HOME: paths.androidHome,
    ANDROID_SDK_ROOT: paths.androidHome,
    JAVA_HOME: paths.javaHome,
  };
  const r = await executeCommand(ctx, { argv: [flutterBinPath(paths.flutterHome), "doctor"], env, inherit: true }, "long_running");
  if (r.exitCode !== 0) {
    logger.warn({ exitCode: r.exitCode }, "flutter doctor reported problems; run 'flutter doctor -v' for details");
    return { passed: false };
  }
  return { passed: true };
}
