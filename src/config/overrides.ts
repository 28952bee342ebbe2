import type { SetupConfig, WaydroidMode } from "../types/config.js";

/** Options accepted on the command line. */
export type CliOptions = {
  config?: string;
  yes?: boolean;
  waydroid?: boolean;
  profile?: string;
  skipVerify?: boolean;
};

/**
 * Layer command-line flags over the loaded config. An explicit --waydroid /
 * --no-waydroid wins; otherwise a run that cannot prompt never installs it.
 */
export function applyCliOverrides(config: SetupConfig, opts: CliOptions, interactive: boolean): SetupConfig {
  let mode: WaydroidMode = config.waydroid.mode;
  if (opts.waydroid !== undefined) {
    mode = opts.waydroid ? "always" : "never";
  } else if (mode === "prompt" && (opts.yes || !interactive)) {
    mode = "never";
  }
  return {
    ...config,
    waydroid: { ...config.waydroid, mode },
    profile: opts.profile ? { file: opts.profile } : config.profile,
  };
}
