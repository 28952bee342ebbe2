// Config loader: reads ~/.config/flutter-android-setup/config.yaml and deep-merges with defaults.
// On first run (no config file), writes DEFAULT_CONFIG_YAML and returns firstRun: true.
// deepMerge lets users override only the keys they specify; unset keys inherit defaults.
// Config shape is defined in src/types/config.ts; add new fields there, in the schema and in DEFAULT_CONFIG.
import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import type { SetupConfig } from "../types/config.js";
import { configSchema } from "./schema.js";
import { SetupError, SetupErrorCode, describeError } from "../shared/errors.js";
import { logger } from "../shared/logger.js";

export const DEFAULT_CONFIG_PATH = join(homedir(), ".config", "flutter-android-setup", "config.yaml");

/** Full default configuration. */
export const DEFAULT_CONFIG: SetupConfig = {
  paths: { flutter_home: "~/development/flutter", android_home: "~/Android/Sdk" },
  install: { refresh_index: true, failure_mode: "fail-fast", extra_packages: [], skip_packages: [] },
  sdk: {
    cmdline_tools_url: null,
    cmdline_tools_version: null,
    download_page: "https://developer.android.com/studio",
    download_base: "https://dl.google.com/android/repository",
    packages: ["platform-tools", "platforms;android-34", "build-tools;34.0.0"],
  },
  flutter: { repository: "https://github.com/flutter/flutter.git", channel: "stable" },
  java: { candidates: [] },
  profile: { file: null },
  waydroid: { mode: "prompt", aur_helper: "yay" },
  device_access: { enabled: true },
  timeouts: { command_ceiling_seconds: 0 },
};

/** Default config YAML written on first run. */
const DEFAULT_CONFIG_YAML = `# flutter-android-setup configuration
# Generated automatically on first run. All values shown are defaults.

paths:
  flutter_home: ~/development/flutter
  android_home: ~/Android/Sdk

install:
  refresh_index: true
  # fail-fast | collect
  failure_mode: fail-fast
  extra_packages: []
  skip_packages: []

sdk:
  # Pin the command-line tools instead of reading the download page.
  cmdline_tools_url: null
  cmdline_tools_version: null
  download_page: https://developer.android.com/studio
  download_base: https://dl.google.com/android/repository
  packages:
    - platform-tools
    - platforms;android-34
    - build-tools;34.0.0

flutter:
  repository: https://github.com/flutter/flutter.git
  channel: stable

java:
  # Checked in order after an exported JAVA_HOME and before the built-in locations.
  candidates: []

profile:
  # Auto-selected from $SHELL when null.
  file: null

waydroid:
  # prompt | always | never
  mode: prompt
  aur_helper: yay

device_access:
  enabled: true

timeouts:
  command_ceiling_seconds: 0

# Distro override (auto-detected if omitted)
# distro:
#   name: Arch Linux
`;

export interface ConfigResult {
  config: SetupConfig;
  configPath: string;
  firstRun: boolean;
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? DEFAULT_CONFIG_PATH;

  // First run: generate the default config
  if (!existsSync(configPath)) {
    logger.info({ configPath }, "No config file found, generating defaults (first run)");
    try {
      mkdirSync(dirname(configPath), { recursive: true });
      writeFileSync(configPath, DEFAULT_CONFIG_YAML, "utf-8");
    } catch (err) {
      logger.warn({ configPath, error: describeError(err) }, "Could not write default config file");
    }
    return { config: structuredClone(DEFAULT_CONFIG), configPath, firstRun: true };
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(configPath, "utf-8"));
  } catch (err) {
    throw new SetupError(SetupErrorCode.CONFIG_INVALID, `Failed to parse config: ${describeError(err)}`, { configPath });
  }
  if (parsed !== null && parsed !== undefined && !isPlainObject(parsed)) {
    throw new SetupError(SetupErrorCode.CONFIG_INVALID, "Config root must be a mapping", { configPath });
  }

  const merged = deepMerge(toRecord(DEFAULT_CONFIG), isPlainObject(parsed) ? parsed : {});
  const validated = configSchema.safeParse(merged);
  if (!validated.success) {
    throw new SetupError(SetupErrorCode.CONFIG_INVALID, "Config file is invalid", {
      configPath,
      issues: validated.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
  }
  return { config: validated.data, configPath, firstRun: false };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function toRecord(config: SetupConfig): Record<string, unknown> {
  return Object.fromEntries(Object.entries(config));
}

/** Deep merge b into a (a provides defaults, b overrides). */
export function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isPlainObject(aVal) && isPlainObject(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}
