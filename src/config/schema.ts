import { z } from "zod";
import type { SetupConfig } from "../types/config.js";
import { PACKAGE_NAME } from "../catalog/loader.js";

// Binaries named in config end up on a bash command line (command -v <helper>).
const binaryName = z.string().regex(/^[A-Za-z0-9._+-]+$/, "must be a bare executable name");
const packageName = z.string().regex(PACKAGE_NAME, "invalid package name");

/** Schema for the merged configuration. Defaults are applied before validation. */
export const configSchema: z.ZodType<SetupConfig> = z.object({
  paths: z.object({
    flutter_home: z.string().min(1),
    android_home: z.string().min(1),
  }),
  install: z.object({
    refresh_index: z.boolean(),
    failure_mode: z.enum(["fail-fast", "collect"]),
    extra_packages: z.array(packageName),
    skip_packages: z.array(z.string()),
  }),
  sdk: z.object({
    cmdline_tools_url: z.string().url().nullable(),
    cmdline_tools_version: z.string().regex(/^\d+$/, "must be the numeric build, e.g. 11076708").nullable(),
    download_page: z.string().url(),
    download_base: z.string().url(),
    packages: z.array(z.string().min(1)).min(1),
  }),
  flutter: z.object({
    repository: z.string().min(1),
    channel: z.string().min(1),
  }),
  java: z.object({
    candidates: z.array(z.string()),
  }),
  profile: z.object({
    file: z.string().min(1).nullable(),
  }),
  waydroid: z.object({
    mode: z.enum(["prompt", "always", "never"]),
    aur_helper: binaryName,
  }),
  device_access: z.object({
    enabled: z.boolean(),
  }),
  timeouts: z.object({
    command_ceiling_seconds: z.number().int().min(0),
  }),
  distro: z.object({
    name: z.string().optional(),
    version: z.string().optional(),
  }).optional(),
});
