import { readFile } from "node:fs/promises";
import type { DistributionInfo, ProbeSource, ToolPaths } from "../types/distro.js";
import type { Executor } from "../execution/executor.js";
import { DURATION_TIMEOUTS } from "../types/command.js";
import { resolveDispatchKey, familyOf } from "./dispatch.js";
import { SetupError, SetupErrorCode } from "../shared/errors.js";
import { ok, fail, type Result } from "../shared/result.js";
import { logger } from "../shared/logger.js";

/** What a single probe learned about the host. */
export interface ProbeResult {
  readonly name: string;
  readonly version: string;
  /** os-release ID followed by ID_LIKE entries; empty for other sources. */
  readonly ids: string[];
  readonly source: ProbeSource;
}

/** Read-only access to the host used by probes. Both calls return null on failure. */
export interface ProbeHost {
  readFile(path: string): Promise<string | null>;
  run(argv: string[]): Promise<string | null>;
}

export type DistroProbe = (host: ProbeHost) => Promise<ProbeResult | null>;

/** Parse KEY=value files (/etc/os-release, /etc/lsb-release). */
export function parseKeyValueFile(content: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const line of content.split("\n")) {
    const match = line.trim().match(/^([A-Z_]+)=(.*)$/);
    if (match) {
      result[match[1]] = match[2].replace(/^["']|["']$/g, "");
    }
  }
  return result;
}

const osReleaseProbe: DistroProbe = async (host) => {
  const content = (await host.readFile("/etc/os-release")) ?? (await host.readFile("/usr/lib/os-release"));
  if (!content) return null;
  const fields = parseKeyValueFile(content);
  const ids = [fields.ID ?? "", ...(fields.ID_LIKE ?? "").split(/\s+/)].filter(Boolean);
  return { name: fields.NAME ?? fields.ID ?? "", version: fields.VERSION_ID ?? "", ids, source: "os-release" };
};

const lsbReleaseCommandProbe: DistroProbe = async (host) => {
  const name = await host.run(["lsb_release", "-si"]);
  if (!name) return null;
  const version = (await host.run(["lsb_release", "-sr"])) ?? "";
  return { name, version: version === "n/a" ? "" : version, ids: [], source: "lsb_release" };
};

const lsbReleaseFileProbe: DistroProbe = async (host) => {
  const content = await host.readFile("/etc/lsb-release");
  if (!content) return null;
  const fields = parseKeyValueFile(content);
  return { name: fields.DISTRIB_ID ?? "", version: fields.DISTRIB_RELEASE ?? "", ids: [], source: "lsb-release-file" };
};

const unameProbe: DistroProbe = async (host) => {
  const name = await host.run(["uname", "-s"]);
  if (!name) return null;
  const version = (await host.run(["uname", "-r"])) ?? "";
  return { name, version, ids: [], source: "uname" };
};

/** Probes in priority order; the first one yielding a non-empty name wins. */
export const DEFAULT_PROBES: readonly DistroProbe[] = [
  osReleaseProbe,
  lsbReleaseCommandProbe,
  lsbReleaseFileProbe,
  unameProbe,
];

/** ProbeHost over the real filesystem and the given executor. */
export function createProbeHost(executor: Executor): ProbeHost {
  return {
    async readFile(path) {
      try {
        return await readFile(path, "utf-8");
      } catch {
        return null;
      }
    },
    async run(argv) {
      const r = await executor.execute({ argv }, DURATION_TIMEOUTS.instant);
      const out = r.stdout.trim();
      return r.exitCode === 0 && out ? out : null;
    },
  };
}

/**
 * Detect the host distribution and map it to a dispatch key.
 * An explicit override (config `distro.name`) bypasses the probes.
 */
export async function detect(
  host: ProbeHost,
  options: { probes?: readonly DistroProbe[]; override?: { name?: string; version?: string } } = {},
): Promise<Result<DistributionInfo>> {
  let found: ProbeResult | null = null;

  if (options.override?.name) {
    found = { name: options.override.name, version: options.override.version ?? "", ids: [], source: "config" };
  } else {
    for (const probe of options.probes ?? DEFAULT_PROBES) {
      const r = await probe(host);
      if (r && r.name.trim()) {
        found = { ...r, name: r.name.trim() };
        break;
      }
    }
  }

  if (!found) {
    return fail(new SetupError(SetupErrorCode.UNSUPPORTED_PLATFORM, "Could not identify the host distribution"));
  }

  const key = resolveDispatchKey(found.name, found.ids);
  const family = key ? familyOf(key) : null;
  if (!key || !family) {
    return fail(new SetupError(
      SetupErrorCode.UNSUPPORTED_PLATFORM,
      `Unsupported distribution: ${found.name}`,
      { source: found.source, ids: found.ids },
    ));
  }

  const info: DistributionInfo = {
    name: key,
    prettyName: found.name,
    version: options.override?.version ?? found.version,
    family,
    source: found.source,
  };
  logger.info({ distro: info }, "Distribution detected");
  return ok(info);
}

/** Toolchain locations the user already exported before this run. */
export function detectToolHomes(env: NodeJS.ProcessEnv): Partial<ToolPaths> {
  const pick = (...keys: string[]): string | undefined => {
    for (const key of keys) {
      const v = env[key]?.trim();
      if (v) return v;
    }
    return undefined;
  };
  const homes: { flutterHome?: string; androidHome?: string; javaHome?: string } = {};
  const flutterHome = pick("FLUTTER_HOME");
  const androidHome = pick("ANDROID_HOME", "ANDROID_SDK_ROOT");
  const javaHome = pick("JAVA_HOME");
  if (flutterHome) homes.flutterHome = flutterHome;
  if (androidHome) homes.androidHome = androidHome;
  if (javaHome) homes.javaHome = javaHome;
  return homes;
}
