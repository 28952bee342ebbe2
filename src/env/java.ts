import { statSync } from "node:fs";
import type { DistroFamily } from "../types/distro.js";
import { SetupError, SetupErrorCode } from "../shared/errors.js";
import { ok, fail, type Result } from "../shared/result.js";
import { logger } from "../shared/logger.js";

/** Where each family's JDK 17 package installs itself. */
const FAMILY_JAVA_HOMES: Record<DistroFamily, string[]> = {
  arch: ["/usr/lib/jvm/java-17-openjdk", "/usr/lib/jvm/default"],
  debian: ["/usr/lib/jvm/java-17-openjdk-amd64", "/usr/lib/jvm/java-17-openjdk-arm64", "/usr/lib/jvm/default-java"],
  fedora: ["/usr/lib/jvm/java-17-openjdk", "/usr/lib/jvm/java-17"],
  opensuse: ["/usr/lib64/jvm/java-17-openjdk", "/usr/lib64/jvm/java-17"],
};

/**
 * Ordered, de-duplicated JAVA_HOME candidates: an exported JAVA_HOME first,
 * then configured paths, then the family's package locations.
 */
export function javaHomeCandidates(family: DistroFamily, configured: readonly string[], exported?: string): string[] {
  const ordered = [...(exported ? [exported] : []), ...configured, ...FAMILY_JAVA_HOMES[family]];
  return [...new Set(ordered)];
}

function isDirectory(p: string): boolean {
  try {
    return statSync(p).isDirectory();
  } catch {
    return false;
  }
}

/** First candidate that exists as a directory; JAVA_NOT_FOUND otherwise. */
export function resolveJavaHome(candidates: readonly string[], exists: (p: string) => boolean = isDirectory): Result<string> {
  const found = candidates.find((c) => exists(c));
  if (!found) {
    return fail(new SetupError(SetupErrorCode.JAVA_NOT_FOUND, "No JDK found; install JDK 17 or set java.candidates", {
      candidates: [...candidates],
    }));
  }
  logger.info({ javaHome: found }, "Resolved JAVA_HOME");
  return ok(found);
}
