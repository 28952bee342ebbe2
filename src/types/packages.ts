import type { DistroFamily } from "./distro.js";

/**
 * One entry of the package catalog. A per-family name overrides `name`;
 * `null` marks a package the family does not need.
 */
export interface PackageSpec {
  readonly name: string;
  readonly names?: Partial<Record<DistroFamily, string | null>>;
}

/** Outcome of an install stage. */
export interface InstallReport {
  readonly installed: string[];
  readonly skipped: string[];
  readonly failed: string[];
}
