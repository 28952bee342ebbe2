// Package catalog loader: reads catalog/packages.yaml shipped next to dist/ and src/.
// Per-family names are resolved here so the installer only ever sees real package names.
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { DistroFamily } from "../types/distro.js";
import type { PackageSpec } from "../types/packages.js";
import { SetupError, SetupErrorCode, describeError } from "../shared/errors.js";
import { logger } from "../shared/logger.js";

/** Package names as the package managers accept them. */
export const PACKAGE_NAME = /^[A-Za-z0-9@][A-Za-z0-9@._+-]*$/;

const packageName = z.string().regex(PACKAGE_NAME, "invalid package name");

const catalogSchema = z.object({
  packages: z.array(z.object({
    name: packageName,
    names: z.object({
      arch: packageName.nullable(),
      debian: packageName.nullable(),
      fedora: packageName.nullable(),
      opensuse: packageName.nullable(),
    }).partial().optional(),
  })).min(1),
});

export const DEFAULT_CATALOG_PATH = join(__dirname, "..", "..", "catalog", "packages.yaml");

/** Load and validate a package catalog file. Throws CONFIG_INVALID on bad content. */
export function loadCatalog(path: string = DEFAULT_CATALOG_PATH): PackageSpec[] {
  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new SetupError(SetupErrorCode.CONFIG_INVALID, `Could not read package catalog: ${describeError(err)}`, { path });
  }
  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SetupError(SetupErrorCode.CONFIG_INVALID, "Package catalog is malformed", {
      path,
      issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
  }
  logger.debug({ path, count: parsed.data.packages.length }, "Package catalog loaded");
  return parsed.data.packages;
}

/** Name of a spec on a family, or null when the family does not need it. */
export function packageNameFor(spec: PackageSpec, family: DistroFamily): string | null {
  const override = spec.names?.[family];
  if (override === null) return null;
  return override ?? spec.name;
}

/**
 * Final package list for a run: catalog entries plus configured extras,
 * minus skipped names (matched against either the canonical or family name).
 */
export function selectPackages(catalog: readonly PackageSpec[], extra: readonly string[], skip: readonly string[]): PackageSpec[] {
  const skipSet = new Set(skip);
  const selected = catalog.filter((spec) => !skipSet.has(spec.name) && !Object.values(spec.names ?? {}).some((n) => n !== null && n !== undefined && skipSet.has(n)));
  const known = new Set(selected.map((s) => s.name));
  for (const name of extra) {
    if (!known.has(name) && !skipSet.has(name)) {
      selected.push({ name });
      known.add(name);
    }
  }
  return selected;
}
