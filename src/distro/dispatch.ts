// Dispatch table: canonical distribution names and the family each one uses.
// Adding a distribution requires (1) a key here, (2) an alias for its os-release ID
// or lsb_release output, and (3) a commands class if it brings a new family.
import type { DistroFamily } from "../types/distro.js";

export const DISPATCH_TABLE: Readonly<Record<string, DistroFamily>> = {
  "Arch Linux": "arch",
  "Manjaro Linux": "arch",
  "EndeavourOS": "arch",
  "Garuda Linux": "arch",
  "Ubuntu": "debian",
  "Debian GNU/Linux": "debian",
  "Linux Mint": "debian",
  "Pop!_OS": "debian",
  "elementary OS": "debian",
  "Zorin OS": "debian",
  "Fedora Linux": "fedora",
  "Nobara Linux": "fedora",
  "openSUSE Tumbleweed": "opensuse",
  "openSUSE Leap": "opensuse",
};

/** Lower-case os-release IDs and lsb_release identifiers → dispatch key. */
const ALIASES: Readonly<Record<string, string>> = {
  arch: "Arch Linux",
  archlinux: "Arch Linux",
  manjaro: "Manjaro Linux",
  manjarolinux: "Manjaro Linux",
  endeavouros: "EndeavourOS",
  garuda: "Garuda Linux",
  ubuntu: "Ubuntu",
  debian: "Debian GNU/Linux",
  linuxmint: "Linux Mint",
  pop: "Pop!_OS",
  elementary: "elementary OS",
  zorin: "Zorin OS",
  fedora: "Fedora Linux",
  nobara: "Nobara Linux",
  "opensuse-tumbleweed": "openSUSE Tumbleweed",
  "opensuse-leap": "openSUSE Leap",
  opensuse: "openSUSE Tumbleweed",
  suse: "openSUSE Tumbleweed",
};

export function isDispatchKey(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(DISPATCH_TABLE, name);
}

export function familyOf(name: string): DistroFamily | null {
  return isDispatchKey(name) ? DISPATCH_TABLE[name] : null;
}

/**
 * Map a reported distribution name to a dispatch key: exact match, then
 * case-insensitive match, then the name and the os-release IDs (ID, then ID_LIKE
 * entries in order) through the alias table.
 */
export function resolveDispatchKey(name: string, ids: readonly string[] = []): string | null {
  if (isDispatchKey(name)) return name;

  const lowered = name.trim().toLowerCase();
  const caseInsensitive = Object.keys(DISPATCH_TABLE).find((key) => key.toLowerCase() === lowered);
  if (caseInsensitive) return caseInsensitive;

  for (const candidate of [lowered.replace(/\s+/g, ""), ...ids.map((id) => id.trim().toLowerCase())]) {
    if (candidate && Object.prototype.hasOwnProperty.call(ALIASES, candidate)) return ALIASES[candidate];
  }
  return null;
}
