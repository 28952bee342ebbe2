/** Package-manager family a distribution dispatches to. */
export type DistroFamily = "arch" | "debian" | "fedora" | "opensuse";

/** Which probe produced the distribution name. */
export type ProbeSource = "os-release" | "lsb_release" | "lsb-release-file" | "uname" | "config";

/**
 * Detected host distribution. Read-only once detected.
 * `name` is always a dispatch key; `prettyName` is what the host reported.
 */
export interface DistributionInfo {
  readonly name: string;
  readonly prettyName: string;
  readonly version: string;
  readonly family: DistroFamily;
  readonly source: ProbeSource;
}

/** Filesystem locations of the installed toolchain. */
export interface ToolPaths {
  readonly flutterHome: string;
  readonly androidHome: string;
  readonly javaHome: string;
}
