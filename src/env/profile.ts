import { join, basename } from "node:path";
import type { ToolPaths } from "../types/distro.js";
import { expandHome } from "../shared/paths.js";

export const BLOCK_START = "# >>> flutter-android-setup >>>";
export const BLOCK_END = "# <<< flutter-android-setup <<<";

export type ProfileSyntax = "posix" | "fish";

/** Profile file for the user's shell: explicit override, else chosen by $SHELL. */
export function resolveProfileFile(env: NodeJS.ProcessEnv, home: string, override?: string | null): string {
  if (override) return expandHome(override, home);
  switch (basename(env.SHELL ?? "")) {
    case "zsh": return join(home, ".zshrc");
    case "fish": return join(home, ".config", "fish", "config.fish");
    default: return join(home, ".bashrc");
  }
}

export function profileSyntax(profileFile: string): ProfileSyntax {
  return profileFile.endsWith(".fish") ? "fish" : "posix";
}

function quote(value: string): string {
  return `"${value.replace(/(["\\$`])/g, "\\$1")}"`;
}

/** Export block for the toolchain, fenced by the sentinel lines. */
export function renderEnvBlock(paths: ToolPaths, syntax: ProfileSyntax): string {
  const pathEntries = [
    "$FLUTTER_HOME/bin",
    "$ANDROID_HOME/cmdline-tools/latest/bin",
    "$ANDROID_HOME/platform-tools",
    "$ANDROID_HOME/emulator",
  ];
  const body = syntax === "fish"
    ? [
        `set -gx FLUTTER_HOME ${quote(paths.flutterHome)}`,
        `set -gx ANDROID_HOME ${quote(paths.androidHome)}`,
        "set -gx ANDROID_SDK_ROOT $ANDROID_HOME",
        `set -gx JAVA_HOME ${quote(paths.javaHome)}`,
        `fish_add_path -g -a ${pathEntries.join(" ")}`,
      ]
    : [
        `export FLUTTER_HOME=${quote(paths.flutterHome)}`,
        `export ANDROID_HOME=${quote(paths.androidHome)}`,
        'export ANDROID_SDK_ROOT="$ANDROID_HOME"',
        `export JAVA_HOME=${quote(paths.javaHome)}`,
        `export PATH="$PATH:${pathEntries.join(":")}"`,
      ];
  return [BLOCK_START, ...body, BLOCK_END].join("\n");
}

export type UpsertAction = "appended" | "replaced" | "unchanged";

/**
 * Insert or refresh the fenced block in profile content, keeping the file's
 * line endings. Returns null when a start sentinel has no matching end sentinel.
 */
export function upsertBlock(content: string, block: string): { content: string; action: UpsertAction } | null {
  const eol = content.includes("\r\n") ? "\r\n" : "\n";
  const blockLines = block.split("\n");
  const lines = content.split(/\r?\n/);
  const start = lines.indexOf(BLOCK_START);
  if (start === -1) {
    if (content.length === 0) return { content: `${block}\n`, action: "appended" };
    const sep = content.endsWith("\n") ? eol : eol + eol;
    return { content: `${content}${sep}${blockLines.join(eol)}${eol}`, action: "appended" };
  }

  const end = lines.indexOf(BLOCK_END, start + 1);
  if (end === -1) return null;

  const existing = lines.slice(start, end + 1).join("\n");
  if (existing === block) return { content, action: "unchanged" };
  const next = [...lines.slice(0, start), ...blockLines, ...lines.slice(end + 1)];
  return { content: next.join(eol), action: "replaced" };
}
