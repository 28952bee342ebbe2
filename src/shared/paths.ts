import { homedir } from "node:os";
import { join } from "node:path";

/** Expand a leading `~` to the given home directory. */
export function expandHome(p: string, home: string = homedir()): string {
  if (p === "~") return home;
  if (p.startsWith("~/")) return join(home, p.slice(2));
  return p;
}
