import type { Command } from "../../types/command.js";

/** Group membership and udev reload, identical across systemd families. */
export function udevAccessCommands(group: string, user: string): Command[] {
  return [
    { argv: ["sudo", "usermod", "-aG", group, user], inherit: true },
    { argv: ["sudo", "udevadm", "control", "--reload-rules"], inherit: true },
    { argv: ["sudo", "udevadm", "trigger"], inherit: true },
  ];
}
