import type { Command, DurationCategory } from "../types/command.js";
import { DURATION_TIMEOUTS } from "../types/command.js";
import type { SetupConfig } from "../types/config.js";
import type { ExecResult, Executor } from "./executor.js";
import type { CleanupRegistry } from "./cleanup.js";

/** Everything a provisioning stage needs besides its own arguments. */
export interface SetupContext {
  readonly config: SetupConfig;
  readonly executor: Executor;
  readonly cleanup: CleanupRegistry;
  readonly env: NodeJS.ProcessEnv;
  readonly home: string;
}

/** Timeout for a duration category, capped by the configured ceiling. */
export function timeoutFor(config: SetupConfig, duration: DurationCategory): number {
  const base = DURATION_TIMEOUTS[duration];
  const ceiling = config.timeouts.command_ceiling_seconds * 1000;
  if (ceiling <= 0) return base;
  return base === 0 ? ceiling : Math.min(base, ceiling);
}

/** Execute a Command through the context's executor. */
export async function executeCommand(ctx: SetupContext, command: Command, duration: DurationCategory): Promise<ExecResult> {
  return ctx.executor.execute(command, timeoutFor(ctx.config, duration));
}

/** Check whether a binary is resolvable on PATH. */
export async function commandExists(ctx: SetupContext, binary: string): Promise<boolean> {
  const r = await executeCommand(ctx, { argv: ["bash", "-c", `command -v ${binary}`] }, "instant");
  return r.exitCode === 0;
}
