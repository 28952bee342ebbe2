// Command execution layer: every external process passes through this module.
// Stages depend on the Executor interface only; tests substitute a recording fake.
import execa from "execa";
import type { Command } from "../types/command.js";
import { logger } from "../shared/logger.js";

/** Result of command execution. */
export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly durationMs: number;
}

/** Executor interface. */
export interface Executor {
  execute(command: Command, timeoutMs: number): Promise<ExecResult>;
}

// Shell convention for "command not found"; used when the binary cannot be spawned.
const SPAWN_FAILURE_EXIT = 127;

/** Local executor backed by execa. Never rejects on a non-zero exit. */
export class LocalExecutor implements Executor {
  async execute(command: Command, timeoutMs: number): Promise<ExecResult> {
    const start = performance.now();
    const [cmd, ...args] = command.argv;
    logger.debug({ argv: command.argv }, "Executing command");

    const stdin = command.stdin !== undefined ? "pipe" : command.inherit ? "inherit" : "ignore";
    const output = command.inherit ? "inherit" : "pipe";
    const result = await execa(cmd, args, {
      timeout: timeoutMs,
      // 10MB ceiling on captured output; sdkmanager --list stays well under it.
      maxBuffer: 10 * 1024 * 1024,
      env: command.env,
      extendEnv: true,
      input: command.stdin,
      stdio: [stdin, output, output],
      reject: false,
    });

    const durationMs = Math.round(performance.now() - start);
    const exitCode = typeof result.exitCode === "number" ? result.exitCode : SPAWN_FAILURE_EXIT;
    if (result.timedOut) {
      logger.warn({ argv: command.argv, timeoutMs }, "Command timed out");
    }
    return {
      stdout: result.stdout ?? "",
      stderr: result.stderr || (result.failed && exitCode === SPAWN_FAILURE_EXIT ? `${cmd}: command not found` : ""),
      exitCode,
      durationMs,
    };
  }
}

/** Render a command for log lines and error context. */
export function formatCommand(command: Command): string {
  return command.argv.map((a) => (/[\s'"$;|&]/.test(a) ? `'${a.replace(/'/g, "'\\''")}'` : a)).join(" ");
}
