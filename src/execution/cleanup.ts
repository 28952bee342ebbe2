import { logger } from "../shared/logger.js";
import { describeError } from "../shared/errors.js";

type CleanupHook = () => Promise<void> | void;

/**
 * Process-exit cleanup hooks (temp download directories and the like).
 * Runs on normal completion, on a failed stage and on SIGINT/SIGTERM.
 * Each hook runs at most once, in reverse registration order.
 */
export class CleanupRegistry {
  private readonly hooks: Array<{ label: string; hook: CleanupHook }> = [];
  private readonly signalHandlers = new Map<NodeJS.Signals, () => void>();

  register(label: string, hook: CleanupHook): void {
    this.hooks.push({ label, hook });
  }

  get size(): number {
    return this.hooks.length;
  }

  async runAll(): Promise<void> {
    while (this.hooks.length > 0) {
      const entry = this.hooks.pop();
      if (!entry) break;
      try {
        await entry.hook();
        logger.debug({ hook: entry.label }, "Cleanup hook finished");
      } catch (err) {
        logger.warn({ hook: entry.label, error: describeError(err) }, "Cleanup hook failed");
      }
    }
  }

  /** Run hooks then exit when the user interrupts the run. */
  installSignalHandlers(exit: (code: number) => void = (code) => process.exit(code)): void {
    for (const signal of ["SIGINT", "SIGTERM"] as const) {
      const handler = (): void => {
        logger.warn({ signal }, "Interrupted, running cleanup");
        this.runAll().then(
          () => exit(130),
          () => exit(130),
        );
      };
      this.signalHandlers.set(signal, handler);
      process.once(signal, handler);
    }
  }

  removeSignalHandlers(): void {
    for (const [signal, handler] of this.signalHandlers) {
      process.removeListener(signal, handler);
    }
    this.signalHandlers.clear();
  }
}
