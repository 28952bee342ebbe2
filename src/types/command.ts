/**
 * A structured command ready for execution.
 * Stage code never builds raw command strings; it produces Command objects.
 */
export interface Command {
  readonly argv: string[];
  readonly env?: Record<string, string>;
  readonly stdin?: string;
  /** Stream output straight to the terminal instead of capturing it. */
  readonly inherit?: boolean;
}

/** Duration category for command timeouts. */
export type DurationCategory = "instant" | "quick" | "normal" | "long_running";

/** Timeout in ms per duration category. 0 disables the timeout. */
export const DURATION_TIMEOUTS: Record<DurationCategory, number> = {
  instant: 5_000,
  quick: 15_000,
  normal: 120_000,
  long_running: 0,
};
