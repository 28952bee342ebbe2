export enum SetupErrorCode {
  UNSUPPORTED_PLATFORM = "UNSUPPORTED_PLATFORM",
  INSTALL_FAILED = "INSTALL_FAILED",
  RESOLUTION_FAILED = "RESOLUTION_FAILED",
  FETCH_FAILED = "FETCH_FAILED",
  JAVA_NOT_FOUND = "JAVA_NOT_FOUND",
  IO_ERROR = "IO_ERROR",
  CONFIG_INVALID = "CONFIG_INVALID",
  USER_CANCELLED = "USER_CANCELLED",
}

export class SetupError extends Error {
  readonly code: SetupErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: SetupErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "SetupError";
    this.code = code;
    this.context = context;
  }
}

/** Render an unknown thrown value as a message string. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
