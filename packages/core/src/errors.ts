/**
 * Error types raised while constructing or starting a clock.
 *
 * Steady-state ticking never throws; these only surface from
 * construction and `start()`.
 */

/** Base class for every clockface error. `code` is stable and machine-readable. */
export class ClockfaceError extends Error {
  public readonly code: string;

  constructor(code: string, message: string, cause?: unknown) {
    super(message);
    this.name = "ClockfaceError";
    this.code = code;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/** The construction options are malformed. */
export class ClockConfigError extends ClockfaceError {
  /** One `path: message` entry per problem found. */
  public readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super("invalid_options", `Invalid clock options: ${issues.join("; ")}`);
    this.name = "ClockConfigError";
    this.issues = issues;
  }
}

/** The heartbeat could not be started. */
export class HeartbeatError extends ClockfaceError {
  constructor(code: "timer_unavailable" | "already_started" | "disposed", message: string, cause?: unknown) {
    super(code, message, cause);
    this.name = "HeartbeatError";
  }
}
