/** Logging sink for the clock runtime. Defaults to `console`. */
export type ClockLogger = Pick<Console, "warn" | "error">;

/** Prefix on every message the runtime logs. */
export const LOG_PREFIX = "[clockface]";
