/**
 * Timer abstraction for the clock runtime.
 *
 * Allows the clock to run on Node.js timers in production and on manual
 * time advancement in tests.
 */

/** Handle returned by scheduling operations. Call `cancel()` to unschedule. */
export interface CancelHandle {
  cancel(): void;
}

/**
 * Wall-clock time source and timer scheduler.
 *
 * The clock runtime never calls `Date.now()` or `setTimeout` directly;
 * it always goes through a TimerService. This makes the heartbeat fully
 * testable with deterministic time.
 */
export interface TimerService {
  /** Current wall-clock time in epoch milliseconds. */
  now(): number;

  /**
   * Run a callback once after a delay.
   *
   * @param delayMs - Delay in milliseconds.
   * @returns A handle to cancel the callback before it fires.
   */
  scheduleOnce(delayMs: number, callback: () => void): CancelHandle;

  /**
   * Run a callback repeatedly at a fixed period.
   * The first call happens one period after scheduling.
   *
   * @param periodMs - Period in milliseconds.
   * @returns A handle that stops all further calls.
   */
  scheduleRepeating(periodMs: number, callback: () => void): CancelHandle;
}
