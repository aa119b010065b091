/**
 * NodeTimerService: Real-time timer service backed by Node.js timers.
 *
 * Uses `Date.now()` for wall-clock time and `setTimeout` / `setInterval`
 * for scheduling. This is the production timer; see `TestTimerService`
 * for tests.
 */

import type { CancelHandle, TimerService } from "./timer.js";

/**
 * A timer service backed by the host's global timers.
 *
 * @example
 * ```ts
 * const timer = new NodeTimerService();
 * const clock = new AnalogClock({ timer, drawingModel: sceneDrawingModel });
 * clock.start(); // ticks once per second, just after each second boundary
 * ```
 */
export class NodeTimerService implements TimerService {
  /** Current wall-clock time in epoch milliseconds. */
  now(): number {
    return Date.now();
  }

  scheduleOnce(delayMs: number, callback: () => void): CancelHandle {
    const id = setTimeout(callback, delayMs);
    return { cancel: () => clearTimeout(id) };
  }

  scheduleRepeating(periodMs: number, callback: () => void): CancelHandle {
    const id = setInterval(callback, periodMs);
    return { cancel: () => clearInterval(id) };
  }
}
