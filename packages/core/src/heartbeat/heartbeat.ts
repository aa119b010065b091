/**
 * Heartbeat: The phase-aligned one-second timer that drives the clock.
 *
 * Startup schedules a single one-shot timer that lands just after the
 * next second boundary. When it fires, a repeating one-second timer takes
 * over. The phase is locked once and never re-aligned; long-run drift is
 * bounded by the timer service's own accuracy.
 */

import { HeartbeatError } from "../errors.js";
import type { CancelHandle, TimerService } from "../timer/timer.js";

/** Period of the steady-state tick. */
export const TICK_PERIOD_MS = 1000;

/** How far past the second boundary ticks are aimed. A tick before the boundary would read the previous second. */
export const ALIGNMENT_OFFSET_MS = 1;

/** Messages the heartbeat delivers to its owner. */
export type HeartbeatMessage =
  | { readonly kind: "start_heartbeat" }
  | { readonly kind: "tick" };

/**
 * Delay from `nowMs` until `ALIGNMENT_OFFSET_MS` past the next second
 * boundary. Always in [2, 1001].
 */
export function computeAlignmentDelay(nowMs: number): number {
  const intoSecond = Math.trunc(((nowMs % TICK_PERIOD_MS) + TICK_PERIOD_MS) % TICK_PERIOD_MS);
  return TICK_PERIOD_MS + ALIGNMENT_OFFSET_MS - intoSecond;
}

/**
 * Owns the alignment one-shot and the repeating tick timer.
 *
 * Callbacks only deliver messages; the owner decides what a tick does.
 * After `stop()` nothing is delivered, even if the timer service fires a
 * callback it was asked to cancel.
 */
export class Heartbeat {
  private readonly timer: TimerService;
  private readonly deliver: (message: HeartbeatMessage) => void;
  private readonly onFatal: (error: HeartbeatError) => void;
  private alignHandle: CancelHandle | null = null;
  private tickHandle: CancelHandle | null = null;
  private started = false;
  private stopped = false;

  /**
   * @param deliver - Receives every heartbeat message, in firing order.
   * @param onFatal - Called when the repeating timer cannot be created
   *   inside the alignment callback. The heartbeat is already stopped.
   */
  constructor(
    timer: TimerService,
    deliver: (message: HeartbeatMessage) => void,
    onFatal: (error: HeartbeatError) => void,
  ) {
    this.timer = timer;
    this.deliver = deliver;
    this.onFatal = onFatal;
  }

  /**
   * Schedule the alignment one-shot.
   *
   * @throws HeartbeatError when already started, stopped, or when the
   *   timer service fails.
   */
  start(): void {
    if (this.stopped) {
      throw new HeartbeatError("disposed", "Heartbeat was stopped and cannot be restarted");
    }
    if (this.started) {
      throw new HeartbeatError("already_started", "Heartbeat is already running");
    }
    this.started = true;

    const delay = computeAlignmentDelay(this.timer.now());
    try {
      this.alignHandle = this.timer.scheduleOnce(delay, () => this.align());
    } catch (error) {
      this.stop();
      throw new HeartbeatError("timer_unavailable", "Could not schedule the alignment timer", error);
    }
  }

  /** Cancel every pending timer. Idempotent. */
  stop(): void {
    this.stopped = true;
    this.alignHandle?.cancel();
    this.alignHandle = null;
    this.tickHandle?.cancel();
    this.tickHandle = null;
  }

  /** True between `start()` and `stop()`. */
  get running(): boolean {
    return this.started && !this.stopped;
  }

  /** True once the repeating timer has taken over from the alignment one-shot. */
  get phaseLocked(): boolean {
    return this.tickHandle !== null;
  }

  private align(): void {
    if (this.stopped) return;
    this.alignHandle = null;

    try {
      this.tickHandle = this.timer.scheduleRepeating(TICK_PERIOD_MS, () => {
        if (!this.stopped) {
          this.deliver({ kind: "tick" });
        }
      });
    } catch (error) {
      this.stop();
      this.onFatal(new HeartbeatError("timer_unavailable", "Could not start the repeating tick timer", error));
      return;
    }

    this.deliver({ kind: "start_heartbeat" });
  }
}
