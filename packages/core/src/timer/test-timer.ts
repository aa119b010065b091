/**
 * TestTimerService: Deterministic timer service for clock tests.
 *
 * Allows manual time advancement. When `advance(ms)` is called, every
 * callback that falls due within the advanced span fires synchronously,
 * in due-time order, with `now()` set to its due time.
 * No real timers are involved.
 *
 * Like real timers, scheduling runs on elapsed time: `setTime()` moves the
 * wall clock without moving any due time.
 */

import type { CancelHandle, TimerService } from "./timer.js";

interface ScheduledTimer {
  readonly id: number;
  /** Due time in elapsed milliseconds since construction. */
  dueAt: number;
  /** Repeat period, or null for one-shot timers. */
  readonly periodMs: number | null;
  readonly callback: () => void;
}

/**
 * A timer service whose time moves only when explicitly told to.
 *
 * @example
 * ```ts
 * const timer = new TestTimerService(Date.UTC(2024, 0, 1, 10, 15, 0, 250));
 * const heartbeat = new Heartbeat(timer, onMessage);
 *
 * heartbeat.start();   // one-shot scheduled 751ms out
 * timer.advance(751);  // alignment fires, repeating timer starts
 * timer.advance(1000); // one tick
 * ```
 */
export class TestTimerService implements TimerService {
  private elapsed = 0;
  private wallOffset: number;
  private nextId = 1;
  private readonly timers = new Map<number, ScheduledTimer>();

  /** @param startTime - Initial wall-clock time in epoch ms. Defaults to 0. */
  constructor(startTime = 0) {
    this.wallOffset = startTime;
  }

  now(): number {
    return this.wallOffset + this.elapsed;
  }

  scheduleOnce(delayMs: number, callback: () => void): CancelHandle {
    return this.add(delayMs, null, callback);
  }

  scheduleRepeating(periodMs: number, callback: () => void): CancelHandle {
    if (periodMs <= 0) {
      throw new RangeError(`Repeating period must be positive, got ${periodMs}`);
    }
    return this.add(periodMs, periodMs, callback);
  }

  /**
   * Advance time by the given number of milliseconds, firing every
   * callback that becomes due. Timers scheduled during the advance fire
   * within the same advance if they fall due before its end.
   */
  advance(ms: number): void {
    const target = this.elapsed + ms;
    for (;;) {
      const next = this.nextDue(target);
      if (!next) break;
      this.elapsed = next.dueAt;
      if (next.periodMs === null) {
        this.timers.delete(next.id);
      } else {
        next.dueAt += next.periodMs;
      }
      next.callback();
    }
    this.elapsed = target;
  }

  /** Jump the wall clock without firing or moving anything (simulates a clock change). */
  setTime(epochMs: number): void {
    this.wallOffset = epochMs - this.elapsed;
  }

  /** Number of currently scheduled timers (one-shot and repeating). */
  get pendingCount(): number {
    return this.timers.size;
  }

  private add(delayMs: number, periodMs: number | null, callback: () => void): CancelHandle {
    const id = this.nextId++;
    this.timers.set(id, {
      id,
      dueAt: this.elapsed + Math.max(0, delayMs),
      periodMs,
      callback,
    });
    return {
      cancel: () => {
        this.timers.delete(id);
      },
    };
  }

  /** Earliest timer due at or before `limit`; ties go to the oldest timer. */
  private nextDue(limit: number): ScheduledTimer | undefined {
    let best: ScheduledTimer | undefined;
    for (const timer of this.timers.values()) {
      if (timer.dueAt > limit) continue;
      if (!best || timer.dueAt < best.dueAt) {
        best = timer;
      }
    }
    return best;
  }
}
