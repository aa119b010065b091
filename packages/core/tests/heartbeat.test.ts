import { describe, it, expect, vi } from "vitest";
import {
  ALIGNMENT_OFFSET_MS,
  Heartbeat,
  HeartbeatError,
  TICK_PERIOD_MS,
  TestTimerService,
  computeAlignmentDelay,
} from "../src/index.js";
import type { CancelHandle, HeartbeatMessage, TimerService } from "../src/index.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** 10:15:00.250 local time. */
const START = new Date(2024, 5, 15, 10, 15, 0, 250).getTime();

function createHeartbeat(timer: TimerService) {
  const messages: HeartbeatMessage["kind"][] = [];
  const deliveredAt: number[] = [];
  const onFatal = vi.fn();
  const heartbeat = new Heartbeat(
    timer,
    (message) => {
      messages.push(message.kind);
      deliveredAt.push(timer.now());
    },
    onFatal,
  );
  return { heartbeat, messages, deliveredAt, onFatal };
}

function catchError(fn: () => void): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

/** A timer service whose cancel handles do nothing, to simulate late callbacks. */
class LeakyTimerService implements TimerService {
  readonly once: Array<() => void> = [];
  readonly repeating: Array<() => void> = [];

  now(): number {
    return START;
  }

  scheduleOnce(_delayMs: number, callback: () => void): CancelHandle {
    this.once.push(callback);
    return { cancel: () => undefined };
  }

  scheduleRepeating(_periodMs: number, callback: () => void): CancelHandle {
    this.repeating.push(callback);
    return { cancel: () => undefined };
  }
}

// ---------------------------------------------------------------------------
// Alignment delay
// ---------------------------------------------------------------------------

describe("computeAlignmentDelay", () => {
  it("lands one millisecond after the next second boundary", () => {
    expect(ALIGNMENT_OFFSET_MS).toBe(1);
    expect(TICK_PERIOD_MS).toBe(1000);
    expect(computeAlignmentDelay(START)).toBe(751);
  });

  it("equals 1001 - ms for every offset within the second", () => {
    for (const ms of [0, 1, 250, 500, 998, 999]) {
      expect(computeAlignmentDelay(1_700_000_000_000 + ms)).toBe(1001 - ms);
    }
  });

  it("is always strictly positive", () => {
    expect(computeAlignmentDelay(999)).toBe(2);
    expect(computeAlignmentDelay(1000)).toBe(1001);
  });

  it("handles times before the epoch", () => {
    expect(computeAlignmentDelay(-250)).toBe(251);
  });

  it("ignores sub-millisecond fractions", () => {
    expect(computeAlignmentDelay(1_250.75)).toBe(751);
  });
});

// ---------------------------------------------------------------------------
// Heartbeat
// ---------------------------------------------------------------------------

describe("Heartbeat", () => {
  it("schedules a single alignment one-shot on start", () => {
    const timer = new TestTimerService(START);
    const { heartbeat, messages } = createHeartbeat(timer);

    heartbeat.start();

    expect(timer.pendingCount).toBe(1);
    expect(heartbeat.running).toBe(true);
    expect(heartbeat.phaseLocked).toBe(false);
    expect(messages).toEqual([]);
  });

  it("delivers start_heartbeat just after the second boundary", () => {
    const timer = new TestTimerService(START);
    const { heartbeat, messages } = createHeartbeat(timer);

    heartbeat.start();
    timer.advance(750);
    expect(messages).toEqual([]);

    timer.advance(1);
    expect(messages).toEqual(["start_heartbeat"]);
    expect(timer.now() % 1000).toBe(1);
    expect(heartbeat.phaseLocked).toBe(true);
  });

  it("delivers one tick per second after the phase lock", () => {
    const timer = new TestTimerService(START);
    const { heartbeat, messages, deliveredAt } = createHeartbeat(timer);

    heartbeat.start();
    timer.advance(751 + 3 * 1000);

    expect(messages).toEqual(["start_heartbeat", "tick", "tick", "tick"]);
    expect(deliveredAt.map((t) => t - START)).toEqual([751, 1751, 2751, 3751]);
  });

  it("stop() cancels the alignment one-shot", () => {
    const timer = new TestTimerService(START);
    const { heartbeat, messages } = createHeartbeat(timer);

    heartbeat.start();
    heartbeat.stop();
    timer.advance(10_000);

    expect(messages).toEqual([]);
    expect(timer.pendingCount).toBe(0);
    expect(heartbeat.running).toBe(false);
  });

  it("stop() cancels the repeating timer", () => {
    const timer = new TestTimerService(START);
    const { heartbeat, messages } = createHeartbeat(timer);

    heartbeat.start();
    timer.advance(751 + 1000);
    heartbeat.stop();
    timer.advance(5_000);

    expect(messages).toEqual(["start_heartbeat", "tick"]);
    expect(timer.pendingCount).toBe(0);
  });

  it("delivers nothing when a cancelled timer fires anyway", () => {
    const timer = new LeakyTimerService();
    const { heartbeat, messages } = createHeartbeat(timer);

    heartbeat.start();
    timer.once[0]?.();
    heartbeat.stop();
    timer.repeating[0]?.();
    timer.once[0]?.();

    expect(messages).toEqual(["start_heartbeat"]);
  });

  it("refuses to start twice", () => {
    const { heartbeat } = createHeartbeat(new TestTimerService(START));
    heartbeat.start();

    const error = catchError(() => heartbeat.start());
    expect(error).toBeInstanceOf(HeartbeatError);
    expect(error instanceof HeartbeatError && error.code).toBe("already_started");
  });

  it("refuses to restart after stop", () => {
    const { heartbeat } = createHeartbeat(new TestTimerService(START));
    heartbeat.start();
    heartbeat.stop();

    expect(() => heartbeat.start()).toThrow(/cannot be restarted/);
  });

  it("surfaces a timer failure at start as a fatal error", () => {
    const cause = new Error("no timers left");
    const timer: TimerService = {
      now: () => START,
      scheduleOnce: () => {
        throw cause;
      },
      scheduleRepeating: () => ({ cancel: () => undefined }),
    };
    const { heartbeat } = createHeartbeat(timer);

    const error = catchError(() => heartbeat.start());

    expect(error).toBeInstanceOf(HeartbeatError);
    expect(error instanceof HeartbeatError && error.code).toBe("timer_unavailable");
    expect(error instanceof HeartbeatError && error.cause).toBe(cause);
    expect(heartbeat.running).toBe(false);
  });

  it("reports a repeating-timer failure through onFatal", () => {
    const timer = new TestTimerService(START);
    vi.spyOn(timer, "scheduleRepeating").mockImplementation(() => {
      throw new Error("interval refused");
    });
    const { heartbeat, messages, onFatal } = createHeartbeat(timer);

    heartbeat.start();
    timer.advance(751);

    expect(messages).toEqual([]);
    expect(onFatal).toHaveBeenCalledTimes(1);
    const reported: unknown = onFatal.mock.calls[0]?.[0];
    expect(reported instanceof HeartbeatError && reported.code).toBe("timer_unavailable");
    expect(heartbeat.running).toBe(false);
  });
});
