import { describe, it, expect } from "vitest";
import {
  TWO_PI,
  buildPatch,
  computeGeometry,
  computeHandAngles,
  computeHandPercents,
  createClockState,
  resolveSample,
  sampleFromDate,
  samplesEqual,
  updateClock,
} from "../src/index.js";
import type { ClockState, TimeSample } from "../src/index.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function at(hour: number, minute: number, second: number, day = "2024-06-15"): TimeSample {
  return { hour, minute, second, day };
}

function minutesOnly(): ClockState {
  return createClockState(false, computeGeometry(10));
}

function withSeconds(): ClockState {
  return createClockState(true, computeGeometry(10));
}

// ---------------------------------------------------------------------------
// Hand angles
// ---------------------------------------------------------------------------

describe("computeHandPercents", () => {
  it("puts every hand at the top at midnight", () => {
    expect(computeHandPercents(at(0, 0, 0))).toEqual({ hour: 0, minute: 0, second: 0 });
  });

  it("renders noon like midnight on the hour hand", () => {
    expect(computeHandPercents(at(12, 0, 0)).hour).toBe(0);
    expect(computeHandAngles(at(12, 0, 0))).toEqual(computeHandAngles(at(0, 0, 0)));
  });

  it("reduces afternoon hours modulo 12", () => {
    expect(computeHandPercents(at(15, 0, 0)).hour).toBe(0.25);
    expect(computeHandPercents(at(3, 0, 0)).hour).toBe(0.25);
  });

  it("creeps the minute hand with the seconds and the hour hand with the minutes", () => {
    const percents = computeHandPercents(at(10, 15, 30));
    expect(percents.minute).toBeCloseTo(15.5 / 60, 12);
    expect(percents.hour).toBeCloseTo((10 + 15.5 / 60) / 12, 12);
  });

  it("stays below a full turn at the last second of the day", () => {
    const percents = computeHandPercents(at(23, 59, 59));
    expect(percents.second).toBeLessThan(1);
    expect(percents.minute).toBeCloseTo(0.9997222222, 9);
    expect(percents.hour).toBeCloseTo(0.9999768519, 9);
    expect(percents.hour).toBeLessThan(1);
  });

  it("keeps every percent in [0, 1) across a whole day", () => {
    for (let hour = 0; hour < 24; hour++) {
      for (let minute = 0; minute < 60; minute += 7) {
        for (let second = 0; second < 60; second += 13) {
          const percents = computeHandPercents(at(hour, minute, second));
          for (const value of [percents.hour, percents.minute, percents.second]) {
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThan(1);
          }
        }
      }
    }
  });
});

describe("computeHandAngles", () => {
  it("computes 06:30:30", () => {
    const angles = computeHandAngles(at(6, 30, 30));
    expect(angles.second).toBeCloseTo(Math.PI, 6);
    expect(angles.minute).toBeCloseTo(3.193952531, 6);
    expect(angles.hour).toBeCloseTo(3.407755365, 6);
  });

  it("maps a quarter past to a quarter turn", () => {
    expect(computeHandAngles(at(9, 15, 0)).minute).toBeCloseTo(TWO_PI / 4, 12);
  });
});

// ---------------------------------------------------------------------------
// Samples
// ---------------------------------------------------------------------------

describe("resolveSample", () => {
  it("drops the seconds when they are not shown", () => {
    expect(resolveSample(at(10, 15, 42), false)).toEqual({
      granularity: "minute",
      day: "2024-06-15",
      hour: 10,
      minute: 15,
    });
  });

  it("keeps the seconds when they are shown", () => {
    expect(resolveSample(at(10, 15, 42), true)).toEqual({
      granularity: "second",
      day: "2024-06-15",
      hour: 10,
      minute: 15,
      second: 42,
    });
  });

  it("returns a frozen sample", () => {
    expect(Object.isFrozen(resolveSample(at(1, 2, 3), true))).toBe(true);
  });
});

describe("samplesEqual", () => {
  it("compares minute samples without the seconds", () => {
    expect(samplesEqual(resolveSample(at(10, 15, 1), false), resolveSample(at(10, 15, 59), false))).toBe(true);
  });

  it("compares second samples field by field", () => {
    expect(samplesEqual(resolveSample(at(10, 15, 1), true), resolveSample(at(10, 15, 2), true))).toBe(false);
  });

  it("treats a different day as a change", () => {
    expect(
      samplesEqual(resolveSample(at(10, 15, 1, "2024-06-15"), false), resolveSample(at(10, 15, 1, "2024-06-16"), false)),
    ).toBe(false);
  });

  it("never equates different granularities", () => {
    expect(samplesEqual(resolveSample(at(10, 15, 1), true), resolveSample(at(10, 15, 1), false))).toBe(false);
  });

  it("handles null", () => {
    expect(samplesEqual(null, null)).toBe(true);
    expect(samplesEqual(null, resolveSample(at(0, 0, 0), false))).toBe(false);
  });
});

describe("sampleFromDate", () => {
  it("reads the local calendar fields", () => {
    const sample = sampleFromDate(new Date(2024, 5, 15, 6, 30, 30, 999));
    expect(sample).toEqual({ hour: 6, minute: 30, second: 30, day: "2024-06-15" });
    expect(Object.isFrozen(sample)).toBe(true);
  });

  it("pads the day", () => {
    expect(sampleFromDate(new Date(2024, 0, 5, 0, 0, 0)).day).toBe("2024-01-05");
  });

  it("throws on an invalid date", () => {
    expect(() => sampleFromDate(new Date(Number.NaN))).toThrow(RangeError);
  });
});

// ---------------------------------------------------------------------------
// Update transition
// ---------------------------------------------------------------------------

describe("updateClock", () => {
  it("emits a two-hand patch on the first update without seconds", () => {
    const { state, patch } = updateClock(minutesOnly(), at(3, 0, 0));

    expect(patch).toEqual([
      { handId: "hour_hand", rotation: TWO_PI / 4 },
      { handId: "minute_hand", rotation: 0 },
    ]);
    expect(state.lastResolvedSample).toEqual({
      granularity: "minute",
      day: "2024-06-15",
      hour: 3,
      minute: 0,
    });
  });

  it("emits a three-hand patch with the second hand last", () => {
    const { patch } = updateClock(withSeconds(), at(6, 30, 30));

    expect(patch?.map((entry) => entry.handId)).toEqual(["hour_hand", "minute_hand", "second_hand"]);
    expect(patch?.[2]?.rotation).toBeCloseTo(Math.PI, 12);
  });

  it("returns no patch for the same sample twice", () => {
    const first = updateClock(withSeconds(), at(10, 15, 1));
    const second = updateClock(first.state, at(10, 15, 1));

    expect(second.patch).toBeNull();
    expect(second.state).toBe(first.state);
  });

  it("skips second ticks within the same minute when seconds are hidden", () => {
    const first = updateClock(minutesOnly(), at(10, 15, 0));
    const second = updateClock(first.state, at(10, 15, 1));
    const third = updateClock(second.state, at(10, 15, 2));

    expect(first.patch).not.toBeNull();
    expect(second.patch).toBeNull();
    expect(third.patch).toBeNull();
  });

  it("uses the current seconds for the minute hand when the minute changes", () => {
    const first = updateClock(minutesOnly(), at(10, 15, 59));
    const next = updateClock(first.state, at(10, 16, 30));

    expect(next.patch?.[1]?.rotation).toBeCloseTo((16.5 / 60) * TWO_PI, 12);
  });

  it("patches on every second when seconds are shown", () => {
    const first = updateClock(withSeconds(), at(10, 15, 1));
    const second = updateClock(first.state, at(10, 15, 2));

    expect(second.patch).toHaveLength(3);
    expect(second.state.lastResolvedSample).toEqual({
      granularity: "second",
      day: "2024-06-15",
      hour: 10,
      minute: 15,
      second: 2,
    });
  });

  it("does not mutate the previous state", () => {
    const initial = minutesOnly();
    updateClock(initial, at(1, 2, 3));

    expect(initial.lastResolvedSample).toBeNull();
    expect(Object.isFrozen(initial)).toBe(true);
  });

  it("keeps the geometry object across updates", () => {
    const initial = minutesOnly();
    const { state } = updateClock(initial, at(1, 2, 3));
    expect(state.geometry).toBe(initial.geometry);
  });
});

describe("buildPatch", () => {
  it("includes the second hand only when asked", () => {
    const angles = { hour: 1, minute: 2, second: 3 };
    expect(buildPatch(angles, false)).toEqual([
      { handId: "hour_hand", rotation: 1 },
      { handId: "minute_hand", rotation: 2 },
    ]);
    expect(buildPatch(angles, true)).toEqual([
      { handId: "hour_hand", rotation: 1 },
      { handId: "minute_hand", rotation: 2 },
      { handId: "second_hand", rotation: 3 },
    ]);
  });
});

describe("computeGeometry", () => {
  it("derives sizes from the radius", () => {
    expect(computeGeometry(50)).toEqual({
      radius: 50,
      backSize: 5,
      hourSize: -30,
      minuteSize: -45,
      secondSize: -45,
      tickSize: 4,
      thickness: 2,
    });
  });

  it("uses the thin stroke up to a radius of 40", () => {
    expect(computeGeometry(40).thickness).toBe(1.2);
    expect(computeGeometry(41).thickness).toBe(2);
  });

  it("is frozen", () => {
    expect(Object.isFrozen(computeGeometry(10))).toBe(true);
  });
});
