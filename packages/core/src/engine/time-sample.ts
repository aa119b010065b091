/**
 * Time samples: Immutable snapshots of the local wall clock, and their
 * reduction to the granularity the face displays.
 */

import type { TimerService } from "../timer/timer.js";

/** One atomic reading of the local wall clock. */
export interface TimeSample {
  /** Hour of day, 0–23. */
  readonly hour: number;
  /** Minute, 0–59. */
  readonly minute: number;
  /** Second, 0–59. */
  readonly second: number;
  /** Local calendar date as `YYYY-MM-DD`. */
  readonly day: string;
}

/**
 * A sample reduced to what the face actually shows.
 * Two samples that resolve equal render identically.
 */
export type ResolvedTimeSample =
  | {
      readonly granularity: "minute";
      readonly day: string;
      readonly hour: number;
      readonly minute: number;
    }
  | {
      readonly granularity: "second";
      readonly day: string;
      readonly hour: number;
      readonly minute: number;
      readonly second: number;
    };

/** Produces the current time sample. May throw when the clock cannot be read. */
export type TimeSource = () => TimeSample;

/** Reduce a sample to the displayed granularity. */
export function resolveSample(sample: TimeSample, showSeconds: boolean): ResolvedTimeSample {
  const resolved: ResolvedTimeSample = showSeconds
    ? {
        granularity: "second",
        day: sample.day,
        hour: sample.hour,
        minute: sample.minute,
        second: sample.second,
      }
    : {
        granularity: "minute",
        day: sample.day,
        hour: sample.hour,
        minute: sample.minute,
      };
  return Object.freeze(resolved);
}

/** Field-wise equality of two resolved samples. `null` equals only `null`. */
export function samplesEqual(
  a: ResolvedTimeSample | null,
  b: ResolvedTimeSample | null,
): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  if (a.day !== b.day || a.hour !== b.hour || a.minute !== b.minute) {
    return false;
  }
  if (a.granularity === "second" && b.granularity === "second") {
    return a.second === b.second;
  }
  return a.granularity === b.granularity;
}

/** Build a frozen sample from the local calendar fields of a Date. */
export function sampleFromDate(date: Date): TimeSample {
  const epoch = date.getTime();
  if (!Number.isFinite(epoch)) {
    throw new RangeError("Time source returned an invalid date");
  }
  return Object.freeze({
    hour: date.getHours(),
    minute: date.getMinutes(),
    second: date.getSeconds(),
    day: formatDay(date),
  });
}

/** A TimeSource reading the local wall clock through a timer service. */
export function createLocalTimeSource(timer: TimerService): TimeSource {
  return () => sampleFromDate(new Date(timer.now()));
}

function formatDay(date: Date): string {
  const year = String(date.getFullYear()).padStart(4, "0");
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}
