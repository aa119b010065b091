/**
 * Hand angle math.
 *
 * Angles are always derived from a full time sample, never accumulated
 * from previous ticks. The minute hand creeps with the seconds and the
 * hour hand creeps with the minutes.
 */

import type { TimeSample } from "./time-sample.js";

/** A full turn in radians. */
export const TWO_PI = 2 * Math.PI;

/** Fraction of a full turn for each hand, each in [0, 1). */
export interface HandPercents {
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
}

/** Rotation of each hand in radians, each in [0, 2π). Zero points at 12 o'clock. */
export interface HandAngles {
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
}

/**
 * Compute the fraction of a turn for each hand.
 *
 * Noon and midnight both give an hour percent of 0.
 */
export function computeHandPercents(sample: Pick<TimeSample, "hour" | "minute" | "second">): HandPercents {
  const second = sample.second / 60;
  const minute = (sample.minute + second) / 60;
  const hour12 = sample.hour % 12;
  const hour = (hour12 + minute) / 12;
  return { hour, minute, second };
}

/** Compute the rotation of each hand in radians. */
export function computeHandAngles(sample: Pick<TimeSample, "hour" | "minute" | "second">): HandAngles {
  const percents = computeHandPercents(sample);
  return {
    hour: percents.hour * TWO_PI,
    minute: percents.minute * TWO_PI,
    second: percents.second * TWO_PI,
  };
}
