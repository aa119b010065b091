/**
 * Clock state engine: The pure update transition.
 *
 * Holds the last rendered sample and decides, for each new sample,
 * whether the face changes and which hands to rotate.
 */

import type { HandId } from "@clockface/schema";
import type { GeometryParams } from "./geometry.js";
import { computeHandAngles } from "./hand-angles.js";
import type { HandAngles } from "./hand-angles.js";
import { resolveSample, samplesEqual } from "./time-sample.js";
import type { ResolvedTimeSample, TimeSample } from "./time-sample.js";

// ---------------------------------------------------------------------------
// Patch
// ---------------------------------------------------------------------------

/** Rotation of one named hand, in radians. */
export interface HandRotation<Id extends HandId = HandId> {
  readonly handId: Id;
  readonly rotation: number;
}

/** Patch for a face without a second hand. */
export type TwoHandPatch = readonly [HandRotation<"hour_hand">, HandRotation<"minute_hand">];

/** Patch for a face with a second hand. */
export type ThreeHandPatch = readonly [
  HandRotation<"hour_hand">,
  HandRotation<"minute_hand">,
  HandRotation<"second_hand">,
];

/**
 * Ordered rotations to apply to the drawing.
 * Hour first, minute second, then the second hand when it is shown.
 */
export type ClockPatch = TwoHandPatch | ThreeHandPatch;

/** Build the patch for a set of angles. */
export function buildPatch(angles: HandAngles, showSeconds: boolean): ClockPatch {
  const hour: HandRotation<"hour_hand"> = { handId: "hour_hand", rotation: angles.hour };
  const minute: HandRotation<"minute_hand"> = { handId: "minute_hand", rotation: angles.minute };
  if (showSeconds) {
    return [hour, minute, { handId: "second_hand", rotation: angles.second }];
  }
  return [hour, minute];
}

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

/** Engine state. Replaced, never mutated, by `updateClock`. */
export interface ClockState {
  /** What the drawing currently shows, or null before the first update. */
  readonly lastResolvedSample: ResolvedTimeSample | null;
  readonly showSeconds: boolean;
  readonly geometry: GeometryParams;
}

/** Result of one update transition. */
export interface ClockUpdate {
  readonly state: ClockState;
  /** Null when the displayed time did not change. */
  readonly patch: ClockPatch | null;
}

/** Create the initial state: nothing rendered yet. */
export function createClockState(showSeconds: boolean, geometry: GeometryParams): ClockState {
  return Object.freeze({
    lastResolvedSample: null,
    showSeconds,
    geometry,
  });
}

/**
 * Advance the state to a new sample.
 *
 * Returns the same state object and a null patch when the resolved sample
 * equals the one last rendered. Otherwise returns a new state recording the
 * resolved sample, and the patch that brings the drawing up to date. The
 * caller adopts the new state only once the patch has been applied.
 *
 * @example
 * ```ts
 * const first = updateClock(state, { hour: 10, minute: 15, second: 1, day: "2024-03-09" });
 * first.patch;  // [hour_hand, minute_hand]
 * const second = updateClock(first.state, { hour: 10, minute: 15, second: 2, day: "2024-03-09" });
 * second.patch; // null: minutes only, nothing changed
 * ```
 */
export function updateClock(state: ClockState, sample: TimeSample): ClockUpdate {
  const resolved = resolveSample(sample, state.showSeconds);
  if (samplesEqual(resolved, state.lastResolvedSample)) {
    return { state, patch: null };
  }

  const patch = buildPatch(computeHandAngles(sample), state.showSeconds);
  return {
    state: Object.freeze({ ...state, lastResolvedSample: resolved }),
    patch,
  };
}
