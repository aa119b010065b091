/**
 * Face geometry derived from the radius.
 *
 * Hand sizes are negative because the hands point up (towards -y) in the
 * drawing's coordinate system before rotation.
 */

/** Radius used when the options give none. */
export const DEFAULT_RADIUS = 10;

/** Faces at least this large show tick marks when ticks are `"auto"`. */
export const MIN_RADIUS_FOR_DEFAULT_TICKS = 30;

const BACK_SIZE_RATIO = 0.1;
const HOUR_SIZE_RATIO = -0.6;
const MINUTE_SIZE_RATIO = -0.9;
const SECOND_SIZE_RATIO = -0.9;
const TICK_RATIO = 0.08;

/** Faces with a radius above this get the thick stroke. */
const THICK_STROKE_MIN_RADIUS = 40;

/** Immutable geometry of a clock face. Set once at construction. */
export interface GeometryParams {
  readonly radius: number;
  /** How far each hand extends behind the pin. */
  readonly backSize: number;
  readonly hourSize: number;
  readonly minuteSize: number;
  readonly secondSize: number;
  /** Length of each tick mark, measured inward from the rim. */
  readonly tickSize: number;
  /** Stroke width of the rim, hands and ticks. */
  readonly thickness: number;
}

/** Compute the frozen geometry for a radius. */
export function computeGeometry(radius: number): GeometryParams {
  return Object.freeze({
    radius,
    backSize: radius * BACK_SIZE_RATIO,
    hourSize: radius * HOUR_SIZE_RATIO,
    minuteSize: radius * MINUTE_SIZE_RATIO,
    secondSize: radius * SECOND_SIZE_RATIO,
    tickSize: radius * TICK_RATIO,
    thickness: radius > THICK_STROKE_MIN_RADIUS ? 2 : 1.2,
  });
}
