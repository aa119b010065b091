/**
 * Primitive types for the in-memory scene drawing.
 *
 * Coordinates are in drawing units with the origin at the face center
 * and y pointing down. Rotations are in radians, clockwise.
 */

/** A point in drawing coordinates. */
export interface Point {
  readonly x: number;
  readonly y: number;
}

/** Outline of a primitive. */
export interface Stroke {
  readonly width: number;
  /** CSS color string. */
  readonly color: string;
}

/** Rotation about a pin point. */
export interface Transform {
  readonly pin: Point;
  readonly rotate: number;
}

interface PrimitiveBase {
  /** Lookup id. Only primitives that get patched need one. */
  readonly id?: string;
  readonly stroke: Stroke;
  readonly transform: Transform;
}

/** A circle centered on the origin. */
export interface CirclePrimitive extends PrimitiveBase {
  readonly type: "circle";
  readonly radius: number;
  /** CSS color string. */
  readonly fill: string;
}

/** A straight line segment. */
export interface LinePrimitive extends PrimitiveBase {
  readonly type: "line";
  readonly from: Point;
  readonly to: Point;
}

/**
 * A drawing primitive, discriminated on the `type` field.
 *
 * Check `primitive.type` to narrow:
 * - `"circle"` → `CirclePrimitive`
 * - `"line"` → `LinePrimitive`
 */
export type Primitive = CirclePrimitive | LinePrimitive;

/** An immutable, ordered list of primitives. Later primitives draw on top. */
export interface SceneDrawing {
  readonly primitives: readonly Primitive[];
}
