/**
 * @clockface/stage: In-memory scene graph implementing the clockface
 * drawing model.
 *
 * Holds shapes as plain immutable data. Rasterizing them is up to the host.
 */

export { sceneDrawingModel, buildClockDrawing, applyClockPatch } from "./clock-face.js";
export {
  emptyDrawing,
  addPrimitive,
  findPrimitive,
  modifyPrimitive,
  setRotation,
} from "./scene-graph.js";
export type {
  Point,
  Stroke,
  Transform,
  CirclePrimitive,
  LinePrimitive,
  Primitive,
  SceneDrawing,
} from "./types.js";
