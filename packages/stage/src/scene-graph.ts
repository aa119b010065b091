/**
 * Scene graph operations. Every operation returns a new drawing; the input
 * is never mutated.
 */

import type { Primitive, SceneDrawing } from "./types.js";

/** An empty drawing. */
export function emptyDrawing(): SceneDrawing {
  return { primitives: [] };
}

/**
 * Append a primitive on top of the drawing.
 *
 * @throws Error when the primitive's id is already taken.
 */
export function addPrimitive(drawing: SceneDrawing, primitive: Primitive): SceneDrawing {
  if (primitive.id !== undefined && findPrimitive(drawing, primitive.id)) {
    throw new Error(`Duplicate primitive id: "${primitive.id}"`);
  }
  return { primitives: [...drawing.primitives, primitive] };
}

/** Look up a primitive by id. */
export function findPrimitive(drawing: SceneDrawing, id: string): Primitive | undefined {
  return drawing.primitives.find((primitive) => primitive.id === id);
}

/**
 * Replace the primitive with the given id by `update(primitive)`.
 * Returns the drawing unchanged when no primitive has that id.
 */
export function modifyPrimitive(
  drawing: SceneDrawing,
  id: string,
  update: (primitive: Primitive) => Primitive,
): SceneDrawing {
  const index = drawing.primitives.findIndex((primitive) => primitive.id === id);
  const current = drawing.primitives[index];
  if (current === undefined) {
    return drawing;
  }
  const primitives = [...drawing.primitives];
  primitives[index] = update(current);
  return { primitives };
}

/** Set the rotation of the primitive with the given id, keeping its pin. */
export function setRotation(drawing: SceneDrawing, id: string, rotate: number): SceneDrawing {
  return modifyPrimitive(drawing, id, (primitive) => ({
    ...primitive,
    transform: { ...primitive.transform, rotate },
  }));
}
