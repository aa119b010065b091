/**
 * Clock face construction and patching on top of the scene graph.
 */

import type { HandId } from "@clockface/schema";
import type { ClockPatch, DrawingModel, InitialDrawingSpec } from "@clockface/core";
import { TWO_PI } from "@clockface/core";
import { addPrimitive, emptyDrawing, setRotation } from "./scene-graph.js";
import type { LinePrimitive, Point, SceneDrawing } from "./types.js";

const ORIGIN: Point = { x: 0, y: 0 };
const TICK_COUNT = 12;

/**
 * Build the face: rim, hour hand, minute hand, the second hand when shown,
 * then twelve tick marks when shown.
 *
 * Hands start pointing at 12 o'clock with a rotation of zero.
 */
export function buildClockDrawing(spec: InitialDrawingSpec): SceneDrawing {
  const { geometry, theme } = spec;
  const thick = geometry.thickness;

  let drawing = addPrimitive(emptyDrawing(), {
    type: "circle",
    radius: geometry.radius,
    fill: theme.background,
    stroke: { width: thick, color: theme.border },
    transform: { pin: ORIGIN, rotate: 0 },
  });

  drawing = addPrimitive(drawing, hand("hour_hand", geometry.backSize, geometry.hourSize, thick, theme.hours));
  drawing = addPrimitive(drawing, hand("minute_hand", geometry.backSize, geometry.minuteSize, thick, theme.minutes));
  if (spec.showSeconds) {
    drawing = addPrimitive(drawing, hand("second_hand", geometry.backSize, geometry.secondSize, thick, theme.second));
  }

  if (spec.showTicks) {
    const tickSize = geometry.tickSize;
    for (let n = 1; n <= TICK_COUNT; n++) {
      drawing = addPrimitive(drawing, {
        type: "line",
        from: { x: 0, y: geometry.radius - tickSize },
        to: { x: 0, y: geometry.radius },
        stroke: { width: thick, color: theme.border },
        transform: { pin: ORIGIN, rotate: (n * TWO_PI) / TICK_COUNT },
      });
    }
  }

  return drawing;
}

/**
 * Rotate the hands named in the patch. Only `transform.rotate` changes;
 * ids missing from the drawing are skipped.
 */
export function applyClockPatch(drawing: SceneDrawing, patch: ClockPatch): SceneDrawing {
  let next = drawing;
  for (const entry of patch) {
    next = setRotation(next, entry.handId, entry.rotation);
  }
  return next;
}

/** DrawingModel backed by the in-memory scene graph. */
export const sceneDrawingModel: DrawingModel<SceneDrawing> = {
  buildInitialDrawing: buildClockDrawing,
  applyPatch: applyClockPatch,
};

function hand(id: HandId, backSize: number, size: number, width: number, color: string): LinePrimitive {
  return {
    type: "line",
    id,
    from: { x: 0, y: backSize },
    to: { x: 0, y: size },
    stroke: { width, color },
    transform: { pin: ORIGIN, rotate: 0 },
  };
}
