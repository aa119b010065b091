/**
 * Drawing model contract: The typed interface between the clock engine
 * and whatever holds the shapes.
 *
 * The engine builds the drawing once and afterwards only sends patches.
 * It never inspects the drawing; `D` is opaque to it.
 */

import type { ClockTheme, HandId } from "@clockface/schema";
import type { ClockPatch } from "./engine/clock-state.js";
import type { GeometryParams } from "./engine/geometry.js";

/** Everything needed to build the initial face. */
export interface InitialDrawingSpec {
  readonly geometry: GeometryParams;
  readonly theme: ClockTheme;
  readonly showSeconds: boolean;
  readonly showTicks: boolean;
}

/**
 * The interface a drawing backend implements.
 *
 * `applyPatch` replaces the rotation of each named hand and leaves every
 * other attribute untouched. It may finish asynchronously; the clock does
 * not process the next tick until it has.
 */
export interface DrawingModel<D> {
  /** Build the face. Called once per clock. */
  buildInitialDrawing(spec: InitialDrawingSpec): D;
  /** Rotate the named hands. Returns the updated drawing, or a thenable for it. */
  applyPatch(drawing: D, patch: ClockPatch): D | PromiseLike<D>;
}

/** Drawing produced by RecordingDrawingModel. */
export interface RecordedDrawing {
  readonly spec: InitialDrawingSpec;
  /** Current rotation of each hand that has been patched. */
  readonly rotations: Readonly<Partial<Record<HandId, number>>>;
  /** Number of patches applied so far. */
  readonly version: number;
}

/**
 * A DrawingModel that records every call for later inspection.
 *
 * @example
 * ```ts
 * const model = new RecordingDrawingModel();
 * const clock = new AnalogClock({ timer, drawingModel: model });
 * clock.start();
 *
 * expect(model.patches).toHaveLength(1);
 * expect(clock.drawing.rotations.hour_hand).toBeCloseTo(Math.PI);
 * ```
 */
export class RecordingDrawingModel implements DrawingModel<RecordedDrawing> {
  /** Every spec passed to buildInitialDrawing. */
  readonly builds: InitialDrawingSpec[] = [];
  /** Every patch applied, in application order. */
  readonly patches: ClockPatch[] = [];

  buildInitialDrawing(spec: InitialDrawingSpec): RecordedDrawing {
    this.builds.push(spec);
    return { spec, rotations: {}, version: 0 };
  }

  applyPatch(drawing: RecordedDrawing, patch: ClockPatch): RecordedDrawing {
    this.patches.push(patch);
    const rotations: Partial<Record<HandId, number>> = { ...drawing.rotations };
    for (const entry of patch) {
      rotations[entry.handId] = entry.rotation;
    }
    return { spec: drawing.spec, rotations, version: drawing.version + 1 };
  }

  /** Clear all recorded calls. */
  clear(): void {
    this.builds.length = 0;
    this.patches.length = 0;
  }
}
