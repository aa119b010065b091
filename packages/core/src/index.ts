/**
 * @clockface/core: Time-sampling and incremental-update engine for an
 * analog clock face.
 *
 * Framework-agnostic. The drawing backend plugs in through `DrawingModel`,
 * time through `TimerService`.
 */

// Facade
export { AnalogClock } from "./analog-clock.js";
export type { AnalogClockOptions } from "./analog-clock.js";

// Timers
export type { TimerService, CancelHandle } from "./timer/timer.js";
export { NodeTimerService } from "./timer/node-timer.js";

// Engine
export {
  resolveSample,
  samplesEqual,
  sampleFromDate,
  createLocalTimeSource,
} from "./engine/time-sample.js";
export type { TimeSample, ResolvedTimeSample, TimeSource } from "./engine/time-sample.js";
export { TWO_PI, computeHandPercents, computeHandAngles } from "./engine/hand-angles.js";
export type { HandPercents, HandAngles } from "./engine/hand-angles.js";
export {
  DEFAULT_RADIUS,
  MIN_RADIUS_FOR_DEFAULT_TICKS,
  computeGeometry,
} from "./engine/geometry.js";
export type { GeometryParams } from "./engine/geometry.js";
export { buildPatch, createClockState, updateClock } from "./engine/clock-state.js";
export type {
  ClockPatch,
  TwoHandPatch,
  ThreeHandPatch,
  HandRotation,
  ClockState,
  ClockUpdate,
} from "./engine/clock-state.js";

// Heartbeat & actor
export {
  Heartbeat,
  TICK_PERIOD_MS,
  ALIGNMENT_OFFSET_MS,
  computeAlignmentDelay,
} from "./heartbeat/heartbeat.js";
export type { HeartbeatMessage } from "./heartbeat/heartbeat.js";
export { ClockActor } from "./actor/clock-actor.js";
export type { ClockActorOptions } from "./actor/clock-actor.js";

// Configuration & errors
export { clockOptionsSchema, resolveClockConfig } from "./config/clock-config.js";
export type { ClockConfig } from "./config/clock-config.js";
export { ClockfaceError, ClockConfigError, HeartbeatError } from "./errors.js";
export type { ClockLogger } from "./logger.js";
export { LOG_PREFIX } from "./logger.js";

// Drawing contract
export type { DrawingModel, InitialDrawingSpec } from "./drawing.js";

// Test utilities
export { TestTimerService } from "./timer/test-timer.js";
export { RecordingDrawingModel } from "./drawing.js";
export type { RecordedDrawing } from "./drawing.js";
