/**
 * AnalogClock: the top-level facade that ties together configuration,
 * geometry, the drawing model, the heartbeat and the clock actor.
 *
 * This is the main public API of @clockface/core.
 */

import type { ClockOptions } from "@clockface/schema";
import { ClockActor } from "./actor/clock-actor.js";
import { resolveClockConfig } from "./config/clock-config.js";
import type { ClockConfig } from "./config/clock-config.js";
import type { DrawingModel } from "./drawing.js";
import { createClockState } from "./engine/clock-state.js";
import type { ClockPatch, ClockState } from "./engine/clock-state.js";
import { computeGeometry } from "./engine/geometry.js";
import type { GeometryParams } from "./engine/geometry.js";
import { createLocalTimeSource } from "./engine/time-sample.js";
import type { TimeSource } from "./engine/time-sample.js";
import { HeartbeatError } from "./errors.js";
import type { ClockfaceError } from "./errors.js";
import { Heartbeat } from "./heartbeat/heartbeat.js";
import { LOG_PREFIX } from "./logger.js";
import type { ClockLogger } from "./logger.js";
import type { TimerService } from "./timer/timer.js";

/** Options for creating an AnalogClock instance. */
export interface AnalogClockOptions<D> {
  /** Face options from the host. Validated at construction; absent means all defaults. */
  readonly clockOptions?: ClockOptions | null;
  /** Configuration already returned by `resolveClockConfig`. Takes precedence over `clockOptions`. */
  readonly config?: ClockConfig;
  /** Timer service driving the heartbeat. */
  readonly timer: TimerService;
  /** Backend that builds the face and applies patches. */
  readonly drawingModel: DrawingModel<D>;
  /** Time source. Defaults to the local calendar fields of `timer.now()`. */
  readonly timeSource?: TimeSource;
  /** Defaults to `console`. */
  readonly logger?: ClockLogger;
  /** Called after every applied patch with the updated drawing. */
  readonly onRender?: (drawing: D, patch: ClockPatch) => void;
  /** Called when the clock stops itself because its heartbeat failed. */
  readonly onFatal?: (error: ClockfaceError) => void;
}

/**
 * A live analog clock.
 *
 * Construction validates the options and builds the face. `start()` shows
 * the current time and starts ticking just after each second boundary.
 *
 * @example
 * ```ts
 * const clock = new AnalogClock({
 *   clockOptions: { radius: 40, showSeconds: true },
 *   timer: new NodeTimerService(),
 *   drawingModel: sceneDrawingModel,
 *   onRender: (drawing) => paint(drawing),
 * });
 * clock.start();
 * // later
 * clock.stop();
 * ```
 */
export class AnalogClock<D> {
  /** Resolved configuration. */
  readonly config: ClockConfig;
  /** Face geometry. Never changes after construction. */
  readonly geometry: GeometryParams;
  private readonly actor: ClockActor<D>;
  private readonly heartbeat: Heartbeat;
  private readonly logger: ClockLogger;
  private readonly onFatal: ((error: ClockfaceError) => void) | undefined;

  /** @throws ClockConfigError when `clockOptions` is malformed. */
  constructor(options: AnalogClockOptions<D>) {
    this.config = options.config ?? resolveClockConfig(options.clockOptions);
    this.geometry = computeGeometry(this.config.radius);
    this.logger = options.logger ?? console;
    this.onFatal = options.onFatal;

    const drawing = options.drawingModel.buildInitialDrawing({
      geometry: this.geometry,
      theme: this.config.theme,
      showSeconds: this.config.showSeconds,
      showTicks: this.config.showTicks,
    });

    this.actor = new ClockActor({
      state: createClockState(this.config.showSeconds, this.geometry),
      drawing,
      drawingModel: options.drawingModel,
      timeSource: options.timeSource ?? createLocalTimeSource(options.timer),
      logger: this.logger,
      onRender: options.onRender,
    });

    this.heartbeat = new Heartbeat(
      options.timer,
      (message) => this.actor.post(message),
      (error) => {
        this.logger.error(`${LOG_PREFIX} heartbeat failed, stopping the clock`, error);
        this.stop();
        this.onFatal?.(error);
      },
    );
  }

  /**
   * Render the current time and start the heartbeat.
   *
   * @throws HeartbeatError when the timer service cannot schedule the
   *   heartbeat, or when the clock was already started or stopped.
   */
  start(): void {
    try {
      this.heartbeat.start();
    } catch (error) {
      if (error instanceof HeartbeatError && error.code === "timer_unavailable") {
        this.stop();
      }
      throw error;
    }
    this.actor.post({ kind: "tick" });
  }

  /** Stop ticking and drop queued work. Idempotent. */
  stop(): void {
    this.heartbeat.stop();
    this.actor.dispose();
  }

  /** Resolves once every queued tick has been processed. */
  idle(): Promise<void> {
    return this.actor.idle();
  }

  /** The drawing as last applied. */
  get drawing(): D {
    return this.actor.drawing;
  }

  /** Engine state matching `drawing`. */
  get state(): ClockState {
    return this.actor.state;
  }

  /** True while the heartbeat is scheduled. */
  get running(): boolean {
    return this.heartbeat.running;
  }
}
