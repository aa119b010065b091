/**
 * ClockActor: The single owner of the clock state.
 *
 * Heartbeat messages land in an ordered inbox and are processed one at a
 * time. A tick samples the time, runs the update transition, applies the
 * resulting patch to the drawing, and only then records the new state.
 * When the drawing model applies patches asynchronously, the next message
 * waits until the previous patch is recorded.
 */

import type { DrawingModel } from "../drawing.js";
import { updateClock } from "../engine/clock-state.js";
import type { ClockPatch, ClockState } from "../engine/clock-state.js";
import type { TimeSample, TimeSource } from "../engine/time-sample.js";
import type { HeartbeatMessage } from "../heartbeat/heartbeat.js";
import { LOG_PREFIX } from "../logger.js";
import type { ClockLogger } from "../logger.js";

/** Options for creating a ClockActor. */
export interface ClockActorOptions<D> {
  /** Initial engine state. */
  readonly state: ClockState;
  /** The drawing as built by the model. */
  readonly drawing: D;
  readonly drawingModel: DrawingModel<D>;
  readonly timeSource: TimeSource;
  readonly logger: ClockLogger;
  /** Called after each applied patch with the updated drawing. */
  readonly onRender?: (drawing: D, patch: ClockPatch) => void;
}

/**
 * Sequential processor of heartbeat messages.
 *
 * Messages are handled strictly in arrival order and never coalesced.
 * Per-message failures are logged and leave state and drawing unchanged.
 */
export class ClockActor<D> {
  private readonly drawingModel: DrawingModel<D>;
  private readonly timeSource: TimeSource;
  private readonly logger: ClockLogger;
  private readonly onRender: ((drawing: D, patch: ClockPatch) => void) | undefined;
  private readonly inbox: HeartbeatMessage[] = [];
  private currentState: ClockState;
  private currentDrawing: D;
  private inflight: Promise<void> | null = null;
  private disposed = false;
  private processedCount = 0;

  constructor(options: ClockActorOptions<D>) {
    this.currentState = options.state;
    this.currentDrawing = options.drawing;
    this.drawingModel = options.drawingModel;
    this.timeSource = options.timeSource;
    this.logger = options.logger;
    this.onRender = options.onRender;
  }

  /**
   * Queue a message. Processing starts immediately when the actor is idle
   * and the drawing model applies patches synchronously.
   * Messages posted after `dispose()` are dropped.
   */
  post(message: HeartbeatMessage): void {
    if (this.disposed) return;
    this.inbox.push(message);
    this.pump();
  }

  /** Resolves once every queued message has been processed. */
  async idle(): Promise<void> {
    while (this.inflight) {
      await this.inflight;
    }
  }

  /** Drop queued messages and refuse new ones. An in-flight patch still completes. */
  dispose(): void {
    this.disposed = true;
    this.inbox.length = 0;
  }

  /** State reflecting the drawing as last applied. */
  get state(): ClockState {
    return this.currentState;
  }

  /** The drawing as last applied. */
  get drawing(): D {
    return this.currentDrawing;
  }

  /** Number of messages queued and not yet started. */
  get pendingCount(): number {
    return this.inbox.length;
  }

  /** Number of messages fully processed, including ones that produced no patch. */
  get processed(): number {
    return this.processedCount;
  }

  // ---------------------------------------------------------------------------
  // Processing
  // ---------------------------------------------------------------------------

  private pump(): void {
    while (this.inflight === null && !this.disposed) {
      const message = this.inbox.shift();
      if (!message) return;

      const pending = this.process(message);
      if (pending) {
        this.inflight = pending.then(() => {
          this.inflight = null;
          this.pump();
        });
        return;
      }
    }
  }

  /** Handle one message. Returns a promise only when the patch is applied asynchronously. */
  private process(message: HeartbeatMessage): Promise<void> | undefined {
    let sample: TimeSample;
    try {
      sample = this.timeSource();
    } catch (error) {
      this.logger.warn(`${LOG_PREFIX} ${message.kind}: could not read the time, skipping`, error);
      this.processedCount++;
      return undefined;
    }

    const update = updateClock(this.currentState, sample);
    const patch = update.patch;
    if (patch === null) {
      this.processedCount++;
      return undefined;
    }

    let result: D | PromiseLike<D>;
    try {
      result = this.drawingModel.applyPatch(this.currentDrawing, patch);
    } catch (error) {
      this.logger.error(`${LOG_PREFIX} ${message.kind}: applying patch failed, keeping previous state`, error);
      this.processedCount++;
      return undefined;
    }

    if (isPromiseLike(result)) {
      return Promise.resolve(result).then(
        (drawing) => this.commit(update.state, drawing, patch),
        (error: unknown) => {
          this.logger.error(`${LOG_PREFIX} ${message.kind}: applying patch failed, keeping previous state`, error);
          this.processedCount++;
        },
      );
    }

    this.commit(update.state, result, patch);
    return undefined;
  }

  /** Record an applied patch. State and drawing change together. */
  private commit(state: ClockState, drawing: D, patch: ClockPatch): void {
    this.currentState = state;
    this.currentDrawing = drawing;
    this.processedCount++;
    if (!this.disposed && this.onRender) {
      try {
        this.onRender(drawing, patch);
      } catch (error) {
        this.logger.error(`${LOG_PREFIX} render listener threw`, error);
      }
    }
  }
}

/** Any thenable counts, not only native promises. */
function isPromiseLike<T>(value: T | PromiseLike<T>): value is PromiseLike<T> {
  return (
    (typeof value === "object" || typeof value === "function") &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}
