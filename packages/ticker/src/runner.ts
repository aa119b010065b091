/**
 * Ticker runner: drives an AnalogClock on a timer service and writes one
 * line per applied patch.
 *
 * Decoupled from the process: takes a timer and a writer, so tests can run
 * it on a TestTimerService.
 */

import { AnalogClock, resolveClockConfig } from "@clockface/core";
import type { CancelHandle, ClockConfig, ClockLogger, ClockfaceError, TimerService } from "@clockface/core";
import { sceneDrawingModel } from "@clockface/stage";
import type { SceneDrawing } from "@clockface/stage";
import type { TickerConfig } from "./config.js";
import { formatPatch } from "./format.js";

/** Options for running the ticker. */
export interface TickerOptions {
  readonly config: TickerConfig;
  readonly timer: TimerService;
  /** Receives each output line. */
  readonly write: (line: string) => void;
  /** Defaults to `console`. */
  readonly logger?: ClockLogger;
}

/** Handle returned by `runTicker` to control the session. */
export interface TickerHandle {
  /** Resolved clock configuration. */
  readonly clockConfig: ClockConfig;
  readonly clock: AnalogClock<SceneDrawing>;
  /** Stops the clock. Idempotent. */
  stop: () => void;
  /** Resolves when the session stops; rejects if the heartbeat fails. */
  done: Promise<void>;
}

/**
 * Starts a ticker session.
 *
 * @throws ClockConfigError when the parsed options are invalid
 * @throws HeartbeatError when the timer cannot be scheduled
 */
export function runTicker(options: TickerOptions): TickerHandle {
  const clockConfig = resolveClockConfig(options.config.clockOptions);

  let settle: { resolve: () => void; reject: (error: ClockfaceError) => void } | undefined;
  const done = new Promise<void>((resolve, reject) => {
    settle = { resolve, reject };
  });

  let durationHandle: CancelHandle | undefined;
  let stopped = false;

  const clock = new AnalogClock<SceneDrawing>({
    config: clockConfig,
    timer: options.timer,
    drawingModel: sceneDrawingModel,
    logger: options.logger,
    onRender: (_drawing, patch) => {
      options.write(formatPatch(patch, new Date(options.timer.now())));
    },
    onFatal: (error) => {
      finish();
      settle?.reject(error);
    },
  });

  const finish = (): void => {
    if (stopped) return;
    stopped = true;
    durationHandle?.cancel();
    durationHandle = undefined;
    clock.stop();
  };

  const stop = (): void => {
    finish();
    settle?.resolve();
  };

  clock.start();

  const durationSeconds = options.config.durationSeconds;
  if (durationSeconds !== undefined) {
    durationHandle = options.timer.scheduleOnce(durationSeconds * 1000, stop);
  }

  return { clockConfig, clock, stop, done };
}
