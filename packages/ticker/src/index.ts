/**
 * @clockface/ticker: Headless runner that prints every clock patch.
 */

export { parseTickerArgs, TickerUsageError, USAGE } from "./config.js";
export type { TickerConfig } from "./config.js";
export { formatPatch, formatTime, toDegrees } from "./format.js";
export { runTicker } from "./runner.js";
export type { TickerHandle, TickerOptions } from "./runner.js";
