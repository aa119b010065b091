/**
 * Output formatting for the ticker.
 */

import type { ClockPatch } from "@clockface/core";

/** Rotation in radians as degrees with one decimal. */
export function toDegrees(radians: number): string {
  return `${((radians * 180) / Math.PI).toFixed(1)}°`;
}

/** Local wall-clock time as HH:MM:SS. */
export function formatTime(date: Date): string {
  return [date.getHours(), date.getMinutes(), date.getSeconds()]
    .map((value) => String(value).padStart(2, "0"))
    .join(":");
}

/**
 * One output line per applied patch.
 *
 * @example
 * ```ts
 * formatPatch(patch, new Date(2024, 5, 15, 3, 0, 0));
 * // "[03:00:00] hour_hand=90.0° minute_hand=0.0°"
 * ```
 */
export function formatPatch(patch: ClockPatch, at: Date): string {
  const hands = patch.map((entry) => `${entry.handId}=${toDegrees(entry.rotation)}`).join(" ");
  return `[${formatTime(at)}] ${hands}`;
}
