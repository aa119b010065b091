/**
 * @clockface/schema: TypeScript types for clockface options and themes.
 *
 * This package is the shared contract between all clockface packages.
 * Runtime validation of these shapes lives in @clockface/core.
 */

import type { HandId, ThemePresetName } from "./clock-options-types.js";

export type {
  ThemePresetName,
  ThemeColors,
  ThemeInput,
  ClockTheme,
  ShowTicksOption,
  ClockOptions,
  HandId,
} from "./clock-options-types.js";

/** Theme preset names, in the order they are listed to users. */
export const THEME_PRESET_NAMES = [
  "dark",
  "light",
  "primary",
  "secondary",
  "success",
  "danger",
  "warning",
  "info",
  "text",
] as const satisfies readonly ThemePresetName[];

/** Hand ids in the order a patch lists them. */
export const HAND_IDS = ["hour_hand", "minute_hand", "second_hand"] as const satisfies readonly HandId[];
