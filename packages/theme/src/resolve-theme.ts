/**
 * Theme resolution: turns a preset name or partial color map into a
 * complete ClockTheme.
 */

import { THEME_PRESET_NAMES } from "@clockface/schema";
import type { ClockTheme, ThemeColors, ThemeInput, ThemePresetName } from "@clockface/schema";
import { DEFAULT_THEME, THEME_PRESETS } from "./presets.js";

/** Type guard for preset names coming from untyped sources (argv, env). */
export function isThemePresetName(name: string): name is ThemePresetName {
  return THEME_PRESET_NAMES.some((preset) => preset === name);
}

/**
 * Fill in the hand colors of a color map.
 * Missing hand colors take the border color.
 */
export function normalizeTheme(colors: ThemeColors): ClockTheme {
  return {
    background: colors.background,
    border: colors.border,
    hours: colors.hours ?? colors.border,
    minutes: colors.minutes ?? colors.border,
    second: colors.second ?? colors.border,
  };
}

/**
 * Resolve a theme input to a normalized theme.
 *
 * @param input - Preset name, explicit colors, or nothing for the default preset.
 *
 * @example
 * ```ts
 * resolveTheme("light").hours;                              // "#a9a9a9"
 * resolveTheme({ background: "#000", border: "#fff", second: "#f00" }).second; // "#f00"
 * ```
 */
export function resolveTheme(input?: ThemeInput | null): ClockTheme {
  if (input === undefined || input === null) {
    return normalizeTheme(THEME_PRESETS[DEFAULT_THEME]);
  }
  if (typeof input === "string") {
    return normalizeTheme(THEME_PRESETS[input]);
  }
  return normalizeTheme(input);
}
