/**
 * Built-in theme presets.
 *
 * Each preset defines the face background and border; hand colors are
 * derived from the border unless a preset sets them explicitly.
 */

import type { ThemeColors, ThemePresetName } from "@clockface/schema";

/** Preset used when the options name no theme. */
export const DEFAULT_THEME: ThemePresetName = "dark";

/** Color definitions for every preset, keyed by name. */
export const THEME_PRESETS: Readonly<Record<ThemePresetName, ThemeColors>> = {
  dark: { background: "#000000", border: "#d3d3d3" },
  light: { background: "#ffffff", border: "#a9a9a9" },
  primary: { background: "#487afc", border: "#ffffff" },
  secondary: { background: "#6f757d", border: "#ffffff" },
  success: { background: "#63a34a", border: "#ffffff" },
  danger: { background: "#bf4847", border: "#ffffff" },
  warning: { background: "#efc42a", border: "#000000" },
  info: { background: "#5e9fb7", border: "#ffffff" },
  // Transparent face; only the outline, ticks and hands are visible.
  text: { background: "transparent", border: "#487afc" },
};
