/**
 * TypeScript types for the clockface construction options.
 *
 * The zod schema in @clockface/core validates untrusted input against
 * these shapes. When updating, change both together.
 */

// ---------------------------------------------------------------------------
// Theme
// ---------------------------------------------------------------------------

/** Names of the built-in theme presets. */
export type ThemePresetName =
  | "dark"
  | "light"
  | "primary"
  | "secondary"
  | "success"
  | "danger"
  | "warning"
  | "info"
  | "text";

/**
 * Explicit theme colors.
 *
 * Hand colors are optional and fall back to `border` once the theme
 * is normalized.
 */
export interface ThemeColors {
  /** Face fill color. */
  readonly background: string;
  /** Face outline and tick mark color. */
  readonly border: string;
  /** Hour hand color. */
  readonly hours?: string;
  /** Minute hand color. */
  readonly minutes?: string;
  /** Second hand color. */
  readonly second?: string;
}

/** A theme as accepted in the options: a preset name or a color map. */
export type ThemeInput = ThemePresetName | ThemeColors;

/** A normalized theme. Every color the face needs is present. */
export interface ClockTheme {
  readonly background: string;
  readonly border: string;
  readonly hours: string;
  readonly minutes: string;
  readonly second: string;
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/**
 * Tick mark visibility.
 * `"auto"` shows the marks only on faces large enough to fit them.
 */
export type ShowTicksOption = boolean | "auto";

/**
 * Options for constructing an analog clock.
 *
 * Every field is optional; absent or `null` fields take their default.
 */
export interface ClockOptions {
  /** Face radius in drawing units. Default: 10. */
  readonly radius?: number | null;
  /** Whether the second hand is drawn. Default: false. */
  readonly showSeconds?: boolean | null;
  /** Tick mark visibility. Default: `"auto"`. */
  readonly showTicks?: ShowTicksOption | null;
  /** Theme preset or explicit colors. Default: `"dark"`. */
  readonly theme?: ThemeInput | null;
}

// ---------------------------------------------------------------------------
// Hands
// ---------------------------------------------------------------------------

/** Drawing ids of the clock hands, in patch order. */
export type HandId = "hour_hand" | "minute_hand" | "second_hand";
