/**
 * Clock configuration: Validation of the construction options and the
 * one-time merge with their defaults.
 */

import { z } from "zod";
import { THEME_PRESET_NAMES } from "@clockface/schema";
import type { ClockTheme } from "@clockface/schema";
import { resolveTheme } from "@clockface/theme";
import { ClockConfigError } from "../errors.js";
import { DEFAULT_RADIUS, MIN_RADIUS_FOR_DEFAULT_TICKS } from "../engine/geometry.js";

const themeColorsSchema = z
  .object({
    background: z.string().min(1).describe("Face fill color."),
    border: z.string().min(1).describe("Rim and tick mark color."),
    hours: z.string().min(1).optional().describe("Hour hand color. Defaults to border."),
    minutes: z.string().min(1).optional().describe("Minute hand color. Defaults to border."),
    second: z.string().min(1).optional().describe("Second hand color. Defaults to border."),
  })
  .strict();

/** Schema for untrusted construction options. Absent and null mean "use the default". */
export const clockOptionsSchema = z
  .object({
    radius: z
      .union([z.number(), z.nan()])
      .nullish()
      .describe("Face radius. Non-positive or non-finite values fall back to the default."),
    showSeconds: z.boolean().nullish().describe("Whether the second hand is drawn."),
    showTicks: z
      .union([z.boolean(), z.literal("auto")])
      .nullish()
      .describe("Tick marks: true, false, or \"auto\" (shown when radius >= 30)."),
    theme: z
      .union([z.enum(THEME_PRESET_NAMES), themeColorsSchema])
      .nullish()
      .describe("Theme preset name or explicit colors."),
  })
  .strict();

/** Fully resolved configuration. Every field has its final value. */
export interface ClockConfig {
  readonly radius: number;
  readonly showSeconds: boolean;
  readonly showTicks: boolean;
  readonly theme: ClockTheme;
}

/**
 * Validate construction options and merge them with their defaults.
 *
 * Pure: the same input always resolves to an equal config. Run once at
 * construction, never per tick.
 *
 * @throws ClockConfigError when the input is present but malformed.
 */
export function resolveClockConfig(input: unknown): ClockConfig {
  const parsed = clockOptionsSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new ClockConfigError(
      parsed.error.issues.map((issue) => {
        const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
        return `${path}: ${issue.message}`;
      }),
    );
  }

  const options = parsed.data;
  const radius = isUsableRadius(options.radius) ? options.radius : DEFAULT_RADIUS;
  const showTicks = options.showTicks ?? "auto";

  return Object.freeze({
    radius,
    showSeconds: options.showSeconds ?? false,
    showTicks: showTicks === "auto" ? radius >= MIN_RADIUS_FOR_DEFAULT_TICKS : showTicks,
    theme: Object.freeze(resolveTheme(options.theme)),
  });
}

function isUsableRadius(radius: number | null | undefined): radius is number {
  return typeof radius === "number" && Number.isFinite(radius) && radius > 0;
}
