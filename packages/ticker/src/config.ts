/**
 * CLI argument parsing for the clockface-ticker command.
 *
 * Supports:
 *   clockface-ticker
 *   clockface-ticker --radius 40 --seconds
 *   clockface-ticker --ticks off --theme light --duration 10
 *
 * Values are passed on as raw clock options; `resolveClockConfig`
 * validates them.
 */

/** Parsed configuration for a ticker session. */
export interface TickerConfig {
  /** Raw clock options, not yet validated. */
  readonly clockOptions: Readonly<Record<string, unknown>>;
  /** Stop after this many seconds. Runs until SIGINT when absent. */
  readonly durationSeconds?: number;
}

/** Thrown for flags the ticker does not understand. */
export class TickerUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TickerUsageError";
  }
}

/** Usage text printed on `--help` and on usage errors. */
export const USAGE = [
  "Usage: clockface-ticker [options]",
  "",
  "  --radius <n>          face radius (default 10, env CLOCKFACE_RADIUS)",
  "  --seconds             show the second hand",
  "  --ticks <on|off|auto> tick marks (default auto)",
  "  --theme <name>        theme preset (default dark, env CLOCKFACE_THEME)",
  "  --duration <s>        stop after s seconds",
].join("\n");

/**
 * Parses process.argv into a TickerConfig.
 *
 * Flags win over environment variables.
 *
 * @param argv - The full process.argv array
 * @param env - Environment to read fallbacks from
 * @throws TickerUsageError on unknown flags or missing values
 */
export function parseTickerArgs(
  argv: readonly string[],
  env: Readonly<Record<string, string | undefined>> = {},
): TickerConfig {
  const args = argv.slice(2); // skip node + script

  const options: Record<string, unknown> = {};
  let durationSeconds: number | undefined;

  const radiusEnv = env["CLOCKFACE_RADIUS"];
  if (radiusEnv !== undefined && radiusEnv !== "") {
    options["radius"] = Number(radiusEnv);
  }
  const themeEnv = env["CLOCKFACE_THEME"];
  if (themeEnv !== undefined && themeEnv !== "") {
    options["theme"] = themeEnv;
  }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    if (arg === "--seconds") {
      options["showSeconds"] = true;
      continue;
    }

    if (arg === "--radius" || arg === "--ticks" || arg === "--theme" || arg === "--duration") {
      if (next === undefined || next.startsWith("--")) {
        throw new TickerUsageError(`Missing value for ${arg}`);
      }
      i++;
      if (arg === "--radius") {
        options["radius"] = Number(next);
      } else if (arg === "--ticks") {
        options["showTicks"] = parseTicks(next);
      } else if (arg === "--theme") {
        options["theme"] = next;
      } else {
        durationSeconds = parseDuration(next);
      }
      continue;
    }

    throw new TickerUsageError(`Unknown argument: ${String(arg)}`);
  }

  return durationSeconds === undefined
    ? { clockOptions: options }
    : { clockOptions: options, durationSeconds };
}

/** "on" / "off" / "auto"; anything else is passed through for validation to reject. */
function parseTicks(value: string): unknown {
  switch (value) {
    case "on":
      return true;
    case "off":
      return false;
    default:
      return value;
  }
}

function parseDuration(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new TickerUsageError(`--duration must be a positive number of seconds, got "${value}"`);
  }
  return seconds;
}
