/**
 * CLI entry point for the ticker.
 *
 * Usage:
 *   npm run ticker                                   # radius 10, dark theme, until Ctrl-C
 *   npm run ticker -- --seconds --radius 40
 *   npm run ticker -- --ticks off --duration 5
 */

import { ClockConfigError, NodeTimerService } from "@clockface/core";
import { parseTickerArgs, TickerUsageError, USAGE } from "./config.js";
import { runTicker } from "./runner.js";

if (process.argv.includes("--help")) {
  console.log(USAGE);
  process.exit(0);
}

let handle: ReturnType<typeof runTicker>;
try {
  handle = runTicker({
    config: parseTickerArgs(process.argv, process.env),
    timer: new NodeTimerService(),
    write: (line) => console.log(line),
  });
} catch (error) {
  if (error instanceof TickerUsageError) {
    console.error(`${error.message}\n\n${USAGE}`);
    process.exit(2);
  }
  if (error instanceof ClockConfigError) {
    console.error(`Invalid options:\n  ${error.issues.join("\n  ")}`);
    process.exit(2);
  }
  throw error;
}

const { clockConfig } = handle;
console.log(`Clockface ticker started`);
console.log(`  radius:  ${clockConfig.radius}`);
console.log(`  seconds: ${clockConfig.showSeconds}`);
console.log(`  ticks:   ${clockConfig.showTicks}`);
console.log(``);

process.on("SIGINT", () => {
  console.log("\nShutting down...");
  handle.stop();
});

handle.done.then(
  () => process.exit(0),
  (error: unknown) => {
    console.error(error);
    process.exit(1);
  },
);
