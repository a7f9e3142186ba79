/**
 * Print whether the scraper may run right now. Exit 0 when permitted, 2 when
 * not, 1 when the configuration is invalid.
 */
import "dotenv/config";
import { errorMessage } from "../../packages/shared/src/errors.js";
import { OperatingWindowOracle } from "../services/operating-window.js";
import { formatZonedTimestamp } from "../utils/zoned-time.js";
import { loadScraperConfig } from "./scraper-config.js";

const EXIT_OUTSIDE_WINDOW = 2;

const main = (): number => {
  const config = loadScraperConfig();
  const oracle = new OperatingWindowOracle(config.window);
  const now = new Date();
  const verdict = oracle.evaluate(now);

  console.log(`Window:     ${oracle.describe()}`);
  console.log(`Local time: ${formatZonedTimestamp(now, oracle.window.timeZone)}`);
  console.log(`${verdict.permitted ? "✓" : "✗"} ${verdict.reason}`);

  return verdict.permitted ? 0 : EXIT_OUTSIDE_WINDOW;
};

try {
  process.exitCode = main();
} catch (error) {
  console.error(errorMessage(error));
  process.exitCode = 1;
}
