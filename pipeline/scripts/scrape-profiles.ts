/**
 * Scrape profiles linked from a listing page, one at a time and only inside
 * the configured operating window.
 *
 *   npm run scrape -- <listing-url> [max-records] [--yes]
 *
 * Records are appended to <DATA_DIR>/profiles.json and profiles.csv; the
 * ledger <DATA_DIR>/scraped-urls.txt makes reruns skip finished profiles.
 */
import "dotenv/config";
import { createInterface } from "node:readline/promises";
import { errorMessage } from "../../packages/shared/src/errors.js";
import { createRunLog } from "../utils/run-log.js";
import { formatZonedTimestamp } from "../utils/zoned-time.js";
import { loadScraperConfig, type ScraperConfig } from "./scraper-config.js";
import {
  createScrapeRuntime,
  parseScrapeArguments,
  type ScrapeArguments
} from "./scrape-runtime.js";

const EXIT_INTERRUPTED = 130;

const confirm = async (question: string): Promise<boolean> => {
  const prompt = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await prompt.question(question);
    return ["y", "yes"].includes(answer.trim().toLowerCase());
  } finally {
    prompt.close();
  }
};

const readStartup = (): { config: ScraperConfig; args: ScrapeArguments } | null => {
  try {
    const config = loadScraperConfig();
    return { config, args: parseScrapeArguments(process.argv.slice(2), config.maxRecordsPerRun) };
  } catch (startupError) {
    console.error(errorMessage(startupError));
    return null;
  }
};

const main = async (): Promise<number> => {
  const startup = readStartup();
  if (!startup) {
    return 1;
  }

  const { config, args } = startup;

  const logger = createRunLog({ logFilePath: config.logFilePath });
  const { orchestrator, oracle, ledger } = createScrapeRuntime(config, args.listingLocation, { logger });

  const now = new Date();
  const verdict = oracle.evaluate(now);
  console.log("=== Profile scrape ===\n");
  console.log(`Listing:        ${args.listingLocation}`);
  console.log(`Record limit:   ${args.maxRecords}`);
  console.log(`Window:         ${oracle.describe()}`);
  console.log(`Local time:     ${formatZonedTimestamp(now, oracle.window.timeZone)} (${verdict.reason})`);
  console.log(`Delay:          ${config.pacing.longDelay.minSeconds}-${config.pacing.longDelay.maxSeconds}s between records`);
  console.log(`Data directory: ${config.dataDirectory}\n`);

  if (!args.assumeYes && !(await confirm("Start scraping? (yes/no) "))) {
    logger.log("[orchestrator] Aborted by operator.");
    return 0;
  }

  let interrupts = 0;
  process.on("SIGINT", () => {
    interrupts += 1;
    if (interrupts > 1) {
      logger.error("[orchestrator] Second interrupt, exiting immediately.");
      process.exit(EXIT_INTERRUPTED);
    }

    orchestrator.requestStop("received SIGINT");
  });

  const startTime = Date.now();
  const summary = await orchestrator.run(args.listingLocation, args.maxRecords);
  const elapsedSeconds = ((Date.now() - startTime) / 1000).toFixed(1);

  console.log(`\n${summary.message}`);
  console.log(
    `Candidates: ${summary.candidates}, skipped: ${summary.skipped}, ` +
      `extraction failures: ${summary.extractionFailures}, save failures: ${summary.persistenceFailures}`
  );
  console.log(`Ledger now holds ${ledger.size} profile(s). Elapsed ${elapsedSeconds}s.`);

  if (summary.stopReason !== "FAILED") {
    return 0;
  }

  return 1;
};

main()
  .then((exitCode) => {
    process.exit(exitCode);
  })
  .catch((error: unknown) => {
    console.error("Fatal error in scrape-profiles:");
    console.error(error);
    process.exit(1);
  });
