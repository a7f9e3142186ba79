import { ConfigurationError } from "../../packages/shared/src/errors.js";
import { resolveStorePaths } from "../../packages/shared/src/pipeline-types.js";
import {
  PlaywrightSessionAuthenticator,
  createChromiumContextFactory,
  type BrowserContextFactory
} from "../services/browser-session.js";
import { DedupLedger } from "../services/dedup-ledger.js";
import { LinkDiscovery } from "../services/link-discovery.js";
import { OperatingWindowOracle } from "../services/operating-window.js";
import { PacingGenerator, type Sleep } from "../services/pacing.js";
import { PersistenceSink } from "../services/persistence-sink.js";
import { ProfileExtractor } from "../services/profile-extractor.js";
import { ScrapeOrchestrator } from "../services/scrape-orchestrator.js";
import type { ScrapeLogger } from "../utils/run-log.js";
import { resolveCredentials, resolveLoginUrl, type ScraperConfig } from "./scraper-config.js";

// ---------------------------------------------------------------------------
// Command line
// ---------------------------------------------------------------------------

export const SCRAPE_USAGE = "Usage: npm run scrape -- <listing-url> [max-records] [--yes]";

export interface ScrapeArguments {
  listingLocation: string;
  maxRecords: number;
  assumeYes: boolean;
}

export const parseScrapeArguments = (
  argv: readonly string[],
  defaultMaxRecords: number
): ScrapeArguments => {
  const flags = argv.filter((argument) => argument.startsWith("--"));
  const positional = argv.filter((argument) => !argument.startsWith("--"));

  const unknownFlags = flags.filter((flag) => flag !== "--yes");
  if (unknownFlags.length) {
    throw new ConfigurationError(`Unknown option ${unknownFlags.join(", ")}\n${SCRAPE_USAGE}`);
  }

  const [listingLocation, maxRecordsText, ...extra] = positional;
  if (!listingLocation || extra.length) {
    throw new ConfigurationError(SCRAPE_USAGE);
  }

  let parsedUrl: URL;
  try {
    parsedUrl = new URL(listingLocation);
  } catch {
    throw new ConfigurationError(`Not a valid URL: ${listingLocation}\n${SCRAPE_USAGE}`);
  }

  if (parsedUrl.protocol !== "http:" && parsedUrl.protocol !== "https:") {
    throw new ConfigurationError(`Listing URL must use http or https: ${listingLocation}`);
  }

  let maxRecords = defaultMaxRecords;
  if (maxRecordsText !== undefined) {
    maxRecords = Number(maxRecordsText);
    if (!/^\d+$/.test(maxRecordsText) || maxRecords < 1) {
      throw new ConfigurationError(
        `max-records must be a positive integer (got "${maxRecordsText}")\n${SCRAPE_USAGE}`
      );
    }
  }

  return {
    listingLocation,
    maxRecords,
    assumeYes: flags.includes("--yes")
  };
};

// ---------------------------------------------------------------------------
// Wiring
// ---------------------------------------------------------------------------

interface ScrapeRuntimeOptions {
  logger: ScrapeLogger;
  browserContextFactory?: BrowserContextFactory;
  sleep?: Sleep;
}

export interface ScrapeRuntime {
  orchestrator: ScrapeOrchestrator;
  oracle: OperatingWindowOracle;
  ledger: DedupLedger;
}

/** Build every collaborator of one run from the process configuration. */
export const createScrapeRuntime = (
  config: ScraperConfig,
  listingLocation: string,
  { logger, browserContextFactory, sleep }: ScrapeRuntimeOptions
): ScrapeRuntime => {
  const paths = resolveStorePaths(config.dataDirectory);
  const pacing = new PacingGenerator(config.pacing);
  const oracle = new OperatingWindowOracle(config.window, logger);
  const ledger = new DedupLedger({ filePath: paths.ledger, logger });

  const authenticator = new PlaywrightSessionAuthenticator({
    resolveCredentials: () => resolveCredentials(config),
    browserContextFactory:
      browserContextFactory ??
      createChromiumContextFactory({
        headless: config.browser.headless,
        timeZone: oracle.window.timeZone
      }),
    loginUrl: resolveLoginUrl(config, listingLocation),
    selectors: config.site.loginSelectors,
    successPattern: new RegExp(config.site.loginSuccessPattern),
    requestTimeoutMs: config.browser.requestTimeoutMs,
    pacing,
    sleep,
    logger
  });

  const orchestrator = new ScrapeOrchestrator({
    authenticator,
    discovery: new LinkDiscovery({
      ledger,
      pacing,
      recordPathPattern: new RegExp(config.site.recordPathPattern),
      sleep,
      logger
    }),
    extractor: new ProfileExtractor({
      pacing,
      timeZone: oracle.window.timeZone,
      sleep,
      logger
    }),
    sink: new PersistenceSink({ paths, ledger, logger }),
    ledger,
    oracle,
    pacing,
    discoveryBudget: config.discoveryBudget,
    sleep,
    logger
  });

  return { orchestrator, oracle, ledger };
};
