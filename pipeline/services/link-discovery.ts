import type { RecordIdentifier } from "../../packages/shared/src/contracts.js";
import {
  ConfigurationError,
  DiscoveryFailure,
  errorMessage
} from "../../packages/shared/src/errors.js";
import { consoleLogger, type ScrapeLogger } from "../utils/run-log.js";
import type { DedupLedger } from "./dedup-ledger.js";
import { sleep as defaultSleep, secondsToMilliseconds, type PacingGenerator, type Sleep } from "./pacing.js";
import type { PageSession } from "./page-session.js";
import { parseRecordLinks } from "./profile-parser.js";

export interface DiscoveryResult {
  identifiers: RecordIdentifier[];
  /** Reveal attempts made after the first read of the page. */
  attempts: number;
  alreadyProcessed: number;
  failure: DiscoveryFailure | null;
}

interface LinkDiscoveryOptions {
  ledger: Pick<DedupLedger, "contains">;
  pacing: PacingGenerator;
  recordPathPattern: RegExp;
  sleep?: Sleep;
  logger?: ScrapeLogger;
}

const STALE_REVEALS_BEFORE_STOP = 2;

export class LinkDiscovery {
  private readonly ledger: Pick<DedupLedger, "contains">;

  private readonly pacing: PacingGenerator;

  private readonly recordPathPattern: RegExp;

  private readonly sleep: Sleep;

  private readonly logger: ScrapeLogger;

  constructor(options: LinkDiscoveryOptions) {
    this.ledger = options.ledger;
    this.pacing = options.pacing;
    this.recordPathPattern = options.recordPathPattern;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? consoleLogger;
  }

  async discover(session: PageSession, location: string, budget: number): Promise<DiscoveryResult> {
    if (!Number.isInteger(budget) || budget < 0) {
      throw new ConfigurationError(`Discovery budget must be a non-negative integer (got ${budget}).`);
    }

    const seen = new Set<RecordIdentifier>();
    const collect = async (): Promise<number> => {
      const before = seen.size;
      for (const identifier of parseRecordLinks(await session.content(), location, this.recordPathPattern)) {
        seen.add(identifier);
      }

      return seen.size - before;
    };

    this.logger.log(`[discovery] Opening ${location}`);
    try {
      await session.goto(location);
      await this.pause();
      await collect();
    } catch (navigationError) {
      const failure = new DiscoveryFailure(
        `Could not load listing ${location}: ${errorMessage(navigationError)}`,
        { cause: navigationError }
      );
      this.logger.warn(`[discovery] ${failure.message}`);
      return { identifiers: [], attempts: 0, alreadyProcessed: 0, failure };
    }

    let attempts = 0;
    let staleReveals = 0;
    while (attempts < budget && staleReveals < STALE_REVEALS_BEFORE_STOP) {
      attempts += 1;
      try {
        await session.scrollToBottom();
        await this.pause();
        const added = await collect();
        staleReveals = added === 0 ? staleReveals + 1 : 0;
      } catch (revealError) {
        this.logger.warn(
          `[discovery] Reveal attempt ${attempts} failed, keeping ${seen.size} link(s): ${errorMessage(revealError)}`
        );
        break;
      }
    }

    const identifiers: RecordIdentifier[] = [];
    let alreadyProcessed = 0;
    for (const identifier of seen) {
      if (this.ledger.contains(identifier)) {
        alreadyProcessed += 1;
      } else {
        identifiers.push(identifier);
      }
    }

    this.logger.log(
      `[discovery] Found ${seen.size} link(s) after ${attempts} reveal attempt(s); ` +
        `${alreadyProcessed} already processed, ${identifiers.length} new.`
    );

    return { identifiers, attempts, alreadyProcessed, failure: null };
  }

  private pause(): Promise<void> {
    return this.sleep(secondsToMilliseconds(this.pacing.shortDelay()));
  }
}
