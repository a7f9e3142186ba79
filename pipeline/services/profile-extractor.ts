import type { RecordIdentifier, ScrapedRecord } from "../../packages/shared/src/contracts.js";
import { ExtractionFailure, errorMessage } from "../../packages/shared/src/errors.js";
import { consoleLogger, type ScrapeLogger } from "../utils/run-log.js";
import { formatZonedTimestamp } from "../utils/zoned-time.js";
import { sleep as defaultSleep, secondsToMilliseconds, type PacingGenerator, type Sleep } from "./pacing.js";
import type { PageSession } from "./page-session.js";
import {
  DEFAULT_PROFILE_SELECTORS,
  parseProfilePage,
  type ProfileSelectors
} from "./profile-parser.js";

export interface RecordExtractor {
  /** Throws ExtractionFailure when the page cannot be loaded or read. */
  extract(session: PageSession, identifier: RecordIdentifier): Promise<ScrapedRecord>;
}

interface ProfileExtractorOptions {
  pacing: PacingGenerator;
  /** Zone used for the record's `scraped_at` wall-clock timestamp. */
  timeZone: string;
  selectors?: ProfileSelectors;
  maxScrollRounds?: number;
  sleep?: Sleep;
  now?: () => Date;
  logger?: ScrapeLogger;
}

const DEFAULT_MAX_SCROLL_ROUNDS = 5;

export class ProfileExtractor implements RecordExtractor {
  private readonly pacing: PacingGenerator;

  private readonly timeZone: string;

  private readonly selectors: ProfileSelectors;

  private readonly maxScrollRounds: number;

  private readonly sleep: Sleep;

  private readonly now: () => Date;

  private readonly logger: ScrapeLogger;

  constructor(options: ProfileExtractorOptions) {
    this.pacing = options.pacing;
    this.timeZone = options.timeZone;
    this.selectors = options.selectors ?? DEFAULT_PROFILE_SELECTORS;
    this.maxScrollRounds = options.maxScrollRounds ?? DEFAULT_MAX_SCROLL_ROUNDS;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? consoleLogger;
  }

  async extract(session: PageSession, identifier: RecordIdentifier): Promise<ScrapedRecord> {
    let html: string;
    try {
      this.logger.log(`[extractor] Loading ${identifier}`);
      await session.goto(identifier);
      await this.pause();
      await this.scrollUntilSettled(session);
      await this.expandSections(session);
      html = await session.content();
    } catch (sessionError) {
      throw new ExtractionFailure(
        `Could not read ${identifier}: ${errorMessage(sessionError)}`,
        { cause: sessionError }
      );
    }

    const record = parseProfilePage(
      html,
      identifier,
      formatZonedTimestamp(this.now(), this.timeZone),
      this.selectors
    );

    if (!record.name) {
      this.logger.warn(`[extractor] No name found on ${identifier}; the page layout may have changed.`);
    }

    return record;
  }

  private async scrollUntilSettled(session: PageSession): Promise<void> {
    let previousHeight = -1;
    for (let round = 0; round < this.maxScrollRounds; round += 1) {
      const height = await session.scrollToBottom();
      if (height === previousHeight) {
        break;
      }

      previousHeight = height;
      await this.pause();
    }

    await session.scrollToTop();
  }

  private async expandSections(session: PageSession): Promise<void> {
    for (const selector of this.selectors.expanders) {
      let clicked: boolean;
      try {
        clicked = await session.clickIfPresent(selector);
      } catch (clickError) {
        this.logger.warn(`[extractor] Could not expand ${selector}: ${errorMessage(clickError)}`);
        continue;
      }

      if (clicked) {
        await this.pause();
      }
    }
  }

  private pause(): Promise<void> {
    return this.sleep(secondsToMilliseconds(this.pacing.shortDelay()));
  }
}
