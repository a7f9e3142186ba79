import { EventEmitter } from "node:events";
import type {
  RecordIdentifier,
  RunState,
  RunSummary,
  ScrapedRecord,
  StopReason
} from "../../packages/shared/src/contracts.js";
import { ConfigurationError, errorMessage } from "../../packages/shared/src/errors.js";
import { consoleLogger, type ScrapeLogger } from "../utils/run-log.js";
import type { DedupLedger } from "./dedup-ledger.js";
import type { LinkDiscovery } from "./link-discovery.js";
import type { OperatingWindowOracle } from "./operating-window.js";
import { sleep as defaultSleep, secondsToMilliseconds, type PacingGenerator, type Sleep } from "./pacing.js";
import type { PageSession, SessionAuthenticator } from "./page-session.js";
import type { PersistenceSink } from "./persistence-sink.js";
import type { RecordExtractor } from "./profile-extractor.js";

interface ScrapeOrchestratorOptions {
  authenticator: SessionAuthenticator;
  discovery: Pick<LinkDiscovery, "discover">;
  extractor: RecordExtractor;
  sink: Pick<PersistenceSink, "persist">;
  ledger: Pick<DedupLedger, "load" | "contains">;
  oracle: Pick<OperatingWindowOracle, "evaluate">;
  pacing: Pick<PacingGenerator, "longDelay">;
  discoveryBudget: number;
  sleep?: Sleep;
  now?: () => Date;
  logger?: ScrapeLogger;
}

interface RunCounters {
  processed: number;
  candidates: number;
  skipped: number;
  extractionFailures: number;
  persistenceFailures: number;
}

interface RunOutcome {
  stopReason: Exclude<StopReason, "FAILED">;
  message: string;
}

/**
 * Drives one scraping run: sign in, discover candidates, then extract and
 * persist them one at a time with a long randomized pause between page loads.
 * An instance runs once.
 */
export class ScrapeOrchestrator {
  private readonly emitter = new EventEmitter();

  private readonly options: ScrapeOrchestratorOptions;

  private readonly sleep: Sleep;

  private readonly now: () => Date;

  private readonly logger: ScrapeLogger;

  private state: RunState = "Idle";

  private started = false;

  private stopRequest: string | null = null;

  private pauseController: AbortController | null = null;

  constructor(options: ScrapeOrchestratorOptions) {
    this.options = options;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? consoleLogger;
  }

  getState(): RunState {
    return this.state;
  }

  subscribe(listener: (state: RunState) => void): () => void {
    this.emitter.on("state", listener);
    listener(this.getState());

    return () => {
      this.emitter.off("state", listener);
    };
  }

  /**
   * Ask the run to stop before the next candidate. A pending inter-record
   * pause ends early; work on the current record is finished first.
   */
  requestStop(reason: string): void {
    if (this.stopRequest !== null) {
      return;
    }

    this.stopRequest = reason;
    this.logger.warn(`[orchestrator] Stop requested: ${reason}`);
    this.pauseController?.abort();
  }

  async run(location: string, maxRecords: number): Promise<RunSummary> {
    if (this.started) {
      throw new Error("ScrapeOrchestrator.run() can only be called once per instance.");
    }

    if (!Number.isInteger(maxRecords) || maxRecords < 1) {
      throw new ConfigurationError(`Record limit must be a positive integer (got ${maxRecords}).`);
    }

    this.started = true;
    const startedAt = this.now().toISOString();
    const counters: RunCounters = {
      processed: 0,
      candidates: 0,
      skipped: 0,
      extractionFailures: 0,
      persistenceFailures: 0
    };
    let session: PageSession | null = null;

    try {
      this.transition("Authenticating");
      const credentials = this.options.authenticator.resolveCredentials();
      await this.options.ledger.load();

      const authenticated = await this.options.authenticator.authenticate(credentials);
      session = authenticated.session;
      if (!authenticated.confirmed) {
        this.logger.warn(
          `[orchestrator] Login not confirmed (landed on ${authenticated.landingUrl}); continuing anyway.`
        );
      }

      this.transition("Discovering");
      const discovery = await this.options.discovery.discover(
        session,
        location,
        this.options.discoveryBudget
      );
      counters.candidates = discovery.identifiers.length;

      let outcome: RunOutcome;
      if (discovery.identifiers.length === 0) {
        outcome = {
          stopReason: "NO_CANDIDATES",
          message: discovery.failure
            ? `0 processed, no candidates found: ${discovery.failure.message}`
            : "0 processed, no candidates found"
        };
      } else {
        this.transition("Processing");
        outcome = await this.processCandidates(session, discovery.identifiers, maxRecords, counters);
      }

      this.transition("Draining");
      await this.closeSession(session);
      this.transition("Closed");
      this.logger.log(`[orchestrator] ${outcome.message}`);

      return this.summarize("Closed", outcome.stopReason, outcome.message, counters, startedAt, null);
    } catch (runError) {
      const error = errorMessage(runError);
      const message = `${counters.processed} processed, failed: ${error}`;
      this.logger.error(`[orchestrator] ${message}`);

      if (session) {
        await this.closeSession(session);
      }
      this.transition("Failed");

      return this.summarize("Failed", "FAILED", message, counters, startedAt, error);
    }
  }

  private async processCandidates(
    session: PageSession,
    candidates: RecordIdentifier[],
    maxRecords: number,
    counters: RunCounters
  ): Promise<RunOutcome> {
    for (const [index, identifier] of candidates.entries()) {
      if (this.stopRequest !== null) {
        return {
          stopReason: "INTERRUPTED",
          message: `${counters.processed} processed, interrupted: ${this.stopRequest}`
        };
      }

      const verdict = this.options.oracle.evaluate(this.now());
      if (!verdict.permitted) {
        this.logger.warn(`[orchestrator] ${verdict.reason}`);
        return {
          stopReason: "WINDOW_CLOSED",
          message: `${counters.processed} processed, stopped outside operating window: ${verdict.reason}`
        };
      }

      if (this.options.ledger.contains(identifier)) {
        counters.skipped += 1;
        this.logger.log(`[orchestrator] Skipping ${identifier} (already processed).`);
        continue;
      }

      this.logger.log(`[orchestrator] Record ${index + 1}/${candidates.length}: ${identifier}`);
      if (await this.processCandidate(session, identifier, counters)) {
        counters.processed += 1;
        if (counters.processed >= maxRecords) {
          return {
            stopReason: "BUDGET_REACHED",
            message: `${counters.processed} processed, stopped after reaching the limit of ${maxRecords} records`
          };
        }
      }

      if (index < candidates.length - 1) {
        await this.pauseBetweenRecords();
      }
    }

    return {
      stopReason: "COMPLETED",
      message: `${counters.processed} processed, completed normally`
    };
  }

  private async processCandidate(
    session: PageSession,
    identifier: RecordIdentifier,
    counters: RunCounters
  ): Promise<boolean> {
    let record: ScrapedRecord;
    try {
      record = await this.options.extractor.extract(session, identifier);
    } catch (extractionError) {
      counters.extractionFailures += 1;
      this.logger.error(`[orchestrator] Extraction failed for ${identifier}: ${errorMessage(extractionError)}`);
      return false;
    }

    try {
      await this.options.sink.persist(record);
    } catch (persistenceError) {
      counters.persistenceFailures += 1;
      this.logger.error(`[orchestrator] Could not save ${identifier}: ${errorMessage(persistenceError)}`);
      return false;
    }

    return true;
  }

  private async pauseBetweenRecords(): Promise<void> {
    if (this.stopRequest !== null) {
      return;
    }

    const seconds = this.options.pacing.longDelay();
    this.logger.log(`[orchestrator] Waiting ${seconds}s before the next record.`);

    const controller = new AbortController();
    this.pauseController = controller;
    const stopped = new Promise<void>((resolve) => {
      controller.signal.addEventListener("abort", () => resolve(), { once: true });
    });

    try {
      await Promise.race([this.sleep(secondsToMilliseconds(seconds), controller.signal), stopped]);
    } finally {
      this.pauseController = null;
    }
  }

  private async closeSession(session: PageSession): Promise<void> {
    try {
      await session.close();
    } catch (closeError) {
      this.logger.warn(`[orchestrator] Failed to close the browser session: ${errorMessage(closeError)}`);
    }
  }

  private transition(next: RunState): void {
    this.state = next;
    this.emitter.emit("state", next);
  }

  private summarize(
    state: RunSummary["state"],
    stopReason: StopReason,
    message: string,
    counters: RunCounters,
    startedAt: string,
    error: string | null
  ): RunSummary {
    return {
      state,
      stopReason,
      message,
      ...counters,
      startedAt,
      finishedAt: this.now().toISOString(),
      error
    };
  }
}
