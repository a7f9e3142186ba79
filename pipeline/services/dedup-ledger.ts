import { closeSync, fsyncSync, mkdirSync, openSync, writeSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { RecordIdentifier } from "../../packages/shared/src/contracts.js";
import { PersistenceError, errorMessage } from "../../packages/shared/src/errors.js";
import { canonicalizeRecordUrl } from "../utils/record-identifier.js";
import { consoleLogger, type ScrapeLogger } from "../utils/run-log.js";

interface DedupLedgerOptions {
  filePath: string;
  logger?: ScrapeLogger;
}

const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Newline-delimited set of identifiers that were fully persisted. The file is
 * only ever appended to; duplicate lines are tolerated and collapse on load.
 */
export class DedupLedger {
  private readonly filePath: string;

  private readonly logger: ScrapeLogger;

  private readonly identifiers = new Set<RecordIdentifier>();

  private loaded = false;

  private loadPromise: Promise<void> | null = null;

  constructor(options: DedupLedgerOptions) {
    this.filePath = options.filePath;
    this.logger = options.logger ?? consoleLogger;
  }

  get size(): number {
    return this.identifiers.size;
  }

  async load(): Promise<ReadonlySet<RecordIdentifier>> {
    if (!this.loaded) {
      if (!this.loadPromise) {
        this.loadPromise = this.readLedgerFile();
      }

      await this.loadPromise;
    }

    return new Set(this.identifiers);
  }

  contains(identifier: RecordIdentifier): boolean {
    const canonical = canonicalizeRecordUrl(identifier);
    return canonical !== null && this.identifiers.has(canonical);
  }

  /**
   * Durably record the canonical form of `identifier`. The line is fsynced
   * before this returns, so a later `load` sees it even if the process dies
   * right after.
   */
  append(identifier: RecordIdentifier): void {
    const canonical = canonicalizeRecordUrl(identifier);
    if (!canonical) {
      throw new PersistenceError(`Not a record URL, refusing to add it to the ledger: ${identifier}`);
    }

    if (this.identifiers.has(canonical)) {
      return;
    }

    mkdirSync(dirname(this.filePath), { recursive: true });
    const descriptor = openSync(this.filePath, "a");
    try {
      writeSync(descriptor, `${canonical}\n`);
      fsyncSync(descriptor);
    } finally {
      closeSync(descriptor);
    }

    this.identifiers.add(canonical);
  }

  private async readLedgerFile(): Promise<void> {
    try {
      const raw = await readFile(this.filePath, "utf8");
      let rejectedLines = 0;

      for (const line of raw.split(/\r?\n/)) {
        const trimmed = line.trim();
        if (!trimmed) {
          continue;
        }

        const identifier = canonicalizeRecordUrl(trimmed);
        if (!identifier) {
          rejectedLines += 1;
          continue;
        }

        this.identifiers.add(identifier);
      }

      if (rejectedLines > 0) {
        this.logger.warn(
          `[ledger] Ignored ${rejectedLines} unreadable line(s) in ${this.filePath}.`
        );
      }
      this.logger.log(`[ledger] Loaded ${this.identifiers.size} processed identifier(s).`);
    } catch (loadError) {
      if (!isMissingFileError(loadError)) {
        this.logger.warn(
          `[ledger] Could not read ${this.filePath}, starting with an empty ledger: ${errorMessage(loadError)}`
        );
      }
    } finally {
      this.loaded = true;
    }
  }
}
