import { z } from "zod";
import type {
  FlattenedRecordRow,
  RecordIdentifier,
  ScrapedRecord
} from "../../packages/shared/src/contracts.js";
import { PersistenceError, errorMessage } from "../../packages/shared/src/errors.js";
import { TABLE_COLUMNS, type StorePaths } from "../../packages/shared/src/pipeline-types.js";
import { appendDurably, readJsonFile, writeJsonFileAtomic } from "../utils/json-file.js";
import { consoleLogger, type ScrapeLogger } from "../utils/run-log.js";
import type { DedupLedger } from "./dedup-ledger.js";

// ---------------------------------------------------------------------------
// Record schema
// ---------------------------------------------------------------------------

const scrapedRecordSchema = z.object({
  profile_url: z.string().min(1),
  scraped_at: z.string(),
  name: z.string().default(""),
  headline: z.string().default(""),
  location: z.string().default(""),
  about: z.string().default(""),
  experience: z
    .array(
      z.object({
        title: z.string().default(""),
        company: z.string().default(""),
        dates: z.string().default(""),
        location: z.string().default(""),
        description: z.string().default("")
      })
    )
    .default([]),
  education: z
    .array(
      z.object({
        school: z.string().default(""),
        degree: z.string().default(""),
        dates: z.string().default("")
      })
    )
    .default([]),
  skills: z.array(z.string()).default([]),
  certifications: z
    .array(
      z.object({
        name: z.string().default(""),
        issuer: z.string().default(""),
        date: z.string().default("")
      })
    )
    .default([]),
  languages: z.array(z.string()).default([])
});

// ---------------------------------------------------------------------------
// Tabular projection
// ---------------------------------------------------------------------------

export const flattenRecord = (record: ScrapedRecord): FlattenedRecordRow => ({
  profile_url: record.profile_url,
  scraped_at: record.scraped_at,
  name: record.name,
  headline: record.headline,
  location: record.location,
  about: record.about,
  num_experiences: record.experience.length,
  num_education: record.education.length,
  num_skills: record.skills.length,
  num_certifications: record.certifications.length,
  num_languages: record.languages.length
});

export const CSV_LINE_TERMINATOR = "\r\n";

export const escapeCsvField = (value: string | number): string => {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replaceAll('"', '""')}"` : text;
};

export const toCsvRow = (values: ReadonlyArray<string | number>): string =>
  `${values.map(escapeCsvField).join(",")}${CSV_LINE_TERMINATOR}`;

export const CSV_HEADER = toCsvRow(TABLE_COLUMNS);

// ---------------------------------------------------------------------------
// Sink
// ---------------------------------------------------------------------------

interface PersistenceSinkOptions {
  paths: StorePaths;
  ledger: Pick<DedupLedger, "append">;
  logger?: ScrapeLogger;
}

/**
 * Writes each record to the JSON and CSV stores, then marks it in the ledger.
 * The JSON store is rewritten on every call; it is not safe for two
 * processes to persist into the same directory at once.
 */
export class PersistenceSink {
  private readonly paths: StorePaths;

  private readonly ledger: Pick<DedupLedger, "append">;

  private readonly logger: ScrapeLogger;

  constructor(options: PersistenceSinkOptions) {
    this.paths = options.paths;
    this.ledger = options.ledger;
    this.logger = options.logger ?? consoleLogger;
  }

  async persist(record: ScrapedRecord): Promise<void> {
    const existing = await this.readStructuredStore();

    try {
      await writeJsonFileAtomic(this.paths.records, [...existing, record]);
    } catch (writeError) {
      throw new PersistenceError(
        `Could not write ${this.paths.records}: ${errorMessage(writeError)}`,
        { cause: writeError }
      );
    }

    try {
      const row = flattenRecord(record);
      await appendDurably(this.paths.table, (wasEmpty) => {
        const line = toCsvRow(TABLE_COLUMNS.map((column) => row[column]));
        return wasEmpty ? `${CSV_HEADER}${line}` : line;
      });
    } catch (appendError) {
      throw new PersistenceError(
        `Could not append to ${this.paths.table}: ${errorMessage(appendError)}`,
        { cause: appendError }
      );
    }

    this.markProcessed(record.profile_url);
    this.logger.log(`[persist] Saved ${record.profile_url} (${existing.length + 1} record(s) stored).`);
  }

  private async readStructuredStore(): Promise<unknown[]> {
    let stored: unknown;
    try {
      stored = await readJsonFile(this.paths.records);
    } catch (readError) {
      throw new PersistenceError(
        `Could not read ${this.paths.records}: ${errorMessage(readError)}`,
        { cause: readError }
      );
    }

    if (stored === null) {
      return [];
    }

    if (!Array.isArray(stored)) {
      throw new PersistenceError(`${this.paths.records} does not contain a JSON array; refusing to overwrite it.`);
    }

    return stored;
  }

  private markProcessed(identifier: RecordIdentifier): void {
    try {
      this.ledger.append(identifier);
    } catch (ledgerError) {
      throw new PersistenceError(
        `Stored ${identifier} but could not record it in the ledger: ${errorMessage(ledgerError)}`,
        { cause: ledgerError }
      );
    }
  }
}

// ---------------------------------------------------------------------------
// Consumers
// ---------------------------------------------------------------------------

interface ReadPersistedRecordsOptions {
  /** Keep one record per profile, the most recently scraped one. */
  dedupe?: boolean;
  logger?: ScrapeLogger;
}

export const readPersistedRecords = async (
  filePath: string,
  { dedupe = false, logger = consoleLogger }: ReadPersistedRecordsOptions = {}
): Promise<ScrapedRecord[]> => {
  let stored: unknown;
  try {
    stored = await readJsonFile(filePath);
  } catch (readError) {
    throw new PersistenceError(`Could not read ${filePath}: ${errorMessage(readError)}`, {
      cause: readError
    });
  }

  if (stored === null) {
    return [];
  }

  const parsed = z.array(z.unknown()).safeParse(stored);
  if (!parsed.success) {
    throw new PersistenceError(`${filePath} does not contain a JSON array.`);
  }

  const records: ScrapedRecord[] = [];
  let invalidEntries = 0;
  for (const entry of parsed.data) {
    const result = scrapedRecordSchema.safeParse(entry);
    if (result.success) {
      records.push(result.data);
    } else {
      invalidEntries += 1;
    }
  }

  if (invalidEntries > 0) {
    logger.warn(`[persist] Skipped ${invalidEntries} malformed record(s) in ${filePath}.`);
  }

  if (!dedupe) {
    return records;
  }

  const latestByProfile = new Map<RecordIdentifier, ScrapedRecord>();
  for (const record of records) {
    const current = latestByProfile.get(record.profile_url);
    if (!current || record.scraped_at >= current.scraped_at) {
      latestByProfile.set(record.profile_url, record);
    }
  }

  return [...latestByProfile.values()];
};
