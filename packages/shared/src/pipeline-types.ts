import { join } from "node:path";
import type { FlattenedRecordRow } from "./contracts.js";

// ---------------------------------------------------------------------------
// Store layout
// ---------------------------------------------------------------------------

export const DEFAULT_DATA_DIRECTORY = "data/profiles";

export const STORE_FILENAMES = {
  records: "profiles.json",
  table: "profiles.csv",
  ledger: "scraped-urls.txt"
} as const;

export interface StorePaths {
  records: string;
  table: string;
  ledger: string;
}

export const resolveStorePaths = (dataDirectory: string): StorePaths => ({
  records: join(dataDirectory, STORE_FILENAMES.records),
  table: join(dataDirectory, STORE_FILENAMES.table),
  ledger: join(dataDirectory, STORE_FILENAMES.ledger)
});

// ---------------------------------------------------------------------------
// Tabular projection
// ---------------------------------------------------------------------------

export const TABLE_COLUMNS = [
  "profile_url",
  "scraped_at",
  "name",
  "headline",
  "location",
  "about",
  "num_experiences",
  "num_education",
  "num_skills",
  "num_certifications",
  "num_languages"
] as const satisfies ReadonlyArray<keyof FlattenedRecordRow>;
