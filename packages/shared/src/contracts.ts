/**
 * Canonical profile URL: query and fragment stripped, no trailing slash.
 * See `canonicalizeRecordUrl` for the exact rules.
 */
export type RecordIdentifier = string;

export interface ExperienceEntry {
  title: string;
  company: string;
  dates: string;
  location: string;
  description: string;
}

export interface EducationEntry {
  school: string;
  degree: string;
  dates: string;
}

export interface CertificationEntry {
  name: string;
  issuer: string;
  date: string;
}

/**
 * One captured profile. Field names are snake_case because they are written
 * verbatim to the JSON and CSV stores.
 */
export interface ScrapedRecord {
  profile_url: RecordIdentifier;
  scraped_at: string;
  name: string;
  headline: string;
  location: string;
  about: string;
  experience: ExperienceEntry[];
  education: EducationEntry[];
  skills: string[];
  certifications: CertificationEntry[];
  languages: string[];
}

export interface FlattenedRecordRow {
  profile_url: string;
  scraped_at: string;
  name: string;
  headline: string;
  location: string;
  about: string;
  num_experiences: number;
  num_education: number;
  num_skills: number;
  num_certifications: number;
  num_languages: number;
}

/** Monday = 0 … Sunday = 6. */
export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6;

export interface TimeOfDay {
  hour: number;
  minute: number;
}

export interface OperatingWindow {
  days: readonly Weekday[];
  start: TimeOfDay;
  end: TimeOfDay;
  timeZone: string;
}

export type WindowVerdictKind =
  | "WITHIN_WINDOW"
  | "WRONG_DAY"
  | "BEFORE_WINDOW"
  | "AFTER_WINDOW";

export interface WindowVerdict {
  permitted: boolean;
  kind: WindowVerdictKind;
  reason: string;
  localTime: string;
}

export interface DelayRange {
  minSeconds: number;
  maxSeconds: number;
}

export type RunState =
  | "Idle"
  | "Authenticating"
  | "Discovering"
  | "Processing"
  | "Draining"
  | "Closed"
  | "Failed";

export type StopReason =
  | "COMPLETED"
  | "BUDGET_REACHED"
  | "WINDOW_CLOSED"
  | "NO_CANDIDATES"
  | "INTERRUPTED"
  | "FAILED";

export interface RunSummary {
  state: "Closed" | "Failed";
  stopReason: StopReason;
  message: string;
  processed: number;
  candidates: number;
  skipped: number;
  extractionFailures: number;
  persistenceFailures: number;
  startedAt: string;
  finishedAt: string;
  error: string | null;
}

export interface ScraperCredentials {
  username: string;
  password: string;
}
