import { z } from "zod";
import type {
  DelayRange,
  OperatingWindow,
  ScraperCredentials,
  TimeOfDay,
  Weekday
} from "../../packages/shared/src/contracts.js";
import { ConfigurationError } from "../../packages/shared/src/errors.js";
import { DEFAULT_DATA_DIRECTORY } from "../../packages/shared/src/pipeline-types.js";
import {
  DEFAULT_LOGIN_SELECTORS,
  type LoginSelectors
} from "../services/browser-session.js";

// ---------------------------------------------------------------------------
// Config shape
// ---------------------------------------------------------------------------

export interface ScraperConfig {
  credentials: {
    username: string | null;
    password: string | null;
  };
  site: {
    loginUrl: string | null;
    loginSuccessPattern: string;
    recordPathPattern: string;
    loginSelectors: LoginSelectors;
  };
  window: OperatingWindow;
  pacing: {
    longDelay: DelayRange;
    shortDelay: DelayRange;
  };
  browser: {
    headless: boolean;
    requestTimeoutMs: number;
  };
  dataDirectory: string;
  maxRecordsPerRun: number;
  discoveryBudget: number;
  logFilePath: string | null;
}

export const DEFAULT_LOG_FILE_PATH = `${DEFAULT_DATA_DIRECTORY}/scraper.log`;

// ---------------------------------------------------------------------------
// Environment parsing
// ---------------------------------------------------------------------------

const DAY_TOKENS: Record<string, Weekday> = {
  "0": 0, mon: 0, monday: 0,
  "1": 1, tue: 1, tuesday: 1,
  "2": 2, wed: 2, wednesday: 2,
  "3": 3, thu: 3, thursday: 3,
  "4": 4, fri: 4, friday: 4,
  "5": 5, sat: 5, saturday: 5,
  "6": 6, sun: 6, sunday: 6
};

const operatingDaysSchema = z
  .string()
  .default("mon,tue,wed,thu,fri")
  .transform((value, context): Weekday[] => {
    const days: Weekday[] = [];
    for (const token of value.split(",").map((part) => part.trim().toLowerCase())) {
      if (!token) {
        continue;
      }

      const day = DAY_TOKENS[token];
      if (day === undefined) {
        context.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Unknown weekday "${token}" (use mon..sun or 0..6 with Monday = 0)`
        });
        return z.NEVER;
      }

      if (!days.includes(day)) {
        days.push(day);
      }
    }

    if (!days.length) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        message: "At least one operating day is required"
      });
      return z.NEVER;
    }

    return days.sort((left, right) => left - right);
  });

const timeOfDaySchema = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value, context): TimeOfDay => {
      const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
      const hour = Number(match?.[1]);
      const minute = Number(match?.[2]);
      if (!match || hour > 23 || minute > 59) {
        context.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Expected a time of day as HH:mm, received "${value}"`
        });
        return z.NEVER;
      }

      return { hour, minute };
    });

const patternSchema = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .refine(
      (value) => {
        try {
          new RegExp(value);
          return true;
        } catch {
          return false;
        }
      },
      { message: "Expected a valid regular expression" }
    );

const booleanFlagSchema = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .default("false")
  .transform((value) => value === "true" || value === "1" || value === "yes");

const secondsSchema = (fallback: number) => z.coerce.number().finite().nonnegative().default(fallback);

const environmentSchema = z
  .object({
    SCRAPER_EMAIL: z.string().trim().optional(),
    SCRAPER_PASSWORD: z.string().optional(),
    SCRAPER_LOGIN_URL: z.string().url().optional(),
    SCRAPER_LOGIN_SUCCESS_PATTERN: patternSchema("/feed|/mynetwork"),
    SCRAPER_RECORD_PATH_PATTERN: patternSchema("/in/"),
    OPERATING_DAYS: operatingDaysSchema,
    OPERATING_START: timeOfDaySchema("09:00"),
    OPERATING_END: timeOfDaySchema("16:30"),
    OPERATING_TIMEZONE: z.string().trim().min(1).default("America/New_York"),
    MIN_DELAY_SECONDS: secondsSchema(60),
    MAX_DELAY_SECONDS: secondsSchema(600),
    SHORT_DELAY_MIN_SECONDS: secondsSchema(2),
    SHORT_DELAY_MAX_SECONDS: secondsSchema(4),
    HEADLESS: booleanFlagSchema,
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    DATA_DIR: z.string().trim().min(1).default(DEFAULT_DATA_DIRECTORY),
    MAX_RECORDS_PER_RUN: z.coerce.number().int().positive().default(50),
    DISCOVERY_BUDGET: z.coerce.number().int().nonnegative().default(3),
    SCRAPER_LOG_FILE: z.string().trim().default(DEFAULT_LOG_FILE_PATH)
  })
  .superRefine((environment, context) => {
    const startMinute = environment.OPERATING_START.hour * 60 + environment.OPERATING_START.minute;
    const endMinute = environment.OPERATING_END.hour * 60 + environment.OPERATING_END.minute;
    if (startMinute > endMinute) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["OPERATING_END"],
        message: "Operating end must not be earlier than operating start"
      });
    }

    if (environment.MIN_DELAY_SECONDS > environment.MAX_DELAY_SECONDS) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["MAX_DELAY_SECONDS"],
        message: "Must not be less than MIN_DELAY_SECONDS"
      });
    }

    if (environment.SHORT_DELAY_MIN_SECONDS > environment.SHORT_DELAY_MAX_SECONDS) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["SHORT_DELAY_MAX_SECONDS"],
        message: "Must not be less than SHORT_DELAY_MIN_SECONDS"
      });
    }
  });

/** Empty values behave as unset, except for the log file where "" disables it. */
const KEYS_WHERE_EMPTY_IS_MEANINGFUL = new Set(["SCRAPER_LOG_FILE"]);

const readEnvironment = (env: NodeJS.ProcessEnv): Record<string, string> => {
  const input: Record<string, string> = {};
  for (const key of Object.keys(environmentSchema.innerType().shape)) {
    const value = env[key];
    if (value === undefined) {
      continue;
    }

    if (value.trim() === "" && !KEYS_WHERE_EMPTY_IS_MEANINGFUL.has(key)) {
      continue;
    }

    input[key] = value;
  }

  return input;
};

/**
 * Build the one configuration value for this process. Throws
 * ConfigurationError naming every invalid variable.
 */
export const loadScraperConfig = (env: NodeJS.ProcessEnv = process.env): ScraperConfig => {
  const parseResult = environmentSchema.safeParse(readEnvironment(env));
  if (!parseResult.success) {
    const problems = parseResult.error.issues.map(
      (issue) => `  - ${issue.path.join(".") || "environment"}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid configuration:\n${problems.join("\n")}`);
  }

  const environment = parseResult.data;

  return Object.freeze({
    credentials: Object.freeze({
      username: environment.SCRAPER_EMAIL || null,
      password: environment.SCRAPER_PASSWORD || null
    }),
    site: Object.freeze({
      loginUrl: environment.SCRAPER_LOGIN_URL ?? null,
      loginSuccessPattern: environment.SCRAPER_LOGIN_SUCCESS_PATTERN,
      recordPathPattern: environment.SCRAPER_RECORD_PATH_PATTERN,
      loginSelectors: Object.freeze({ ...DEFAULT_LOGIN_SELECTORS })
    }),
    window: Object.freeze({
      days: Object.freeze(environment.OPERATING_DAYS),
      start: Object.freeze(environment.OPERATING_START),
      end: Object.freeze(environment.OPERATING_END),
      timeZone: environment.OPERATING_TIMEZONE
    }),
    pacing: Object.freeze({
      longDelay: Object.freeze({
        minSeconds: environment.MIN_DELAY_SECONDS,
        maxSeconds: environment.MAX_DELAY_SECONDS
      }),
      shortDelay: Object.freeze({
        minSeconds: environment.SHORT_DELAY_MIN_SECONDS,
        maxSeconds: environment.SHORT_DELAY_MAX_SECONDS
      })
    }),
    browser: Object.freeze({
      headless: environment.HEADLESS,
      requestTimeoutMs: environment.REQUEST_TIMEOUT_MS
    }),
    dataDirectory: environment.DATA_DIR,
    maxRecordsPerRun: environment.MAX_RECORDS_PER_RUN,
    discoveryBudget: environment.DISCOVERY_BUDGET,
    logFilePath: environment.SCRAPER_LOG_FILE || null
  });
};

export const resolveCredentials = (config: ScraperConfig): ScraperCredentials => {
  const { username, password } = config.credentials;
  if (!username || !password) {
    throw new ConfigurationError(
      "Scraper credentials not provided. Set SCRAPER_EMAIL and SCRAPER_PASSWORD (for example in .env)."
    );
  }

  return { username, password };
};

/** Explicit SCRAPER_LOGIN_URL, otherwise `/login` on the listing's origin. */
export const resolveLoginUrl = (config: ScraperConfig, listingLocation: string): string =>
  config.site.loginUrl ?? new URL("/login", listingLocation).toString();
