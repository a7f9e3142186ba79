import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../../packages/shared/src/errors.js";
import {
  loadScraperConfig,
  resolveCredentials,
  resolveLoginUrl
} from "../../pipeline/scripts/scraper-config.js";

describe("loadScraperConfig", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadScraperConfig({});

    expect(config).toEqual({
      credentials: { username: null, password: null },
      site: {
        loginUrl: null,
        loginSuccessPattern: "/feed|/mynetwork",
        recordPathPattern: "/in/",
        loginSelectors: {
          username: "#username",
          password: "#password",
          submit: "button[type='submit']"
        }
      },
      window: {
        days: [0, 1, 2, 3, 4],
        start: { hour: 9, minute: 0 },
        end: { hour: 16, minute: 30 },
        timeZone: "America/New_York"
      },
      pacing: {
        longDelay: { minSeconds: 60, maxSeconds: 600 },
        shortDelay: { minSeconds: 2, maxSeconds: 4 }
      },
      browser: { headless: false, requestTimeoutMs: 30_000 },
      dataDirectory: "data/profiles",
      maxRecordsPerRun: 50,
      discoveryBudget: 3,
      logFilePath: "data/profiles/scraper.log"
    });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.window.days)).toBe(true);
  });

  it("reads overrides and treats blank values as unset", () => {
    const config = loadScraperConfig({
      SCRAPER_EMAIL: "  operator@example.com ",
      SCRAPER_PASSWORD: "test-secret",
      OPERATING_DAYS: "Sat, sunday,5",
      OPERATING_START: "7:05",
      OPERATING_END: "23:59",
      OPERATING_TIMEZONE: "Europe/Berlin",
      MIN_DELAY_SECONDS: "1.5",
      MAX_DELAY_SECONDS: "2",
      HEADLESS: "yes",
      MAX_RECORDS_PER_RUN: "",
      SCRAPER_LOG_FILE: ""
    });

    expect(config.credentials).toEqual({ username: "operator@example.com", password: "test-secret" });
    expect(config.window).toEqual({
      days: [5, 6],
      start: { hour: 7, minute: 5 },
      end: { hour: 23, minute: 59 },
      timeZone: "Europe/Berlin"
    });
    expect(config.pacing.longDelay).toEqual({ minSeconds: 1.5, maxSeconds: 2 });
    expect(config.browser.headless).toBe(true);
    expect(config.maxRecordsPerRun).toBe(50);
    expect(config.logFilePath).toBeNull();
  });

  it("lists every invalid variable", () => {
    const load = () =>
      loadScraperConfig({
        OPERATING_DAYS: "mon,funday",
        OPERATING_START: "25:00",
        MAX_RECORDS_PER_RUN: "0",
        SCRAPER_RECORD_PATH_PATTERN: "(unclosed"
      });

    expect(load).toThrow(ConfigurationError);
    expect(load).toThrow(
      [
        "Invalid configuration:",
        "  - SCRAPER_RECORD_PATH_PATTERN: Expected a valid regular expression",
        '  - OPERATING_DAYS: Unknown weekday "funday" (use mon..sun or 0..6 with Monday = 0)',
        '  - OPERATING_START: Expected a time of day as HH:mm, received "25:00"',
        "  - MAX_RECORDS_PER_RUN: Number must be greater than 0"
      ].join("\n")
    );
  });

  it("rejects a window that ends before it starts and inverted delays", () => {
    expect(() =>
      loadScraperConfig({
        OPERATING_START: "17:00",
        OPERATING_END: "09:00",
        MIN_DELAY_SECONDS: "10",
        MAX_DELAY_SECONDS: "5"
      })
    ).toThrow(
      [
        "Invalid configuration:",
        "  - OPERATING_END: Operating end must not be earlier than operating start",
        "  - MAX_DELAY_SECONDS: Must not be less than MIN_DELAY_SECONDS"
      ].join("\n")
    );
  });
});

describe("resolveCredentials", () => {
  it("returns both values when set", () => {
    const config = loadScraperConfig({ SCRAPER_EMAIL: "operator@example.com", SCRAPER_PASSWORD: "test-secret" });

    expect(resolveCredentials(config)).toEqual({
      username: "operator@example.com",
      password: "test-secret"
    });
  });

  it("explains how to provide missing credentials", () => {
    const config = loadScraperConfig({ SCRAPER_EMAIL: "operator@example.com" });

    expect(() => resolveCredentials(config)).toThrow(
      new ConfigurationError(
        "Scraper credentials not provided. Set SCRAPER_EMAIL and SCRAPER_PASSWORD (for example in .env)."
      )
    );
  });
});

describe("resolveLoginUrl", () => {
  it("defaults to /login on the listing origin", () => {
    expect(resolveLoginUrl(loadScraperConfig({}), "https://www.example.com/search/results?q=x")).toBe(
      "https://www.example.com/login"
    );
    expect(
      resolveLoginUrl(
        loadScraperConfig({ SCRAPER_LOGIN_URL: "https://auth.example.com/sign-in" }),
        "https://www.example.com/search"
      )
    ).toBe("https://auth.example.com/sign-in");
  });
});
