import { readFileSync } from "node:fs";
import type { ScrapedRecord } from "../packages/shared/src/contracts.js";
import type { PageSession } from "../pipeline/services/page-session.js";
import type { ScrapeLogger } from "../pipeline/utils/run-log.js";

export const readFixture = (name: string): string =>
  readFileSync(new URL(`./fixtures/${name}`, import.meta.url), "utf8");

export interface FakePage {
  /** HTML served for the page; each scroll to the bottom reveals the next stage. */
  stages: string[];
  clickable?: string[];
  /** Selectors that match but throw when clicked, like a hidden button. */
  unclickable?: string[];
  fillable?: string[];
  /** Where clicking any clickable element leads. */
  navigatesTo?: string;
  failNavigation?: boolean;
}

/**
 * In-process stand-in for a browser tab. Serves canned HTML per URL and
 * records every interaction.
 */
export class FakePageSession implements PageSession {
  readonly visited: string[] = [];

  readonly clicked: string[] = [];

  readonly filled: Array<{ selector: string; value: string }> = [];

  closeCount = 0;

  closeError: Error | null = null;

  private readonly pages: Map<string, FakePage>;

  private url = "about:blank";

  private stage = 0;

  constructor(pages: Record<string, FakePage>) {
    this.pages = new Map(Object.entries(pages));
  }

  async goto(url: string): Promise<void> {
    this.visited.push(url);
    const page = this.pages.get(url);
    if (!page || page.failNavigation) {
      throw new Error(`net::ERR_NAME_NOT_RESOLVED at ${url}`);
    }

    this.url = url;
    this.stage = 0;
  }

  currentUrl(): string {
    return this.url;
  }

  async content(): Promise<string> {
    const page = this.pages.get(this.url);
    if (!page) {
      return "<html><body></body></html>";
    }

    return page.stages[Math.min(this.stage, page.stages.length - 1)] ?? "";
  }

  async scrollToBottom(): Promise<number> {
    const page = this.pages.get(this.url);
    const lastStage = page ? page.stages.length - 1 : 0;
    this.stage = Math.min(this.stage + 1, lastStage);
    return (this.stage + 1) * 1000;
  }

  async scrollToTop(): Promise<void> {}

  async clickIfPresent(selector: string): Promise<boolean> {
    const page = this.pages.get(this.url);
    if (page?.unclickable?.includes(selector)) {
      throw new Error(`locator.click: Timeout 30000ms exceeded. ${selector} is not visible`);
    }

    if (!page?.clickable?.includes(selector)) {
      return false;
    }

    this.clicked.push(selector);
    if (page.navigatesTo) {
      this.url = page.navigatesTo;
      this.stage = 0;
    }

    return true;
  }

  async fillIfPresent(selector: string, value: string): Promise<boolean> {
    const page = this.pages.get(this.url);
    if (!page?.fillable?.includes(selector)) {
      return false;
    }

    this.filled.push({ selector, value });
    return true;
  }

  async close(): Promise<void> {
    this.closeCount += 1;
    if (this.closeError) {
      throw this.closeError;
    }
  }
}

export interface CapturedLogger extends ScrapeLogger {
  lines: string[];
}

/** Logger that keeps every line, prefixed with its level. */
export const createCapturingLogger = (): CapturedLogger => {
  const lines: string[] = [];
  return {
    lines,
    log: (message) => lines.push(`INFO ${message}`),
    warn: (message) => lines.push(`WARN ${message}`),
    error: (message) => lines.push(`ERROR ${message}`)
  };
};

export const noSleep = async (): Promise<void> => {};

export const listingPage = (hrefs: string[]): string =>
  `<html><body><ul>${hrefs
    .map((href) => `<li><a href="${href}">${href}</a></li>`)
    .join("")}</ul></body></html>`;

/** Minimal profile page whose name is `name`. */
export const simpleProfilePage = (name: string): string =>
  `<html><body><main><h1 class="text-heading-xlarge">${name}</h1></main></body></html>`;

export const buildRecord = (overrides: Partial<ScrapedRecord> = {}): ScrapedRecord => ({
  profile_url: "https://www.example.com/in/ada",
  scraped_at: "2024-03-04 10:00:00",
  name: "Ada Example",
  headline: "Engineer",
  location: "Springfield",
  about: "",
  experience: [],
  education: [],
  skills: [],
  certifications: [],
  languages: [],
  ...overrides
});
