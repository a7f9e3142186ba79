import { chromium, type BrowserContext, type Page } from "playwright";
import type { ScraperCredentials } from "../../packages/shared/src/contracts.js";
import { SessionError, errorMessage } from "../../packages/shared/src/errors.js";
import { installResourceBlockingRoutes } from "../utils/resource-blocking.js";
import { consoleLogger, type ScrapeLogger } from "../utils/run-log.js";
import type {
  AuthenticatedSession,
  PageSession,
  SessionAuthenticator
} from "./page-session.js";
import { sleep as defaultSleep, secondsToMilliseconds, type PacingGenerator, type Sleep } from "./pacing.js";

// ---------------------------------------------------------------------------
// Playwright page session
// ---------------------------------------------------------------------------

const SCROLL_TO_BOTTOM_SCRIPT =
  "window.scrollTo(0, document.body.scrollHeight); document.body.scrollHeight";

export class PlaywrightPageSession implements PageSession {
  private readonly page: Page;

  private readonly timeoutMs: number;

  private readonly cleanup: () => Promise<void>;

  private closed = false;

  constructor(page: Page, options: { timeoutMs: number; cleanup: () => Promise<void> }) {
    this.page = page;
    this.timeoutMs = options.timeoutMs;
    this.cleanup = options.cleanup;
  }

  async goto(url: string): Promise<void> {
    await this.page.goto(url, {
      waitUntil: "domcontentloaded",
      timeout: this.timeoutMs
    });
  }

  currentUrl(): string {
    return this.page.url();
  }

  content(): Promise<string> {
    return this.page.content();
  }

  async scrollToBottom(): Promise<number> {
    const height: unknown = await this.page.evaluate(SCROLL_TO_BOTTOM_SCRIPT);
    return typeof height === "number" ? height : 0;
  }

  async scrollToTop(): Promise<void> {
    await this.page.evaluate("window.scrollTo(0, 0)");
  }

  async clickIfPresent(selector: string): Promise<boolean> {
    const target = this.page.locator(selector);
    if ((await target.count()) === 0) {
      return false;
    }

    await target.first().click({ timeout: this.timeoutMs });
    return true;
  }

  async fillIfPresent(selector: string, value: string): Promise<boolean> {
    const target = this.page.locator(selector);
    if ((await target.count()) === 0) {
      return false;
    }

    await target.first().fill(value, { timeout: this.timeoutMs });
    return true;
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;
    await this.cleanup();
  }
}

// ---------------------------------------------------------------------------
// Login handshake
// ---------------------------------------------------------------------------

export interface LoginSelectors {
  username: string;
  password: string;
  submit: string;
}

export const DEFAULT_LOGIN_SELECTORS: LoginSelectors = {
  username: "#username",
  password: "#password",
  submit: "button[type='submit']"
};

export interface LoginOptions {
  loginUrl: string;
  selectors: LoginSelectors;
  successPattern: RegExp;
  pacing: PacingGenerator;
  sleep?: Sleep;
  logger?: ScrapeLogger;
}

/**
 * Fill and submit the login form on `session`. The outcome is judged by the
 * URL the site lands on; an unexpected URL is reported as unconfirmed rather
 * than failed because sites often interpose checkpoints.
 */
export const loginWithCredentials = async (
  session: PageSession,
  credentials: ScraperCredentials,
  options: LoginOptions
): Promise<AuthenticatedSession> => {
  const { loginUrl, selectors, successPattern, pacing } = options;
  const sleep = options.sleep ?? defaultSleep;
  const logger = options.logger ?? consoleLogger;
  const pause = (minSeconds: number, maxSeconds: number) =>
    sleep(secondsToMilliseconds(pacing.shortDelay(minSeconds, maxSeconds)));

  const requireField = async (found: Promise<boolean>, selector: string): Promise<void> => {
    if (!(await found)) {
      throw new SessionError(`Login form element not found: ${selector} on ${session.currentUrl()}`);
    }
  };

  try {
    logger.log(`[login] Opening ${loginUrl}`);
    await session.goto(loginUrl);
    await pause(2, 4);

    await requireField(session.fillIfPresent(selectors.username, credentials.username), selectors.username);
    await pause(0.5, 1.5);
    await requireField(session.fillIfPresent(selectors.password, credentials.password), selectors.password);
    await pause(0.5, 1.5);
    await requireField(session.clickIfPresent(selectors.submit), selectors.submit);
    await pause(3, 5);
  } catch (loginError) {
    if (loginError instanceof SessionError) {
      throw loginError;
    }

    throw new SessionError(`Login failed: ${errorMessage(loginError)}`, { cause: loginError });
  }

  const landingUrl = session.currentUrl();
  const confirmed = successPattern.test(landingUrl);
  if (confirmed) {
    logger.log(`[login] Signed in (landed on ${landingUrl})`);
  }

  return { session, confirmed, landingUrl };
};

// ---------------------------------------------------------------------------
// Browser launch
// ---------------------------------------------------------------------------

interface BrowserContextFactoryResult {
  context: BrowserContext;
  cleanup: () => Promise<void>;
}

export type BrowserContextFactory = () => Promise<BrowserContextFactoryResult>;

export const createChromiumContextFactory = (options: {
  headless: boolean;
  timeZone: string;
}): BrowserContextFactory => async () => {
  const browser = await chromium.launch({ headless: options.headless });
  try {
    const context = await browser.newContext({
      locale: "en-US",
      viewport: { width: 1920, height: 1080 },
      timezoneId: options.timeZone
    });

    return {
      context,
      cleanup: async () => {
        await context.close();
        await browser.close();
      }
    };
  } catch (contextError) {
    await browser.close();
    throw contextError;
  }
};

export interface PlaywrightSessionAuthenticatorOptions extends Omit<LoginOptions, "logger"> {
  resolveCredentials: () => ScraperCredentials;
  browserContextFactory: BrowserContextFactory;
  requestTimeoutMs: number;
  logger?: ScrapeLogger;
}

export class PlaywrightSessionAuthenticator implements SessionAuthenticator {
  private readonly options: PlaywrightSessionAuthenticatorOptions;

  private readonly logger: ScrapeLogger;

  constructor(options: PlaywrightSessionAuthenticatorOptions) {
    this.options = options;
    this.logger = options.logger ?? consoleLogger;
  }

  resolveCredentials(): ScraperCredentials {
    return this.options.resolveCredentials();
  }

  async authenticate(credentials: ScraperCredentials): Promise<AuthenticatedSession> {
    let launched: BrowserContextFactoryResult;
    try {
      this.logger.log("[login] Launching browser");
      launched = await this.options.browserContextFactory();
    } catch (launchError) {
      throw new SessionError(`Could not launch browser: ${errorMessage(launchError)}`, {
        cause: launchError
      });
    }

    let session: PlaywrightPageSession | null = null;
    try {
      await installResourceBlockingRoutes(launched.context, this.logger.log);
      const page = await launched.context.newPage();
      session = new PlaywrightPageSession(page, {
        timeoutMs: this.options.requestTimeoutMs,
        cleanup: launched.cleanup
      });

      return await loginWithCredentials(session, credentials, {
        ...this.options,
        logger: this.logger
      });
    } catch (authenticationError) {
      try {
        await (session ? session.close() : launched.cleanup());
      } catch (cleanupError) {
        this.logger.warn(`[login] Failed to close browser after login error: ${errorMessage(cleanupError)}`);
      }

      if (authenticationError instanceof SessionError) {
        throw authenticationError;
      }

      throw new SessionError(`Could not open a browser session: ${errorMessage(authenticationError)}`, {
        cause: authenticationError
      });
    }
  }
}
