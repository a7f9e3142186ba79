import type { ScraperCredentials } from "../../packages/shared/src/contracts.js";

/**
 * The single browser tab a run drives. Every call is awaited before the next
 * one is made; implementations need not be safe for concurrent use.
 */
export interface PageSession {
  /** Navigate and wait for the DOM. Rejects on timeout or a dead page. */
  goto(url: string): Promise<void>;
  currentUrl(): string;
  content(): Promise<string>;
  /** Scroll to the bottom of the page and return the resulting scroll height. */
  scrollToBottom(): Promise<number>;
  scrollToTop(): Promise<void>;
  /** Click the first element matching `selector`; false when there is none. */
  clickIfPresent(selector: string): Promise<boolean>;
  /** Type into the first element matching `selector`; false when there is none. */
  fillIfPresent(selector: string, value: string): Promise<boolean>;
  close(): Promise<void>;
}

export interface AuthenticatedSession {
  session: PageSession;
  /** False when the post-login URL did not look like a signed-in page. */
  confirmed: boolean;
  landingUrl: string;
}

export interface SessionAuthenticator {
  /** Throws ConfigurationError when credentials are missing. */
  resolveCredentials(): ScraperCredentials;
  /** Throws SessionError; any browser it opened is closed before it throws. */
  authenticate(credentials: ScraperCredentials): Promise<AuthenticatedSession>;
}
