export class ScraperError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid settings, missing credentials or bad bounds. Raised before any session opens. */
export class ConfigurationError extends ScraperError {}

/** Browser launch or login failed. Ends the run. */
export class SessionError extends ScraperError {}

/** The listing location could not be loaded. The run ends with no candidates. */
export class DiscoveryFailure extends ScraperError {}

/** A single record could not be extracted. The run moves on to the next candidate. */
export class ExtractionFailure extends ScraperError {}

/** A record could not be written to the stores. Its identifier is not added to the ledger. */
export class PersistenceError extends ScraperError {}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
