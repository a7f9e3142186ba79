import { setTimeout as delay } from "node:timers/promises";
import type { DelayRange } from "../../packages/shared/src/contracts.js";
import { ConfigurationError } from "../../packages/shared/src/errors.js";

export interface PacingOptions {
  longDelay: DelayRange;
  shortDelay: DelayRange;
  random?: () => number;
}

const assertRange = (label: string, minSeconds: number, maxSeconds: number): void => {
  if (!Number.isFinite(minSeconds) || !Number.isFinite(maxSeconds)) {
    throw new ConfigurationError(`${label} bounds must be finite numbers.`);
  }

  if (minSeconds < 0) {
    throw new ConfigurationError(`${label} minimum must not be negative (got ${minSeconds}).`);
  }

  if (minSeconds > maxSeconds) {
    throw new ConfigurationError(
      `${label} minimum (${minSeconds}) must not exceed maximum (${maxSeconds}).`
    );
  }
};

/**
 * Draws randomized delays in seconds. Nothing here sleeps; callers decide
 * when to wait on the returned duration.
 */
export class PacingGenerator {
  private readonly longRange: DelayRange;

  private readonly shortRange: DelayRange;

  private readonly random: () => number;

  constructor(options: PacingOptions) {
    assertRange("Inter-record delay", options.longDelay.minSeconds, options.longDelay.maxSeconds);
    assertRange("Intra-page delay", options.shortDelay.minSeconds, options.shortDelay.maxSeconds);

    this.longRange = { ...options.longDelay };
    this.shortRange = { ...options.shortDelay };
    this.random = options.random ?? Math.random;
  }

  /** Whole seconds, uniform over the inclusive inter-record range. */
  longDelay(): number {
    const { minSeconds, maxSeconds } = this.longRange;
    const low = Math.ceil(minSeconds);
    const high = Math.floor(maxSeconds);
    if (high < low) {
      return minSeconds;
    }

    return Math.min(high, low + Math.floor(this.random() * (high - low + 1)));
  }

  shortDelay(minSeconds?: number, maxSeconds?: number): number {
    const low = minSeconds ?? this.shortRange.minSeconds;
    const high = maxSeconds ?? this.shortRange.maxSeconds;
    assertRange("Intra-page delay", low, high);

    return low + this.random() * (high - low);
  }
}

/** Resolves after `milliseconds`, or as soon as `signal` aborts. */
export type Sleep = (milliseconds: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = async (milliseconds, signal) => {
  try {
    await delay(milliseconds, undefined, { signal });
  } catch (delayError) {
    if (!signal?.aborted) {
      throw delayError;
    }
  }
};

export const secondsToMilliseconds = (seconds: number): number => Math.round(seconds * 1000);
