import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../../packages/shared/src/errors.js";
import { PacingGenerator, secondsToMilliseconds, sleep } from "../../pipeline/services/pacing.js";

const DEFAULT_RANGES = {
  longDelay: { minSeconds: 60, maxSeconds: 600 },
  shortDelay: { minSeconds: 2, maxSeconds: 4 }
};

describe("PacingGenerator", () => {
  it("keeps every inter-record delay inside the configured range", () => {
    const pacing = new PacingGenerator(DEFAULT_RANGES);

    for (let sample = 0; sample < 1000; sample += 1) {
      const delay = pacing.longDelay();
      expect(Number.isInteger(delay)).toBe(true);
      expect(delay).toBeGreaterThanOrEqual(60);
      expect(delay).toBeLessThanOrEqual(600);
    }
  });

  it("reaches both ends of the inter-record range", () => {
    expect(new PacingGenerator({ ...DEFAULT_RANGES, random: () => 0 }).longDelay()).toBe(60);
    expect(new PacingGenerator({ ...DEFAULT_RANGES, random: () => 0.999999 }).longDelay()).toBe(600);
  });

  it("returns the single value of a degenerate range", () => {
    const pacing = new PacingGenerator({
      ...DEFAULT_RANGES,
      longDelay: { minSeconds: 5, maxSeconds: 5 }
    });

    expect(pacing.longDelay()).toBe(5);
  });

  it("draws short delays from the default or overridden range", () => {
    const pacing = new PacingGenerator({ ...DEFAULT_RANGES, random: () => 0.5 });

    expect(pacing.shortDelay()).toBe(3);
    expect(pacing.shortDelay(0.5, 1.5)).toBe(1);
  });

  it("rejects inverted or negative ranges", () => {
    expect(
      () => new PacingGenerator({ ...DEFAULT_RANGES, longDelay: { minSeconds: 600, maxSeconds: 60 } })
    ).toThrow(ConfigurationError);
    expect(
      () => new PacingGenerator({ ...DEFAULT_RANGES, shortDelay: { minSeconds: -1, maxSeconds: 4 } })
    ).toThrow(ConfigurationError);
    expect(() => new PacingGenerator(DEFAULT_RANGES).shortDelay(5, 1)).toThrow(
      "Intra-page delay minimum (5) must not exceed maximum (1)."
    );
  });

  it("converts seconds to whole milliseconds", () => {
    expect(secondsToMilliseconds(2.5004)).toBe(2500);
  });
});

describe("sleep", () => {
  it("resolves as soon as its signal aborts", async () => {
    const controller = new AbortController();
    const startedAt = Date.now();

    const pending = sleep(600_000, controller.signal);
    controller.abort();

    await expect(pending).resolves.toBeUndefined();
    expect(Date.now() - startedAt).toBeLessThan(5_000);
  });

  it("resolves at once for a signal that already aborted", async () => {
    await expect(sleep(600_000, AbortSignal.abort())).resolves.toBeUndefined();
  });
});
