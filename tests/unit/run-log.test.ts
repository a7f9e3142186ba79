import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { createRunLog } from "../../pipeline/utils/run-log.js";

describe("createRunLog", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints each line and appends it, timestamped and levelled, to the log file", () => {
    const tmpDir = mkdtempSync(join(tmpdir(), "profile-run-log-"));
    const logFilePath = join(tmpDir, "logs", "scraper.log");
    const printed = vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);

    try {
      const logger = createRunLog({
        logFilePath,
        now: () => new Date("2024-03-04T15:00:00.000Z")
      });
      logger.log("[orchestrator] Record 1/3");
      logger.warn("[window] closed");

      expect(printed).toHaveBeenCalledWith("2024-03-04T15:00:00.000Z INFO [orchestrator] Record 1/3");
      expect(readFileSync(logFilePath, "utf8")).toBe(
        "2024-03-04T15:00:00.000Z INFO [orchestrator] Record 1/3\n" +
          "2024-03-04T15:00:00.000Z WARN [window] closed\n"
      );
    } finally {
      rmSync(tmpDir, { recursive: true, force: true });
    }
  });

  it("only prints when no log file is configured", () => {
    const printed = vi.spyOn(console, "error").mockImplementation(() => undefined);

    const logger = createRunLog({ logFilePath: null, now: () => new Date(0) });
    logger.error("boom");

    expect(printed).toHaveBeenCalledTimes(1);
    expect(printed).toHaveBeenCalledWith("1970-01-01T00:00:00.000Z ERROR boom");
  });

  it("stops writing to a log file that cannot be appended to", () => {
    const tmpDir = mkdtempSync(join(tmpdir(), "profile-run-log-"));
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const errors = vi.spyOn(console, "error").mockImplementation(() => undefined);

    try {
      // The directory itself is not appendable.
      const logger = createRunLog({ logFilePath: tmpDir, now: () => new Date(0) });
      logger.log("first");
      logger.log("second");

      expect(errors).toHaveBeenCalledTimes(1);
      expect(errors.mock.calls[0]?.[0]).toMatch(new RegExp(`^\\[run-log\\] Disabled log file ${tmpDir}: `));
    } finally {
      rmSync(tmpDir, { recursive: true, force: true });
    }
  });
});
