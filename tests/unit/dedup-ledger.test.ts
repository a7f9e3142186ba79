import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { PersistenceError } from "../../packages/shared/src/errors.js";
import { DedupLedger } from "../../pipeline/services/dedup-ledger.js";
import { createCapturingLogger } from "../test-utils.js";

const GRACE = "https://www.example.com/in/grace-hopper";
const ALAN = "https://www.example.com/in/alan-turing";

describe("DedupLedger", () => {
  it("starts empty and silent when the file does not exist", async () => {
    const tmpDir = mkdtempSync(join(tmpdir(), "profile-ledger-"));
    const logger = createCapturingLogger();

    try {
      const ledger = new DedupLedger({ filePath: join(tmpDir, "scraped-urls.txt"), logger });

      await expect(ledger.load()).resolves.toEqual(new Set());
      expect(logger.lines).toEqual([]);
    } finally {
      rmSync(tmpDir, { recursive: true, force: true });
    }
  });

  it("writes an identifier once however often it is appended", async () => {
    const tmpDir = mkdtempSync(join(tmpdir(), "profile-ledger-"));
    const ledgerPath = join(tmpDir, "nested", "scraped-urls.txt");

    try {
      const ledger = new DedupLedger({ filePath: ledgerPath, logger: createCapturingLogger() });
      await ledger.load();
      ledger.append(GRACE);
      ledger.append(GRACE);

      expect(readFileSync(ledgerPath, "utf8")).toBe(`${GRACE}\n`);

      const reloaded = new DedupLedger({ filePath: ledgerPath, logger: createCapturingLogger() });
      await expect(reloaded.load()).resolves.toEqual(new Set([GRACE]));
      expect(reloaded.contains(GRACE)).toBe(true);
      expect(reloaded.size).toBe(1);
    } finally {
      rmSync(tmpDir, { recursive: true, force: true });
    }
  });

  it("stores the canonical form so a reload finds the same profile", async () => {
    const tmpDir = mkdtempSync(join(tmpdir(), "profile-ledger-"));
    const ledgerPath = join(tmpDir, "scraped-urls.txt");

    try {
      const ledger = new DedupLedger({ filePath: ledgerPath, logger: createCapturingLogger() });
      await ledger.load();
      ledger.append(`${GRACE}/?trk=search`);
      ledger.append(GRACE);

      expect(readFileSync(ledgerPath, "utf8")).toBe(`${GRACE}\n`);
      expect(ledger.contains(`${GRACE}/`)).toBe(true);

      const reloaded = new DedupLedger({ filePath: ledgerPath, logger: createCapturingLogger() });
      await reloaded.load();
      expect(reloaded.contains(`${GRACE}/?trk=search`)).toBe(true);
      expect(reloaded.contains(GRACE)).toBe(true);
    } finally {
      rmSync(tmpDir, { recursive: true, force: true });
    }
  });

  it("refuses identifiers that are not record URLs", async () => {
    const tmpDir = mkdtempSync(join(tmpdir(), "profile-ledger-"));
    const ledgerPath = join(tmpDir, "scraped-urls.txt");

    try {
      const ledger = new DedupLedger({ filePath: ledgerPath, logger: createCapturingLogger() });
      await ledger.load();

      expect(() => ledger.append("not a url")).toThrow(
        new PersistenceError("Not a record URL, refusing to add it to the ledger: not a url")
      );
      expect(ledger.contains("not a url")).toBe(false);
      expect(ledger.size).toBe(0);
    } finally {
      rmSync(tmpDir, { recursive: true, force: true });
    }
  });

  it("collapses duplicate lines and skips unreadable ones with a single warning", async () => {
    const tmpDir = mkdtempSync(join(tmpdir(), "profile-ledger-"));
    const ledgerPath = join(tmpDir, "scraped-urls.txt");
    const logger = createCapturingLogger();

    try {
      writeFileSync(
        ledgerPath,
        [`${GRACE}\r`, "", `  ${ALAN}/  `, GRACE, "garbage line", "ftp://files.example.com/x", ""].join("\n"),
        "utf8"
      );

      const ledger = new DedupLedger({ filePath: ledgerPath, logger });

      await expect(ledger.load()).resolves.toEqual(new Set([GRACE, ALAN]));
      expect(logger.lines).toEqual([
        `WARN [ledger] Ignored 2 unreadable line(s) in ${ledgerPath}.`,
        "INFO [ledger] Loaded 2 processed identifier(s)."
      ]);
    } finally {
      rmSync(tmpDir, { recursive: true, force: true });
    }
  });

  it("warns and starts empty when the ledger cannot be read", async () => {
    const tmpDir = mkdtempSync(join(tmpdir(), "profile-ledger-"));
    const ledgerPath = join(tmpDir, "scraped-urls.txt");
    const logger = createCapturingLogger();

    try {
      mkdirSync(ledgerPath);
      const ledger = new DedupLedger({ filePath: ledgerPath, logger });

      await expect(ledger.load()).resolves.toEqual(new Set());
      expect(logger.lines).toHaveLength(1);
      expect(logger.lines[0]).toMatch(
        new RegExp(`^WARN \\[ledger\\] Could not read ${ledgerPath}, starting with an empty ledger: `)
      );
    } finally {
      rmSync(tmpDir, { recursive: true, force: true });
    }
  });

  it("returns a snapshot that later appends do not change", async () => {
    const tmpDir = mkdtempSync(join(tmpdir(), "profile-ledger-"));

    try {
      const ledger = new DedupLedger({
        filePath: join(tmpDir, "scraped-urls.txt"),
        logger: createCapturingLogger()
      });
      const snapshot = await ledger.load();
      ledger.append(ALAN);

      expect(snapshot.has(ALAN)).toBe(false);
      expect(ledger.contains(ALAN)).toBe(true);
    } finally {
      rmSync(tmpDir, { recursive: true, force: true });
    }
  });
});
