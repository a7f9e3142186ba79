/**
 * Summarize the stores in DATA_DIR: stored records, distinct profiles and
 * ledger entries. A difference between the first two comes from reruns
 * after a crash between saving and marking a profile.
 */
import "dotenv/config";
import { errorMessage } from "../../packages/shared/src/errors.js";
import { resolveStorePaths } from "../../packages/shared/src/pipeline-types.js";
import { DedupLedger } from "../services/dedup-ledger.js";
import { readPersistedRecords } from "../services/persistence-sink.js";
import { loadScraperConfig } from "./scraper-config.js";

const main = async () => {
  const config = loadScraperConfig();
  const paths = resolveStorePaths(config.dataDirectory);

  const records = await readPersistedRecords(paths.records);
  const uniqueRecords = await readPersistedRecords(paths.records, { dedupe: true });
  const ledgerEntries = await new DedupLedger({ filePath: paths.ledger }).load();

  console.log(`=== Data summary (${config.dataDirectory}) ===\n`);
  console.log(`Stored records:    ${records.length}`);
  console.log(`Distinct profiles: ${uniqueRecords.length}`);
  console.log(`Ledger entries:    ${ledgerEntries.size}`);

  const latest = records.reduce<string | null>(
    (current, record) => (current === null || record.scraped_at > current ? record.scraped_at : current),
    null
  );
  if (latest) {
    console.log(`Last scraped at:   ${latest}`);
  }
};

main().catch((error: unknown) => {
  console.error(`Fatal error in data-summary: ${errorMessage(error)}`);
  process.exit(1);
});
