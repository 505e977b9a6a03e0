/**
 * Collect investment-warning disclosures for one date range and save them as
 * CSV under OUTPUT_DIR.
 *
 *   npm run scrape -- --start 2024-01-01 --end 2024-06-30 --market main-board
 */
import { DisclosureScraper } from "../services/disclosure-scraper.js";
import { todayIsoDate } from "../utils/date-range.js";
import { buildDefaultOutputFilename } from "../utils/default-output-paths.js";
import { writeDisclosureCsv } from "../utils/csv-output.js";
import { createConsoleScrapeLog } from "../utils/scrape-log.js";
import { parseScrapeWarningsArgs } from "./cli-options.js";
import {
  KIND_BASE_URL,
  MAX_PAGES_PER_PERIOD,
  OUTPUT_DIRECTORY,
  PACING,
  SCRAPE_DEBUG_ARTIFACT_DIRECTORY,
  createBrowserSessionFactory
} from "./pipeline-config.js";

const main = async () => {
  const startTime = Date.now();
  const options = parseScrapeWarningsArgs(process.argv.slice(2), todayIsoDate());
  const log = createConsoleScrapeLog(options.verbose);

  console.log("=== Scrape investment-warning disclosures ===\n");

  const scraper = new DisclosureScraper({
    browserSessionFactory: createBrowserSessionFactory(log.info),
    log,
    baseUrl: KIND_BASE_URL,
    pacing: PACING,
    maxPagesPerPeriod: options.maxPages ?? MAX_PAGES_PER_PERIOD,
    splitLongPeriods: options.split,
    debugArtifactDirectory: SCRAPE_DEBUG_ARTIFACT_DIRECTORY
  });

  const result = await scraper.scrape({
    range: { start: options.start, end: options.end },
    market: options.market,
    disclosureTypes: options.types,
    pageSize: options.pageSize
  });

  for (const period of result.periods) {
    console.log(
      `[scrape-warnings] ${period.range.start} ~ ${period.range.end}: ` +
        `${period.recordCount} record(s), ${period.pagesVisited} page(s), ${period.stopReason}`
    );
  }

  if (result.rows.length) {
    const filePath = writeDisclosureCsv(
      options.output ?? buildDefaultOutputFilename(options.start, options.end),
      result.rows,
      OUTPUT_DIRECTORY
    );
    console.log(`[scrape-warnings] Saved ${result.rows.length} record(s) to ${filePath}`);
  } else {
    console.log("[scrape-warnings] Nothing to save");
  }

  if (result.warnings.length) {
    console.log(`[scrape-warnings] ${result.warnings.length} warning(s) during the run`);
  }

  const elapsedSeconds = ((Date.now() - startTime) / 1000).toFixed(1);
  console.log(`\n✓ Scrape complete (${elapsedSeconds}s)`);
};

main().catch((error) => {
  console.error("Fatal error in scrape-warnings:");
  console.error(error);
  process.exit(1);
});
