/**
 * Collect whole calendar years, one browser session per year.
 *
 *   npm run scrape:years -- --start-year 2022 --end-year 2024
 */
import { DisclosureScraper } from "../services/disclosure-scraper.js";
import { collectMultiYear } from "../services/multi-year-collector.js";
import { writeDisclosureCsv } from "../utils/csv-output.js";
import { createConsoleScrapeLog } from "../utils/scrape-log.js";
import { parseMultiYearArgs } from "./cli-options.js";
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
  const options = parseMultiYearArgs(process.argv.slice(2));
  const log = createConsoleScrapeLog(options.verbose);

  console.log(`=== Multi-year collection ${options.startYear}–${options.endYear} ===\n`);

  const result = await collectMultiYear(
    {
      startYear: options.startYear,
      endYear: options.endYear,
      market: options.market,
      disclosureTypes: options.types
    },
    {
      createScraper: () =>
        new DisclosureScraper({
          browserSessionFactory: createBrowserSessionFactory(log.info),
          log,
          baseUrl: KIND_BASE_URL,
          pacing: PACING,
          maxPagesPerPeriod: MAX_PAGES_PER_PERIOD,
          splitLongPeriods: true,
          debugArtifactDirectory: SCRAPE_DEBUG_ARTIFACT_DIRECTORY
        }),
      writeCsv: (filename, rows) => writeDisclosureCsv(filename, rows, OUTPUT_DIRECTORY),
      log,
      pacing: PACING
    }
  );

  for (const year of result.years) {
    const status = year.error ? `failed (${year.error})` : `${year.recordCount} record(s)`;
    console.log(`[scrape-multi-year] ${year.year}: ${status}`);
  }

  const elapsedSeconds = ((Date.now() - startTime) / 1000).toFixed(1);
  console.log(`\n✓ Multi-year collection complete (${elapsedSeconds}s)`);
};

main().catch((error) => {
  console.error("Fatal error in scrape-multi-year:");
  console.error(error);
  process.exit(1);
});
