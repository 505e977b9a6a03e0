import type {
  DisclosureRecord,
  DisclosureSummary,
  DisclosureTypeFilter,
  MarketFilter,
  NormalizedDisclosureRow
} from "../../packages/shared/src/contracts.js";
import { calendarYearRange } from "../utils/date-range.js";
import { buildCombinedOutputFilename, buildYearOutputFilename } from "../utils/default-output-paths.js";
import { createPacer, DEFAULT_PACING, type PacingPolicy, type Sleep } from "../utils/pacing.js";
import { errorMessage, type ScrapeLog } from "../utils/scrape-log.js";
import type { DisclosureScrapeResult, ScrapeRequest } from "./disclosure-scraper.js";
import { normalizeDisclosureRecords } from "./record-normalizer.js";
import { logDisclosureSummary, summarizeDisclosures } from "./summary-stats.js";

/** The part of a scraper the collector drives; one instance per year. */
export interface YearScraper {
  scrape: (request: ScrapeRequest) => Promise<DisclosureScrapeResult>;
}

export type DisclosureCsvWriter = (filename: string, rows: readonly NormalizedDisclosureRow[]) => string;

export interface MultiYearRequest {
  startYear: number;
  endYear: number;
  market?: MarketFilter;
  disclosureTypes?: DisclosureTypeFilter[];
}

export interface MultiYearDependencies {
  createScraper: (year: number) => YearScraper;
  writeCsv: DisclosureCsvWriter;
  log: ScrapeLog;
  pacing?: PacingPolicy;
  sleep?: Sleep;
}

export interface YearOutcome {
  year: number;
  recordCount: number;
  filePath: string | null;
  error: string | null;
}

export interface MultiYearResult {
  years: YearOutcome[];
  rows: NormalizedDisclosureRow[];
  combinedFilePath: string | null;
  summary: DisclosureSummary;
  warnings: string[];
}

/**
 * Collect calendar years one at a time, each with its own scraper and browser
 * session. Every year gets its own file; all years are merged, deduplicated
 * and written oldest first to one combined file.
 */
export const collectMultiYear = async (
  request: MultiYearRequest,
  dependencies: MultiYearDependencies
): Promise<MultiYearResult> => {
  if (!Number.isInteger(request.startYear) || !Number.isInteger(request.endYear)) {
    throw new Error("startYear and endYear must be integers.");
  }
  if (request.startYear > request.endYear) {
    throw new Error(`startYear ${request.startYear} is after endYear ${request.endYear}.`);
  }

  const { log } = dependencies;
  const pace = createPacer(dependencies.pacing ?? DEFAULT_PACING, dependencies.sleep);
  const years: YearOutcome[] = [];
  const warnings: string[] = [];
  const collected: DisclosureRecord[] = [];

  for (let year = request.startYear; year <= request.endYear; year += 1) {
    log.info(`[multi-year] Collecting ${year}`);
    try {
      const scraper = dependencies.createScraper(year);
      const result = await scraper.scrape({
        range: calendarYearRange(year),
        market: request.market,
        disclosureTypes: request.disclosureTypes
      });
      warnings.push(...result.warnings);

      if (result.rows.length) {
        const filePath = dependencies.writeCsv(buildYearOutputFilename(year), result.rows);
        collected.push(...result.records);
        log.info(`[multi-year] ${year}: ${result.rows.length} record(s) saved to ${filePath}`);
        years.push({ year, recordCount: result.rows.length, filePath, error: null });
      } else {
        log.warn(`[multi-year] ${year}: no records`);
        years.push({ year, recordCount: 0, filePath: null, error: null });
      }
    } catch (yearError) {
      const message = `[multi-year] ${year} failed: ${errorMessage(yearError)}`;
      log.warn(message);
      warnings.push(message);
      years.push({ year, recordCount: 0, filePath: null, error: errorMessage(yearError) });
    }

    if (year < request.endYear) {
      await pace("betweenYearsMs");
    }
  }

  const { rows } = normalizeDisclosureRecords(collected, "ascending");
  const summary = summarizeDisclosures(rows);

  let combinedFilePath: string | null = null;
  if (rows.length) {
    combinedFilePath = dependencies.writeCsv(
      buildCombinedOutputFilename(request.startYear, request.endYear),
      rows
    );
    log.info(`[multi-year] Combined ${rows.length} record(s) into ${combinedFilePath}`);
    logDisclosureSummary(summary, log);
  } else {
    log.warn("[multi-year] No records in any year");
  }

  return { years, rows, combinedFilePath, summary, warnings };
};
