import type {
  DateRange,
  DisclosureRecord,
  DisclosureSummary,
  DisclosureTypeFilter,
  MarketFilter,
  NormalizedDisclosureRow,
  PeriodReport,
  PeriodStopReason,
  SearchConfiguration
} from "../../packages/shared/src/contracts.js";
import { DEFAULT_PORTAL_BASE_URL } from "../../packages/shared/src/disclosure-helpers.js";
import {
  DEFAULT_MAX_MONTHS_PER_RANGE,
  assertDateRange,
  needsSplitting,
  splitDateRange
} from "../utils/date-range.js";
import { DEFAULT_OUTPUT_DIRECTORY } from "../utils/default-output-paths.js";
import { DEFAULT_PACING, createPacer, type PacingPolicy, type Sleep } from "../utils/pacing.js";
import { createConsoleScrapeLog, errorMessage, type ScrapeLog } from "../utils/scrape-log.js";
import type { BrowserSessionFactory, BrowserSessionFactoryResult } from "./browser-session.js";
import { Paginator } from "./paginator.js";
import { createPlaywrightSessionFactory } from "./playwright-browser-session.js";
import { normalizeDisclosureRecords, type SortOrder } from "./record-normalizer.js";
import {
  DEFAULT_ROW_CLASSIFICATION_RULES,
  parseResultTable,
  type RowClassificationRules
} from "./result-table-parser.js";
import {
  DEFAULT_WAIT_TIMEOUTS,
  captureDiagnostic,
  warn,
  type ScrapeContext,
  type WaitTimeouts
} from "./scrape-context.js";
import { DEFAULT_DISCLOSURE_TYPES, DEFAULT_PAGE_SIZE, applySearchConfiguration } from "./search-form.js";
import { logDisclosureSummary, summarizeDisclosures } from "./summary-stats.js";

export const MAX_CONSECUTIVE_EMPTY_PAGES = 3;

/** Hard stop per sub-range, independent of any configured page cap. */
export const SAFETY_PAGE_CEILING = 100;

export interface ScrapeRequest {
  range: DateRange;
  market?: MarketFilter;
  disclosureTypes?: DisclosureTypeFilter[];
  pageSize?: number;
}

export interface DisclosureScrapeResult {
  records: DisclosureRecord[];
  rows: NormalizedDisclosureRow[];
  collectedCount: number;
  duplicatesRemoved: number;
  periods: PeriodReport[];
  warnings: string[];
  summary: DisclosureSummary;
}

export interface PeriodScrapeResult {
  records: DisclosureRecord[];
  report: PeriodReport;
}

interface DisclosureScraperOptions {
  baseUrl: string;
  pacing: PacingPolicy;
  timeouts: WaitTimeouts;
  /** Pages per sub-range; null means only the safety ceiling applies. */
  maxPagesPerPeriod: number | null;
  splitLongPeriods: boolean;
  maxMonthsPerRange: number;
  sortOrder: SortOrder;
  rowClassificationRules: RowClassificationRules;
  headless: boolean;
  downloadDirectory: string;
  debugArtifactDirectory: string | null;
}

interface DisclosureScraperConstructorOptions extends Partial<DisclosureScraperOptions> {
  browserSessionFactory?: BrowserSessionFactory;
  verbose?: boolean;
  log?: ScrapeLog;
  sleep?: Sleep;
}

const DEFAULT_OPTIONS: DisclosureScraperOptions = {
  baseUrl: DEFAULT_PORTAL_BASE_URL,
  pacing: DEFAULT_PACING,
  timeouts: DEFAULT_WAIT_TIMEOUTS,
  maxPagesPerPeriod: null,
  splitLongPeriods: true,
  maxMonthsPerRange: DEFAULT_MAX_MONTHS_PER_RANGE,
  sortOrder: "descending",
  rowClassificationRules: DEFAULT_ROW_CLASSIFICATION_RULES,
  headless: true,
  downloadDirectory: DEFAULT_OUTPUT_DIRECTORY,
  debugArtifactDirectory: null
};

export class DisclosureScraper {
  private readonly options: DisclosureScraperOptions;
  private readonly browserSessionFactory: BrowserSessionFactory;
  private readonly log: ScrapeLog;
  private readonly sleep: Sleep | undefined;

  constructor(options?: DisclosureScraperConstructorOptions) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.log = options?.log ?? createConsoleScrapeLog(options?.verbose ?? false);
    this.sleep = options?.sleep;
    this.browserSessionFactory = options?.browserSessionFactory ??
      createPlaywrightSessionFactory({
        headless: this.options.headless,
        downloadDirectory: this.options.downloadDirectory,
        blockResources: true,
        log: this.log.info
      });
  }

  /** Sub-ranges a request is searched in, in order. */
  planRanges(range: DateRange): DateRange[] {
    assertDateRange(range);
    if (!this.options.splitLongPeriods || !needsSplitting(range)) {
      return [range];
    }
    return splitDateRange(range.start, range.end, this.options.maxMonthsPerRange);
  }

  /**
   * Search one sub-range and page through its results. Failures end the
   * period early; whatever was collected before them is returned.
   */
  async scrapePeriod(
    context: ScrapeContext,
    configuration: SearchConfiguration
  ): Promise<PeriodScrapeResult> {
    const { range } = configuration;
    const records: DisclosureRecord[] = [];
    let pagesVisited = 0;

    const finish = (stopReason: PeriodStopReason): PeriodScrapeResult => {
      this.log.info(
        `[scrape] ${range.start} ~ ${range.end}: ${records.length} record(s) from ${pagesVisited} page(s) (${stopReason})`
      );
      return { records, report: { range, pagesVisited, recordCount: records.length, stopReason } };
    };

    try {
      this.log.info(`[scrape] Period ${range.start} ~ ${range.end}`);
      const applied = await applySearchConfiguration(context, configuration);
      if (!applied.ok) {
        return finish("STEP_FAILED");
      }

      const paginator = new Paginator(context);
      const maxPages = this.options.maxPagesPerPeriod;
      let consecutiveEmptyPages = 0;

      for (let pageNumber = 1; ; pageNumber += 1) {
        const outcome = parseResultTable(await context.session.content(), {
          baseUrl: context.baseUrl,
          rules: this.options.rowClassificationRules
        });
        pagesVisited += 1;

        if (outcome.kind === "rows") {
          consecutiveEmptyPages = 0;
          records.push(...outcome.records);
          this.log.info(`[scrape] Page ${pageNumber}: ${outcome.records.length} record(s)`);
        } else {
          consecutiveEmptyPages += 1;
          if (outcome.kind === "unrecognized") {
            warn(context, `[scrape] Page ${pageNumber}: result table not recognized (${outcome.reason})`);
            await captureDiagnostic(context, "no_table_rows");
          } else {
            this.log.info(`[scrape] Page ${pageNumber}: no results`);
          }

          if (consecutiveEmptyPages >= MAX_CONSECUTIVE_EMPTY_PAGES) {
            return finish("EMPTY_PAGES");
          }
        }

        if (maxPages !== null && pageNumber >= maxPages) {
          return finish("PAGE_CAP");
        }
        if (pageNumber >= SAFETY_PAGE_CEILING) {
          warn(context, `[scrape] Stopped at the ${SAFETY_PAGE_CEILING}-page safety ceiling`);
          return finish("SAFETY_CEILING");
        }
        if (!(await paginator.advance())) {
          return finish("NO_NEXT_PAGE");
        }

        await context.pace("betweenPagesMs");
      }
    } catch (periodError) {
      warn(context, `[scrape] Period ${range.start} ~ ${range.end} failed: ${errorMessage(periodError)}`);
      await captureDiagnostic(context, "period_scraping_error");
      return finish("ERROR");
    }
  }

  /**
   * Collect, deduplicate and sort every disclosure in the requested range.
   * Scrape failures end up in `warnings`; the call itself only throws for an
   * invalid range.
   */
  async scrape(request: ScrapeRequest): Promise<DisclosureScrapeResult> {
    const ranges = this.planRanges(request.range);
    const warnings: string[] = [];
    const periods: PeriodReport[] = [];
    const collected: DisclosureRecord[] = [];

    const disclosureTypes = request.disclosureTypes?.length
      ? request.disclosureTypes
      : DEFAULT_DISCLOSURE_TYPES;
    this.log.info(`[scrape] Range ${request.range.start} ~ ${request.range.end}`);
    this.log.info(`[scrape] Disclosure types: ${disclosureTypes.join(", ")}; market: ${request.market ?? "all"}`);
    if (ranges.length > 1) {
      this.log.info(`[scrape] Split into ${ranges.length} sub-ranges`);
    }

    let factoryResult: BrowserSessionFactoryResult;
    try {
      factoryResult = await this.browserSessionFactory();
    } catch (launchError) {
      const message = `[scrape] Browser session could not be started: ${errorMessage(launchError)}`;
      this.log.warn(message);
      warnings.push(message);
      return this.buildResult(collected, periods, warnings);
    }

    const context: ScrapeContext = {
      session: factoryResult.session,
      baseUrl: this.options.baseUrl,
      log: this.log,
      pace: createPacer(this.options.pacing, this.sleep),
      timeouts: this.options.timeouts,
      warnings,
      debugArtifactDirectory: this.options.debugArtifactDirectory
    };

    try {
      for (const [index, range] of ranges.entries()) {
        if (ranges.length > 1) {
          this.log.info(`[scrape] Sub-range ${index + 1}/${ranges.length}: ${range.start} ~ ${range.end}`);
        }

        const { records, report } = await this.scrapePeriod(context, {
          range,
          market: request.market ?? "all",
          disclosureTypes,
          pageSize: request.pageSize ?? DEFAULT_PAGE_SIZE
        });
        collected.push(...records);
        periods.push(report);

        if (index < ranges.length - 1) {
          await context.pace("betweenRangesMs");
        }
      }
    } finally {
      try {
        await factoryResult.cleanup();
      } catch (cleanupError) {
        warn(context, `[scrape] Browser cleanup failed: ${errorMessage(cleanupError)}`);
      }
    }

    return this.buildResult(collected, periods, warnings);
  }

  private buildResult(
    collected: DisclosureRecord[],
    periods: PeriodReport[],
    warnings: string[]
  ): DisclosureScrapeResult {
    const normalized = normalizeDisclosureRecords(collected, this.options.sortOrder);
    if (normalized.duplicatesRemoved) {
      this.log.info(`[scrape] Removed ${normalized.duplicatesRemoved} duplicate(s)`);
    }
    if (!normalized.rows.length) {
      this.log.warn("[scrape] No records collected");
    }

    const summary = summarizeDisclosures(normalized.rows);
    logDisclosureSummary(summary, this.log);

    return {
      records: normalized.records,
      rows: normalized.rows,
      collectedCount: collected.length,
      duplicatesRemoved: normalized.duplicatesRemoved,
      periods,
      warnings,
      summary
    };
  }
}
