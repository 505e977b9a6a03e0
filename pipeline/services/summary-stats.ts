import type {
  DesignationType,
  DisclosureSummary,
  NormalizedDisclosureRow
} from "../../packages/shared/src/contracts.js";
import type { ScrapeLog } from "../utils/scrape-log.js";

const TOP_COMPANY_LIMIT = 10;

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const countBy = <K extends string>(values: readonly K[]): Map<K, number> => {
  const counts = new Map<K, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return counts;
};

const ratio = (matching: number, total: number): number => (total ? matching / total : 0);

export const summarizeDisclosures = (rows: readonly NormalizedDisclosureRow[]): DisclosureSummary => {
  const dates = rows
    .map((row) => row.date)
    .filter((date) => ISO_DATE_PATTERN.test(date))
    .sort();

  const designationTypes: Partial<Record<DesignationType, number>> = {};
  for (const [type, count] of countBy(rows.map((row) => row.designation_type))) {
    designationTypes[type] = count;
  }

  // Ties keep first-seen order.
  const topCompanies = [...countBy(rows.map((row) => row.company_name))]
    .map(([companyName, count]) => ({ companyName, count }))
    .sort((left, right) => right.count - left.count)
    .slice(0, TOP_COMPANY_LIMIT);

  return {
    total: rows.length,
    companies: new Set(rows.map((row) => row.company_name)).size,
    dateRange: {
      start: dates[0] ?? null,
      end: dates[dates.length - 1] ?? null
    },
    designationTypes,
    redesignationRatio: ratio(rows.filter((row) => row.is_redesignation).length, rows.length),
    preferredStockRatio: ratio(rows.filter((row) => row.is_preferred_stock).length, rows.length),
    topCompanies
  };
};

export const logDisclosureSummary = (summary: DisclosureSummary, log: ScrapeLog): void => {
  log.info(`[summary] ${summary.total} record(s), ${summary.companies} compan(ies)`);
  if (summary.dateRange.start && summary.dateRange.end) {
    log.info(`[summary] Dates ${summary.dateRange.start} ~ ${summary.dateRange.end}`);
  }
  for (const [type, count] of Object.entries(summary.designationTypes)) {
    log.info(`[summary]   ${type}: ${count}`);
  }
  log.info(
    `[summary] Re-designation ${(summary.redesignationRatio * 100).toFixed(1)}%, ` +
      `preferred stock ${(summary.preferredStockRatio * 100).toFixed(1)}%`
  );
};
