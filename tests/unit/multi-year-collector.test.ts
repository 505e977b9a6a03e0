import { describe, expect, it } from "vitest";
import type { DisclosureRecord, NormalizedDisclosureRow } from "../../packages/shared/src/contracts.js";
import type { DisclosureScrapeResult, ScrapeRequest } from "../../pipeline/services/disclosure-scraper.js";
import { collectMultiYear, type YearScraper } from "../../pipeline/services/multi-year-collector.js";
import { normalizeDisclosureRecords } from "../../pipeline/services/record-normalizer.js";
import { summarizeDisclosures } from "../../pipeline/services/summary-stats.js";
import { ZERO_PACING } from "../../pipeline/utils/pacing.js";
import { createRecordingLog } from "../test-utils.js";

const record = (datetime: string, companyName: string): DisclosureRecord => ({
  rowNumber: "1",
  datetime,
  companyName,
  title: "투자경고종목 지정",
  submitter: "코스닥시장본부",
  disclosureLink: null,
  isRedesignation: false,
  isPreferredStock: false,
  designationType: "designation"
});

const scrapeResult = (records: DisclosureRecord[], warnings: string[] = []): DisclosureScrapeResult => {
  const normalized = normalizeDisclosureRecords(records);
  return {
    records: normalized.records,
    rows: normalized.rows,
    collectedCount: records.length,
    duplicatesRemoved: normalized.duplicatesRemoved,
    periods: [],
    warnings,
    summary: summarizeDisclosures(normalized.rows)
  };
};

const createFakes = (byYear: Record<number, () => DisclosureScrapeResult>) => {
  const requests: ScrapeRequest[] = [];
  const written: Array<{ filename: string; rows: readonly NormalizedDisclosureRow[] }> = [];
  const sleeps: number[] = [];

  const createScraper = (year: number): YearScraper => ({
    scrape: async (request) => {
      requests.push(request);
      const produce = byYear[year];
      return produce ? produce() : scrapeResult([]);
    }
  });

  return {
    requests,
    written,
    sleeps,
    dependencies: {
      createScraper,
      writeCsv: (filename: string, rows: readonly NormalizedDisclosureRow[]) => {
        written.push({ filename, rows });
        return `/out/${filename}`;
      },
      log: createRecordingLog(),
      pacing: { ...ZERO_PACING, betweenYearsMs: 5 },
      sleep: async (milliseconds: number) => {
        sleeps.push(milliseconds);
      }
    }
  };
};

describe("collectMultiYear", () => {
  it("writes each year and a combined file oldest first, surviving a failed year", async () => {
    const fakes = createFakes({
      2021: () => scrapeResult([record("2021-05-01 09:00", "A Corp")]),
      2022: () => {
        throw new Error("portal down");
      },
      2023: () =>
        scrapeResult(
          [record("2023-02-01 10:00", "B Corp"), record("2021-05-01 09:00", "A Corp")],
          ["[scrape] Page 2: result table not recognized (no data rows and no empty-result marker)"]
        )
    });

    const result = await collectMultiYear(
      { startYear: 2021, endYear: 2023, market: "growth-board" },
      fakes.dependencies
    );

    expect(fakes.requests).toEqual([
      { range: { start: "2021-01-01", end: "2021-12-31" }, market: "growth-board", disclosureTypes: undefined },
      { range: { start: "2022-01-01", end: "2022-12-31" }, market: "growth-board", disclosureTypes: undefined },
      { range: { start: "2023-01-01", end: "2023-12-31" }, market: "growth-board", disclosureTypes: undefined }
    ]);
    expect(result.years).toEqual([
      { year: 2021, recordCount: 1, filePath: "/out/investment_warning_2021.csv", error: null },
      { year: 2022, recordCount: 0, filePath: null, error: "portal down" },
      { year: 2023, recordCount: 2, filePath: "/out/investment_warning_2023.csv", error: null }
    ]);
    expect(fakes.written.map((entry) => entry.filename)).toEqual([
      "investment_warning_2021.csv",
      "investment_warning_2023.csv",
      "investment_warning_stocks_2021_2023_combined.csv"
    ]);
    expect(result.combinedFilePath).toBe("/out/investment_warning_stocks_2021_2023_combined.csv");
    expect(result.rows.map((row) => row.company_name)).toEqual(["A Corp", "B Corp"]);
    expect(result.summary.total).toBe(2);
    expect(result.warnings).toEqual([
      "[multi-year] 2022 failed: portal down",
      "[scrape] Page 2: result table not recognized (no data rows and no empty-result marker)"
    ]);
    expect(fakes.sleeps).toEqual([5, 5]);
  });

  it("writes nothing when no year has records", async () => {
    const fakes = createFakes({});

    const result = await collectMultiYear({ startYear: 2020, endYear: 2020 }, fakes.dependencies);

    expect(result.combinedFilePath).toBeNull();
    expect(result.years).toEqual([{ year: 2020, recordCount: 0, filePath: null, error: null }]);
    expect(fakes.written).toEqual([]);
    expect(fakes.sleeps).toEqual([]);
  });

  it("rejects a reversed or fractional year span", async () => {
    const fakes = createFakes({});

    await expect(collectMultiYear({ startYear: 2024, endYear: 2023 }, fakes.dependencies)).rejects.toThrow(
      "startYear 2024 is after endYear 2023."
    );
    await expect(collectMultiYear({ startYear: 2023.5, endYear: 2024 }, fakes.dependencies)).rejects.toThrow(
      "startYear and endYear must be integers."
    );
  });
});
