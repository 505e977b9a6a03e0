import { describe, expect, it } from "vitest";
import { parseMultiYearArgs, parseScrapeWarningsArgs } from "../../pipeline/scripts/cli-options.js";

const TODAY = "2024-06-30";

describe("parseScrapeWarningsArgs", () => {
  it("fills defaults and ends the range today", () => {
    expect(parseScrapeWarningsArgs(["--start", "2024-01-01"], TODAY)).toEqual({
      start: "2024-01-01",
      end: "2024-06-30",
      market: "all",
      types: [],
      pageSize: 100,
      split: true,
      verbose: false
    });
  });

  it("reads every flag", () => {
    const options = parseScrapeWarningsArgs(
      [
        "--start", "2024-01-01",
        "--end", "2024-03-31",
        "--market", "main-board",
        "--types", "investment-warning, listing-management",
        "--page-size", "50",
        "--max-pages", "5",
        "--no-split",
        "--output", "warnings.csv",
        "--verbose"
      ],
      TODAY
    );

    expect(options).toEqual({
      start: "2024-01-01",
      end: "2024-03-31",
      market: "main-board",
      types: ["investment-warning", "listing-management"],
      pageSize: 50,
      maxPages: 5,
      split: false,
      output: "warnings.csv",
      verbose: true
    });
  });

  it("rejects a missing or impossible start date", () => {
    expect(() => parseScrapeWarningsArgs([], TODAY)).toThrow("Invalid arguments: start: Required");
    expect(() => parseScrapeWarningsArgs(["--start", "2024-02-30"], TODAY)).toThrow(
      "Invalid arguments: start: Expected a date as YYYY-MM-DD"
    );
  });

  it("reports an impossible end date without comparing the range", () => {
    expect(() => parseScrapeWarningsArgs(["--start", "2024-01-01", "--end", "2024-13-01"], TODAY)).toThrow(
      "Invalid arguments: end: Expected a date as YYYY-MM-DD"
    );
  });

  it("rejects a start after the end", () => {
    expect(() => parseScrapeWarningsArgs(["--start", "2024-07-01"], TODAY)).toThrow(
      "Invalid arguments: start: --start must not be after --end"
    );
  });

  it("rejects unknown disclosure types and flags", () => {
    expect(() => parseScrapeWarningsArgs(["--start", "2024-01-01", "--types", "rumours"], TODAY)).toThrow(
      /^Invalid arguments: types\.0: /
    );
    expect(() => parseScrapeWarningsArgs(["--start", "2024-01-01", "--pages", "3"], TODAY)).toThrow();
  });
});

describe("parseMultiYearArgs", () => {
  it("parses the year span", () => {
    expect(parseMultiYearArgs(["--start-year", "2021", "--end-year", "2023", "--types", "investment-warning"])).toEqual({
      startYear: 2021,
      endYear: 2023,
      market: "all",
      types: ["investment-warning"],
      verbose: false
    });
  });

  it("rejects a reversed span", () => {
    expect(() => parseMultiYearArgs(["--start-year", "2024", "--end-year", "2023"])).toThrow(
      "Invalid arguments: startYear: --start-year must not be after --end-year"
    );
  });

  it("rejects years outside the supported window", () => {
    expect(() => parseMultiYearArgs(["--start-year", "1980", "--end-year", "2023"])).toThrow(
      /^Invalid arguments: startYear: /
    );
  });
});
