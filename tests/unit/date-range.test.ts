import { describe, expect, it } from "vitest";
import {
  addDays,
  addMonths,
  calendarYearRange,
  compareIsoDates,
  daysBetween,
  isIsoDate,
  needsSplitting,
  parseIsoDate,
  splitDateRange,
  toPortalDate,
  todayIsoDate
} from "../../pipeline/utils/date-range.js";

describe("calendar arithmetic", () => {
  it("adds days across month and year boundaries", () => {
    expect(addDays("2023-12-31", 1)).toBe("2024-01-01");
    expect(addDays("2024-03-01", -1)).toBe("2024-02-29");
    expect(addDays("2023-03-01", -1)).toBe("2023-02-28");
  });

  it("adds months with the day clamped to the target month", () => {
    expect(addMonths("2024-01-31", 1)).toBe("2024-02-29");
    expect(addMonths("2023-01-31", 1)).toBe("2023-02-28");
    expect(addMonths("2023-08-15", 6)).toBe("2024-02-15");
    expect(addMonths("2023-11-30", 3)).toBe("2024-02-29");
  });

  it("counts days and compares dates", () => {
    expect(daysBetween("2024-01-01", "2024-12-31")).toBe(365);
    expect(compareIsoDates("2024-02-01", "2024-01-31")).toBeGreaterThan(0);
    expect(compareIsoDates("2024-01-31", "2024-01-31")).toBe(0);
  });

  it("rejects malformed and impossible dates", () => {
    expect(() => parseIsoDate("2023-02-29")).toThrow("Invalid date");
    expect(() => parseIsoDate("2024/01/01")).toThrow("Invalid date");
    expect(isIsoDate("2024-02-29")).toBe(true);
    expect(isIsoDate("2024-13-01")).toBe(false);
  });

  it("formats dates for the portal inputs", () => {
    expect(toPortalDate("2024-01-05")).toBe("2024.01.05");
    expect(calendarYearRange(2022)).toEqual({ start: "2022-01-01", end: "2022-12-31" });
    expect(todayIsoDate(new Date(2024, 6, 9, 12))).toBe("2024-07-09");
  });
});

describe("needsSplitting", () => {
  it("splits only spans longer than 365 days", () => {
    expect(needsSplitting({ start: "2023-01-01", end: "2024-01-01" })).toBe(false);
    expect(needsSplitting({ start: "2023-01-01", end: "2024-01-02" })).toBe(true);
  });
});

describe("splitDateRange", () => {
  it("splits three calendar years into half-year ranges", () => {
    expect(splitDateRange("2020-01-01", "2022-12-31", 6)).toEqual([
      { start: "2020-01-01", end: "2020-06-30" },
      { start: "2020-07-01", end: "2020-12-31" },
      { start: "2021-01-01", end: "2021-06-30" },
      { start: "2021-07-01", end: "2021-12-31" },
      { start: "2022-01-01", end: "2022-06-30" },
      { start: "2022-07-01", end: "2022-12-31" }
    ]);
  });

  it("wraps month arithmetic at the year boundary", () => {
    expect(splitDateRange("2023-10-15", "2024-03-10", 3)).toEqual([
      { start: "2023-10-15", end: "2024-01-14" },
      { start: "2024-01-15", end: "2024-03-10" }
    ]);
  });

  it("clamps month ends through leap years", () => {
    expect(splitDateRange("2019-08-31", "2021-03-15", 6)).toEqual([
      { start: "2019-08-31", end: "2020-02-28" },
      { start: "2020-02-29", end: "2020-08-28" },
      { start: "2020-08-29", end: "2021-02-27" },
      { start: "2021-02-28", end: "2021-03-15" }
    ]);
  });

  it("returns a single range when the span fits", () => {
    expect(splitDateRange("2024-05-05", "2024-05-05", 6)).toEqual([
      { start: "2024-05-05", end: "2024-05-05" }
    ]);
  });

  it("covers long ranges contiguously without overlap", () => {
    const cases: Array<[string, string, number]> = [
      ["2015-03-17", "2024-11-02", 6],
      ["2016-02-29", "2019-02-28", 1],
      ["2018-12-31", "2021-01-01", 4],
      ["2020-01-30", "2023-07-30", 12]
    ];

    for (const [start, end, maxMonths] of cases) {
      const ranges = splitDateRange(start, end, maxMonths);

      expect(ranges[0]?.start).toBe(start);
      expect(ranges[ranges.length - 1]?.end).toBe(end);
      ranges.forEach((range, index) => {
        expect(compareIsoDates(range.start, range.end)).toBeLessThanOrEqual(0);
        expect(compareIsoDates(range.end, addDays(addMonths(range.start, maxMonths), -1))).toBeLessThanOrEqual(0);
        const next = ranges[index + 1];
        if (next) {
          expect(next.start).toBe(addDays(range.end, 1));
        }
      });
    }
  });

  it("rejects an inverted range and a non-positive month span", () => {
    expect(() => splitDateRange("2024-02-01", "2024-01-01")).toThrow("is after end");
    expect(() => splitDateRange("2024-01-01", "2024-02-01", 0)).toThrow("positive integer");
  });
});
