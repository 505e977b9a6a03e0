import { join } from "node:path";
import type { IsoDate } from "../../packages/shared/src/contracts.js";

export const DEFAULT_OUTPUT_DIRECTORY = join("data", "output");

export const DEFAULT_DEBUG_ARTIFACT_DIRECTORY = join("data", "debug");

const pad = (value: number): string => String(value).padStart(2, "0");

/** Local wall-clock timestamp, `YYYYMMDD_HHmmss`. */
export const formatFileTimestamp = (now: Date = new Date()): string =>
  `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}` +
  `_${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;

export const buildDefaultOutputFilename = (
  start: IsoDate,
  end: IsoDate,
  now: Date = new Date()
): string => `investment_warning_stocks_${start}_${end}_${formatFileTimestamp(now)}.csv`;

export const buildYearOutputFilename = (year: number): string =>
  `investment_warning_${year}.csv`;

export const buildCombinedOutputFilename = (startYear: number, endYear: number): string =>
  `investment_warning_stocks_${startYear}_${endYear}_combined.csv`;
