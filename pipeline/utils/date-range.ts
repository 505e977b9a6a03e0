import type { DateRange, IsoDate } from "../../packages/shared/src/contracts.js";

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

const daysInMonth = (year: number, month: number): number =>
  new Date(Date.UTC(year, month, 0)).getUTCDate();

const pad = (value: number, width = 2): string => String(value).padStart(width, "0");

export const parseIsoDate = (value: IsoDate): CalendarDate => {
  const match = value.match(ISO_DATE_PATTERN);
  if (!match) {
    throw new Error(`Invalid date "${value}". Expected YYYY-MM-DD.`);
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    throw new Error(`Invalid date "${value}". Expected YYYY-MM-DD.`);
  }

  return { year, month, day };
};

export const isIsoDate = (value: string): boolean => {
  try {
    parseIsoDate(value);
    return true;
  } catch {
    return false;
  }
};

const formatCalendarDate = ({ year, month, day }: CalendarDate): IsoDate =>
  `${pad(year, 4)}-${pad(month)}-${pad(day)}`;

const toEpochDay = (value: IsoDate): number => {
  const { year, month, day } = parseIsoDate(value);
  return Date.UTC(year, month - 1, day) / DAY_MS;
};

const fromEpochDay = (epochDay: number): IsoDate => {
  const date = new Date(epochDay * DAY_MS);
  return formatCalendarDate({
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate()
  });
};

export const addDays = (value: IsoDate, days: number): IsoDate =>
  fromEpochDay(toEpochDay(value) + days);

/** Adds calendar months, clamping the day to the target month's length. */
export const addMonths = (value: IsoDate, months: number): IsoDate => {
  const { year, month, day } = parseIsoDate(value);
  const monthIndex = year * 12 + (month - 1) + months;
  const targetYear = Math.floor(monthIndex / 12);
  const targetMonth = (monthIndex % 12) + 1;
  return formatCalendarDate({
    year: targetYear,
    month: targetMonth,
    day: Math.min(day, daysInMonth(targetYear, targetMonth))
  });
};

export const daysBetween = (start: IsoDate, end: IsoDate): number =>
  toEpochDay(end) - toEpochDay(start);

export const compareIsoDates = (left: IsoDate, right: IsoDate): number =>
  daysBetween(right, left);

export const assertDateRange = (range: DateRange): DateRange => {
  if (compareIsoDates(range.start, range.end) > 0) {
    throw new Error(`Invalid date range: start ${range.start} is after end ${range.end}.`);
  }
  return range;
};

/** Ranges longer than this many days are split before searching. */
export const SPLIT_THRESHOLD_DAYS = 365;

export const DEFAULT_MAX_MONTHS_PER_RANGE = 6;

export const needsSplitting = (range: DateRange): boolean =>
  daysBetween(range.start, range.end) > SPLIT_THRESHOLD_DAYS;

/**
 * Split `[start, end]` into contiguous sub-ranges of at most `maxMonths`
 * calendar months each. The last sub-range is truncated at `end`.
 */
export const splitDateRange = (
  start: IsoDate,
  end: IsoDate,
  maxMonths: number = DEFAULT_MAX_MONTHS_PER_RANGE
): DateRange[] => {
  if (!Number.isInteger(maxMonths) || maxMonths < 1) {
    throw new Error(`maxMonths must be a positive integer, got ${maxMonths}.`);
  }
  assertDateRange({ start, end });

  const ranges: DateRange[] = [];
  let currentStart = start;

  while (compareIsoDates(currentStart, end) <= 0) {
    const fullSpanEnd = addDays(addMonths(currentStart, maxMonths), -1);
    const currentEnd = compareIsoDates(fullSpanEnd, end) > 0 ? end : fullSpanEnd;
    ranges.push({ start: currentStart, end: currentEnd });
    currentStart = addDays(currentEnd, 1);
  }

  return ranges;
};

/** `2024-01-05` → `2024.01.05`, the portal's date input format. */
export const toPortalDate = (value: IsoDate): string => {
  parseIsoDate(value);
  return value.replace(/-/g, ".");
};

export const calendarYearRange = (year: number): DateRange => ({
  start: `${pad(year, 4)}-01-01`,
  end: `${pad(year, 4)}-12-31`
});

export const todayIsoDate = (now: Date = new Date()): IsoDate =>
  formatCalendarDate({
    year: now.getFullYear(),
    month: now.getMonth() + 1,
    day: now.getDate()
  });
