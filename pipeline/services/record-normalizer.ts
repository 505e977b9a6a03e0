import type {
  DisclosureRecord,
  NormalizedDisclosureColumn,
  NormalizedDisclosureRow
} from "../../packages/shared/src/contracts.js";

export type SortOrder = "ascending" | "descending";

/** Canonical columns first, then extras. */
export const OUTPUT_COLUMNS: readonly NormalizedDisclosureColumn[] = [
  "row_num",
  "date",
  "time",
  "company_name",
  "title",
  "submitter",
  "is_redesignation",
  "is_preferred_stock",
  "designation_type",
  "disclosure_link",
  "datetime"
];

const DATE_TIME_PATTERN =
  /^(\d{4})[-./](\d{1,2})[-./](\d{1,2})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

const padTwo = (value: number): string => String(value).padStart(2, "0");

const isValidCalendarDate = (year: number, month: number, day: number): boolean => {
  const candidate = new Date(Date.UTC(year, month - 1, day));
  return (
    candidate.getUTCFullYear() === year &&
    candidate.getUTCMonth() === month - 1 &&
    candidate.getUTCDate() === day
  );
};

/**
 * Epoch milliseconds of a portal datetime such as `2024-01-15 09:30` or
 * `2024.01.15 09:30:00`, read as UTC; null when the text is not a date.
 */
export const parseDisclosureDateTime = (raw: string): number | null => {
  const match = raw.trim().match(DATE_TIME_PATTERN);
  if (!match) return null;

  const [year, month, day, hour, minute, second] = match
    .slice(1)
    .map((part) => (part === undefined ? 0 : Number(part)));
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    !isValidCalendarDate(year, month, day)
  ) {
    return null;
  }
  if ((hour ?? 0) > 23 || (minute ?? 0) > 59 || (second ?? 0) > 59) return null;

  return Date.UTC(year, month - 1, day, hour ?? 0, minute ?? 0, second ?? 0);
};

const toIsoDateToken = (token: string): string => {
  const dashed = token.replace(/\./g, "-");
  const match = dashed.match(/^(\d{4})-(\d{1,2})-(\d{1,2})$/);
  if (!match) return dashed;

  const [year, month, day] = match.slice(1).map(Number);
  if (year === undefined || month === undefined || day === undefined) return dashed;
  return isValidCalendarDate(year, month, day) ? `${year}-${padTwo(month)}-${padTwo(day)}` : dashed;
};

/** First whitespace token is the date, the remainder is the time. */
export const splitDateTime = (raw: string): { date: string; time: string } => {
  const trimmed = raw.trim();
  const separatorIndex = trimmed.search(/\s/);
  if (separatorIndex < 0) {
    return { date: toIsoDateToken(trimmed), time: "" };
  }
  return {
    date: toIsoDateToken(trimmed.slice(0, separatorIndex)),
    time: trimmed.slice(separatorIndex).trim()
  };
};

export const recordKey = (record: Pick<DisclosureRecord, "datetime" | "companyName" | "title">): string =>
  JSON.stringify([record.datetime, record.companyName, record.title]);

/** Keeps the first occurrence of each (datetime, company, title). */
export const deduplicateRecords = <T extends DisclosureRecord>(records: readonly T[]): T[] => {
  const seen = new Set<string>();
  return records.filter((record) => {
    const key = recordKey(record);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
};

/** Stable; records whose datetime cannot be parsed keep their order after the rest. */
export const sortRecords = <T extends DisclosureRecord>(
  records: readonly T[],
  order: SortOrder = "descending"
): T[] => {
  const direction = order === "descending" ? -1 : 1;
  return records
    .map((record, index) => ({ record, index, time: parseDisclosureDateTime(record.datetime) }))
    .sort((left, right) => {
      if (left.time === null || right.time === null) {
        if (left.time === right.time) return left.index - right.index;
        return left.time === null ? 1 : -1;
      }
      return (left.time - right.time) * direction || left.index - right.index;
    })
    .map(({ record }) => record);
};

export const toNormalizedRow = (record: DisclosureRecord): NormalizedDisclosureRow => {
  const { date, time } = splitDateTime(record.datetime);
  return {
    row_num: record.rowNumber,
    date,
    time,
    company_name: record.companyName,
    title: record.title,
    submitter: record.submitter,
    is_redesignation: record.isRedesignation,
    is_preferred_stock: record.isPreferredStock,
    designation_type: record.designationType,
    disclosure_link: record.disclosureLink?.url ?? "",
    datetime: record.datetime
  };
};

export interface NormalizedDisclosures {
  records: DisclosureRecord[];
  rows: NormalizedDisclosureRow[];
  duplicatesRemoved: number;
}

export const normalizeDisclosureRecords = (
  records: readonly DisclosureRecord[],
  order: SortOrder = "descending"
): NormalizedDisclosures => {
  const unique = deduplicateRecords(records);
  const sorted = sortRecords(unique, order);
  return {
    records: sorted,
    rows: sorted.map(toNormalizedRow),
    duplicatesRemoved: records.length - unique.length
  };
};
