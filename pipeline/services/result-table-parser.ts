import { load, type CheerioAPI } from "cheerio";
import type { AnyNode, Element } from "domhandler";
import type { DisclosureRecord } from "../../packages/shared/src/contracts.js";
import {
  DEFAULT_PORTAL_BASE_URL,
  analyzeDisclosureTitle,
  parseDisclosureLink
} from "../../packages/shared/src/disclosure-helpers.js";
import { normalizeCellLabel, normalizeWhitespace } from "../../packages/shared/src/text-utils.js";

/**
 * Keyword lists that decide which table rows are data. Versioned so a portal
 * layout change can ship as a new rule set without touching the parser.
 */
export interface RowClassificationRules {
  version: number;
  /** Matched as substrings of the normalized first cell. */
  headerKeywords: readonly string[];
  /** Titles equal to one of these (case-insensitive) are header remnants. */
  headerTitleLabels: readonly string[];
  noResultMarkers: readonly string[];
  minimumCells: number;
  minimumTimeLength: number;
}

export const DEFAULT_ROW_CLASSIFICATION_RULES: RowClassificationRules = {
  version: 1,
  headerKeywords: ["번호", "no", "순번", "시간", "time", "접수번호", "공시제목", "회사명", "제출인"],
  headerTitleLabels: ["공시제목", "제목", "title"],
  noResultMarkers: ["검색결과가 없습니다", "조회된 데이터가 없습니다", "검색된 결과가 없습니다", "데이터가 없습니다"],
  minimumCells: 3,
  minimumTimeLength: 8
};

/** Tried in order; the first that yields a data row wins. */
export const ROW_SELECTORS: readonly string[] = [
  "tbody tr:has(td)",
  "table tr:has(td)",
  "div.list_content tr:has(td)",
  "table.list tr:has(td)",
  "div[class*='result'] tr:has(td)"
];

export type RowExtractionOutcome =
  | { kind: "rows"; records: DisclosureRecord[]; selector: string; rejectedRows: number }
  | { kind: "no-results" }
  | { kind: "unrecognized"; reason: string };

export interface ResultTableParseOptions {
  baseUrl?: string;
  rules?: RowClassificationRules;
}

const cellsOf = ($: CheerioAPI, row: AnyNode): Element[] => $(row).children("td").toArray();

export const isHeaderRow = (firstCellText: string, rules: RowClassificationRules): boolean => {
  const label = normalizeCellLabel(firstCellText);
  return !label || rules.headerKeywords.some((keyword) => label.includes(keyword));
};

const findDataRows = (
  $: CheerioAPI,
  rules: RowClassificationRules
): { selector: string; rows: AnyNode[] } | null => {
  for (const selector of ROW_SELECTORS) {
    const rows = $(selector)
      .toArray()
      .filter((row) => {
        const cells = cellsOf($, row);
        const [firstCell] = cells;
        return (
          cells.length >= rules.minimumCells &&
          firstCell !== undefined &&
          !isHeaderRow($(firstCell).text(), rules)
        );
      });

    if (rows.length) {
      return { selector, rows };
    }
  }
  return null;
};

const TEXT_NODE = 3;

const hasNoResultMarker = ($: CheerioAPI, rules: RowClassificationRules): boolean =>
  $("div, td, span")
    .toArray()
    .some((node) => {
      const ownText = $(node)
        .contents()
        .filter((_, child) => child.nodeType === TEXT_NODE)
        .text();
      const text = normalizeWhitespace(ownText);
      return rules.noResultMarkers.some((marker) => text.includes(marker));
    });

interface RowCells {
  rowNumber: string;
  time: Element;
  company: Element;
  title: Element;
  submitter: Element | null;
}

/** 5+ cells carry their own number; 4 and 3 cells get the 1-based position. */
const mapCells = (
  cells: Element[],
  position: number,
  textOf: (cell: Element) => string
): RowCells | null => {
  const synthesized = String(position + 1);

  if (cells.length >= 5) {
    const [rowNumber, time, company, title, submitter] = cells;
    if (!rowNumber || !time || !company || !title || !submitter) return null;
    return { rowNumber: textOf(rowNumber), time, company, title, submitter };
  }

  const [time, company, title, submitter] = cells;
  if (!time || !company || !title) return null;
  return { rowNumber: synthesized, time, company, title, submitter: submitter ?? null };
};

const extractRecord = (
  $: CheerioAPI,
  row: AnyNode,
  position: number,
  baseUrl: string,
  rules: RowClassificationRules
): DisclosureRecord | null => {
  const textOf = (cell: Element | null): string => (cell ? normalizeWhitespace($(cell).text()) : "");
  const mapped = mapCells(cellsOf($, row), position, textOf);
  if (!mapped) return null;

  const datetime = textOf(mapped.time);
  const companyName = textOf(mapped.company);

  const titleLink = $(mapped.title).find("a").first();
  const hasLink = titleLink.length > 0;
  const title = hasLink ? normalizeWhitespace(titleLink.text()) : textOf(mapped.title);
  const disclosureLink = hasLink
    ? parseDisclosureLink(titleLink.attr("onclick"), titleLink.attr("href"), baseUrl)
    : null;

  if (!title || !companyName) return null;
  if (rules.headerTitleLabels.includes(title.toLowerCase())) return null;
  if (datetime.length < rules.minimumTimeLength) return null;

  return {
    rowNumber: mapped.rowNumber,
    datetime,
    companyName,
    title,
    submitter: textOf(mapped.submitter),
    disclosureLink,
    ...analyzeDisclosureTitle(title)
  };
};

/**
 * Extract disclosure records from a result page. Pure: the same HTML always
 * yields the same outcome.
 */
export const parseResultTable = (
  html: string,
  options: ResultTableParseOptions = {}
): RowExtractionOutcome => {
  const rules = options.rules ?? DEFAULT_ROW_CLASSIFICATION_RULES;
  const baseUrl = options.baseUrl ?? DEFAULT_PORTAL_BASE_URL;
  const $ = load(html);

  const found = findDataRows($, rules);
  if (!found) {
    return hasNoResultMarker($, rules)
      ? { kind: "no-results" }
      : { kind: "unrecognized", reason: "no data rows and no empty-result marker" };
  }

  const records: DisclosureRecord[] = [];
  found.rows.forEach((row, position) => {
    const record = extractRecord($, row, position, baseUrl, rules);
    if (record) records.push(record);
  });

  if (!records.length) {
    return {
      kind: "unrecognized",
      reason: `all ${found.rows.length} data row(s) matched by ${found.selector} were rejected`
    };
  }

  return {
    kind: "rows",
    records,
    selector: found.selector,
    rejectedRows: found.rows.length - records.length
  };
};
