import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, isAbsolute, join } from "node:path";
import { createObjectCsvStringifier } from "csv-writer";
import type { NormalizedDisclosureRow } from "../../packages/shared/src/contracts.js";
import { OUTPUT_COLUMNS } from "../services/record-normalizer.js";

const UTF8_BOM = "\uFEFF";

export const resolveOutputPath = (filename: string, outputDirectory: string): string =>
  isAbsolute(filename) ? filename : join(outputDirectory, filename);

export const stringifyDisclosureCsv = (rows: readonly NormalizedDisclosureRow[]): string => {
  const stringifier = createObjectCsvStringifier({
    header: OUTPUT_COLUMNS.map((column) => ({ id: column, title: column }))
  });
  const records = rows.map((row) =>
    Object.fromEntries(OUTPUT_COLUMNS.map((column) => [column, row[column]]))
  );
  const body = records.length ? stringifier.stringifyRecords(records) : "";
  return `${UTF8_BOM}${stringifier.getHeaderString() ?? ""}${body}`;
};

/**
 * Write rows as UTF-8 CSV with a byte-order mark, canonical columns first.
 * Returns the absolute or output-directory-relative path written.
 */
export const writeDisclosureCsv = (
  filename: string,
  rows: readonly NormalizedDisclosureRow[],
  outputDirectory: string
): string => {
  const filePath = resolveOutputPath(filename, outputDirectory);
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, stringifyDisclosureCsv(rows), "utf-8");
  return filePath;
};
