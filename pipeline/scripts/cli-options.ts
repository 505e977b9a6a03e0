import { parseArgs } from "node:util";
import { z } from "zod";
import { compareIsoDates, isIsoDate } from "../utils/date-range.js";

const isoDateSchema = z.string().refine(isIsoDate, { message: "Expected a date as YYYY-MM-DD" });

const disclosureTypeSchema = z.enum(["investment-warning", "unfaithful-disclosure", "listing-management"]);

const disclosureTypesSchema = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? "")
      .split(",")
      .map((entry) => entry.trim())
      .filter(Boolean)
  )
  .pipe(z.array(disclosureTypeSchema));

const positiveIntegerSchema = z.coerce.number().int().positive();

const scrapeWarningsSchema = z
  .object({
    start: isoDateSchema,
    end: isoDateSchema,
    market: z.enum(["all", "main-board", "growth-board"]).default("all"),
    types: disclosureTypesSchema,
    pageSize: positiveIntegerSchema.default(100),
    maxPages: positiveIntegerSchema.optional(),
    split: z.boolean().default(true),
    output: z.string().min(1).optional(),
    verbose: z.boolean().default(false)
  })
  .refine(
    (options) =>
      !isIsoDate(options.start) || !isIsoDate(options.end) || compareIsoDates(options.start, options.end) <= 0,
    {
      message: "--start must not be after --end",
      path: ["start"]
    }
  );

export type ScrapeWarningsOptions = z.infer<typeof scrapeWarningsSchema>;

const multiYearSchema = z
  .object({
    startYear: z.coerce.number().int().min(1990).max(2100),
    endYear: z.coerce.number().int().min(1990).max(2100),
    market: z.enum(["all", "main-board", "growth-board"]).default("all"),
    types: disclosureTypesSchema,
    verbose: z.boolean().default(false)
  })
  .refine((options) => options.startYear <= options.endYear, {
    message: "--start-year must not be after --end-year",
    path: ["startYear"]
  });

export type MultiYearOptions = z.infer<typeof multiYearSchema>;

const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join(".") || "arguments"}: ${issue.message}`).join("; ");

/**
 * `--start 2024-01-01 --end 2024-06-30 [--market main-board]
 * [--types investment-warning,unfaithful-disclosure] [--page-size 100]
 * [--max-pages 5] [--no-split] [--output file.csv] [--verbose]`
 */
export const parseScrapeWarningsArgs = (argv: string[], today: string): ScrapeWarningsOptions => {
  const { values } = parseArgs({
    args: argv,
    options: {
      start: { type: "string" },
      end: { type: "string" },
      market: { type: "string" },
      types: { type: "string" },
      "page-size": { type: "string" },
      "max-pages": { type: "string" },
      "no-split": { type: "boolean" },
      output: { type: "string" },
      verbose: { type: "boolean" }
    },
    strict: true
  });

  const result = scrapeWarningsSchema.safeParse({
    start: values.start,
    end: values.end ?? today,
    market: values.market,
    types: values.types,
    pageSize: values["page-size"],
    maxPages: values["max-pages"],
    split: !values["no-split"],
    output: values.output,
    verbose: values.verbose ?? false
  });
  if (!result.success) {
    throw new Error(`Invalid arguments: ${formatIssues(result.error)}`);
  }
  return result.data;
};

/** `--start-year 2022 --end-year 2024 [--market ...] [--types ...] [--verbose]` */
export const parseMultiYearArgs = (argv: string[]): MultiYearOptions => {
  const { values } = parseArgs({
    args: argv,
    options: {
      "start-year": { type: "string" },
      "end-year": { type: "string" },
      market: { type: "string" },
      types: { type: "string" },
      verbose: { type: "boolean" }
    },
    strict: true
  });

  const result = multiYearSchema.safeParse({
    startYear: values["start-year"],
    endYear: values["end-year"],
    market: values.market,
    types: values.types,
    verbose: values.verbose ?? false
  });
  if (!result.success) {
    throw new Error(`Invalid arguments: ${formatIssues(result.error)}`);
  }
  return result.data;
};
