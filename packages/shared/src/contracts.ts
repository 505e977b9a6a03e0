export type DesignationType = "designation" | "cancellation" | "other" | "unknown";

/**
 * Market scope of a search.
 * - all: portal default, no radio control is touched.
 * - main-board: KOSPI (유가증권시장).
 * - growth-board: KOSDAQ (코스닥시장).
 */
export type MarketFilter = "all" | "main-board" | "growth-board";

export type DisclosureTypeFilter =
  | "investment-warning"
  | "unfaithful-disclosure"
  | "listing-management";

/** ISO calendar date, `YYYY-MM-DD`. */
export type IsoDate = string;

export interface DateRange {
  start: IsoDate;
  end: IsoDate;
}

export interface SearchConfiguration {
  range: DateRange;
  market: MarketFilter;
  disclosureTypes: DisclosureTypeFilter[];
  pageSize: number;
}

/**
 * Reference to a disclosure document in the portal viewer. The URL is
 * reconstructed from the three tokens, never fetched.
 */
export interface DisclosureLink {
  accessionNumber: string;
  documentNumber: string;
  viewerHost: string;
  url: string;
}

export interface DisclosureTitleAnalysis {
  readonly isRedesignation: boolean;
  readonly isPreferredStock: boolean;
  readonly designationType: DesignationType;
}

export interface DisclosureRecord extends DisclosureTitleAnalysis {
  readonly rowNumber: string;
  /** Raw display text of the result table's time column. */
  readonly datetime: string;
  readonly companyName: string;
  readonly title: string;
  readonly submitter: string;
  readonly disclosureLink: DisclosureLink | null;
}

export interface NormalizedDisclosureRow {
  row_num: string;
  date: string;
  time: string;
  company_name: string;
  title: string;
  submitter: string;
  is_redesignation: boolean;
  is_preferred_stock: boolean;
  designation_type: DesignationType;
  disclosure_link: string;
  datetime: string;
}

export type NormalizedDisclosureColumn = keyof NormalizedDisclosureRow;

export interface DisclosureSummary {
  total: number;
  companies: number;
  dateRange: {
    start: IsoDate | null;
    end: IsoDate | null;
  };
  designationTypes: Partial<Record<DesignationType, number>>;
  redesignationRatio: number;
  preferredStockRatio: number;
  topCompanies: Array<{ companyName: string; count: number }>;
}

/**
 * Failure taxonomy for scrape steps.
 * - RESOLUTION: no candidate strategy located the element.
 * - VERIFICATION: an action ran but its effect did not materialize.
 * - STRUCTURAL: the result table could not be recognized.
 * - SESSION: the automation session itself errored.
 */
export type ScrapeFailureCode = "RESOLUTION" | "VERIFICATION" | "STRUCTURAL" | "SESSION";

export type StepOutcome =
  | { ok: true; detail?: string }
  | { ok: false; code: ScrapeFailureCode; message: string };

export type StepCriticality = "required" | "optional";

export type PeriodStopReason =
  | "PAGE_CAP"
  | "NO_NEXT_PAGE"
  | "EMPTY_PAGES"
  | "SAFETY_CEILING"
  | "STEP_FAILED"
  | "ERROR";

export interface PeriodReport {
  range: DateRange;
  pagesVisited: number;
  recordCount: number;
  stopReason: PeriodStopReason;
}
