/**
 * Unconditional waits between portal interactions. Every delay the scraper
 * applies is named here so runs can be tuned without code changes and tests
 * can run with {@link ZERO_PACING}.
 */
export interface PacingPolicy {
  afterNavigationMs: number;
  afterDateEntryMs: number;
  afterMarketSelectMs: number;
  afterTabSwitchMs: number;
  afterCheckboxResetMs: number;
  afterToggleMs: number;
  afterDisclosureTypesMs: number;
  afterPageSizeMs: number;
  afterScrollMs: number;
  afterSearchMs: number;
  afterPageClickMs: number;
  betweenPagesMs: number;
  betweenRangesMs: number;
  betweenYearsMs: number;
}

export type PacingKey = keyof PacingPolicy;

export const DEFAULT_PACING: PacingPolicy = {
  afterNavigationMs: 5_000,
  afterDateEntryMs: 2_000,
  afterMarketSelectMs: 2_000,
  afterTabSwitchMs: 3_000,
  afterCheckboxResetMs: 1_000,
  afterToggleMs: 500,
  afterDisclosureTypesMs: 3_000,
  afterPageSizeMs: 2_000,
  afterScrollMs: 1_000,
  afterSearchMs: 8_000,
  afterPageClickMs: 4_000,
  betweenPagesMs: 2_000,
  betweenRangesMs: 10_000,
  betweenYearsMs: 10_000
};

const PACING_KEYS: readonly PacingKey[] = [
  "afterNavigationMs",
  "afterDateEntryMs",
  "afterMarketSelectMs",
  "afterTabSwitchMs",
  "afterCheckboxResetMs",
  "afterToggleMs",
  "afterDisclosureTypesMs",
  "afterPageSizeMs",
  "afterScrollMs",
  "afterSearchMs",
  "afterPageClickMs",
  "betweenPagesMs",
  "betweenRangesMs",
  "betweenYearsMs"
];

export const scalePacing = (policy: PacingPolicy, factor: number): PacingPolicy => {
  const scaled: PacingPolicy = { ...policy };
  for (const key of PACING_KEYS) {
    scaled[key] = Math.max(0, Math.round(policy[key] * factor));
  }
  return scaled;
};

export const ZERO_PACING: PacingPolicy = scalePacing(DEFAULT_PACING, 0);

export type Sleep = (milliseconds: number) => Promise<void>;

export const sleep: Sleep = (milliseconds) =>
  new Promise((resolve) => setTimeout(resolve, milliseconds));

export type Pacer = (key: PacingKey) => Promise<void>;

export const createPacer = (policy: PacingPolicy, sleepImpl: Sleep = sleep): Pacer =>
  async (key) => {
    const milliseconds = policy[key];
    if (milliseconds > 0) {
      await sleepImpl(milliseconds);
    }
  };
