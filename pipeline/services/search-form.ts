import type {
  DateRange,
  DisclosureTypeFilter,
  MarketFilter,
  ScrapeFailureCode,
  SearchConfiguration,
  StepCriticality,
  StepOutcome
} from "../../packages/shared/src/contracts.js";
import { toPortalDate } from "../utils/date-range.js";
import { errorMessage } from "../utils/scrape-log.js";
import type { PageElement, SelectOptionChoice } from "./browser-session.js";
import {
  ALL_CHECKBOXES,
  DISCLOSURE_TYPES,
  END_DATE_INPUT,
  MARKET_ACTION_CHECKBOXES,
  MARKET_ACTION_TAB,
  MARKET_RADIOS,
  PAGE_SIZE_CHOICES,
  PAGE_SIZE_DROPDOWN,
  SEARCH_BUTTON,
  SEARCH_FORM_MARKERS,
  SEARCH_PAGE_PATH,
  SEARCH_RESULT_MARKERS,
  START_DATE_INPUT,
  pageSizeOptionCandidates
} from "./portal-selectors.js";
import { captureDiagnostic, warn, type ScrapeContext } from "./scrape-context.js";
import {
  iterateResolvedCandidates,
  resolveTarget,
  type SelectorTarget
} from "./selector-resolver.js";

export const DEFAULT_DISCLOSURE_TYPES: DisclosureTypeFilter[] = ["investment-warning"];

export const DEFAULT_PAGE_SIZE = 100;

const succeeded = (detail?: string): StepOutcome => (detail ? { ok: true, detail } : { ok: true });

const failed = (code: ScrapeFailureCode, message: string): StepOutcome => ({
  ok: false,
  code,
  message
});

/**
 * Drives the detailed-search form. Every operation reports a
 * {@link StepOutcome}; whether a failure aborts the search is decided by the
 * step table in {@link SEARCH_FORM_STEPS}.
 */
export class SearchForm {
  constructor(private readonly context: ScrapeContext) {}

  private get session() {
    return this.context.session;
  }

  private get log() {
    return this.context.log;
  }

  private async guard(diagnosticLabel: string, action: () => Promise<StepOutcome>): Promise<StepOutcome> {
    try {
      return await action();
    } catch (actionError) {
      const message = `${diagnosticLabel}: ${errorMessage(actionError)}`;
      warn(this.context, `[search-form] ${message}`);
      await captureDiagnostic(this.context, diagnosticLabel);
      return failed("SESSION", message);
    }
  }

  async openSearchPage(): Promise<StepOutcome> {
    return this.guard("navigate_error", async () => {
      const url = `${this.context.baseUrl}${SEARCH_PAGE_PATH}`;
      this.log.info(`[search-form] Opening ${url}`);
      await this.session.goto(url, this.context.timeouts.navigationMs);
      await this.context.pace("afterNavigationMs");

      const marker = await resolveTarget(
        this.session,
        SEARCH_FORM_MARKERS,
        { timeoutMs: this.context.timeouts.defaultMs },
        this.log
      );
      if (!marker.found) {
        await captureDiagnostic(this.context, "navigate_error");
        return failed("RESOLUTION", "Search form did not load.");
      }

      this.log.info("[search-form] Search page loaded");
      return succeeded();
    });
  }

  async setDateRange(range: DateRange): Promise<StepOutcome> {
    return this.guard("date_setting_error", async () => {
      this.log.info(`[search-form] Date range ${range.start} ~ ${range.end}`);
      const inputs: Array<[SelectorTarget, string]> = [
        [START_DATE_INPUT, toPortalDate(range.start)],
        [END_DATE_INPUT, toPortalDate(range.end)]
      ];

      for (const [target, value] of inputs) {
        const resolved = await resolveTarget(
          this.session,
          target,
          { timeoutMs: this.context.timeouts.defaultMs },
          this.log
        );
        if (!resolved.found) {
          warn(this.context, `[search-form] Could not find the ${target.name}.`);
          await captureDiagnostic(this.context, "date_setting_error");
          return failed("RESOLUTION", `Could not find the ${target.name}.`);
        }
        await resolved.element.clearAndType(value);
      }

      await this.context.pace("afterDateEntryMs");
      return succeeded();
    });
  }

  async selectMarket(market: MarketFilter): Promise<StepOutcome> {
    if (market === "all") {
      this.log.info("[search-form] Market: all (portal default)");
      return succeeded("default");
    }

    return this.guard("market_selection_error", async () => {
      const target = MARKET_RADIOS[market];
      let resolvedAny = false;

      for await (const { element, candidateIndex } of iterateResolvedCandidates(
        this.session,
        target,
        { timeoutMs: this.context.timeouts.marketRadioMs },
        this.log
      )) {
        resolvedAny = true;
        try {
          if (await this.toggleOn(element)) {
            this.log.info(`[search-form] Market ${market} selected (candidate ${candidateIndex + 1})`);
            await this.context.pace("afterMarketSelectMs");
            return succeeded();
          }
          this.log.debug(`[search-form] Market radio clicked but not selected (candidate ${candidateIndex + 1})`);
        } catch (toggleError) {
          this.log.debug(`[search-form] Market radio candidate ${candidateIndex + 1} failed: ${errorMessage(toggleError)}`);
        }
      }

      warn(this.context, `[search-form] Could not select market ${market}; searching all markets.`);
      await captureDiagnostic(this.context, `market_selection_error_${market}`);
      return resolvedAny
        ? failed("VERIFICATION", `Market radio for ${market} did not become selected.`)
        : failed("RESOLUTION", `Market radio for ${market} was not found.`);
    });
  }

  async selectDisclosureTypes(types: readonly DisclosureTypeFilter[]): Promise<StepOutcome> {
    const requested = types.length ? types : DEFAULT_DISCLOSURE_TYPES;

    return this.guard("disclosure_type_error", async () => {
      this.log.info(`[search-form] Disclosure types: ${requested.join(", ")}`);
      await this.activateMarketActionTab();
      await this.resetCheckboxes();

      let selectedCount = 0;
      for (const type of requested) {
        const definition = DISCLOSURE_TYPES[type];
        if (await this.checkDisclosureType(definition.checkbox)) {
          selectedCount += 1;
          this.log.info(`[search-form] ${definition.label} checked`);
        } else {
          warn(this.context, `[search-form] Could not check ${definition.label}; skipping it.`);
          await captureDiagnostic(this.context, `checkbox_error_${type}`);
        }
      }

      await this.context.pace("afterDisclosureTypesMs");
      return succeeded(`${selectedCount}/${requested.length} disclosure types selected`);
    });
  }

  async setPageSize(pageSize: number): Promise<StepOutcome> {
    try {
      this.log.info(`[search-form] Page size ${pageSize}`);
      const dropdown = await resolveTarget(
        this.session,
        PAGE_SIZE_DROPDOWN,
        { timeoutMs: this.context.timeouts.pageSizeMs },
        this.log
      );
      if (!dropdown.found) {
        warn(this.context, "[search-form] Page-size dropdown not found; using the portal default.");
        return succeeded("default");
      }

      await dropdown.element.scrollIntoView();
      await this.context.pace("afterScrollMs");

      if (await this.selectPageSizeOption(dropdown.element, pageSize)) {
        await this.context.pace("afterPageSizeMs");
        return succeeded();
      }

      warn(this.context, `[search-form] Could not set page size ${pageSize}; using the portal default.`);
      return succeeded("default");
    } catch (pageSizeError) {
      warn(this.context, `[search-form] Page size failed: ${errorMessage(pageSizeError)}; using the portal default.`);
      await captureDiagnostic(this.context, "page_size_setting_error");
      return succeeded("default");
    }
  }

  async submitSearch(): Promise<StepOutcome> {
    return this.guard("search_error", async () => {
      let submitted = false;
      for await (const { element, candidateIndex } of iterateResolvedCandidates(
        this.session,
        SEARCH_BUTTON,
        { timeoutMs: this.context.timeouts.searchButtonMs },
        this.log
      )) {
        try {
          await element.scrollIntoView();
          await this.context.pace("afterScrollMs");
          await element.click();
          this.log.info(`[search-form] Search submitted (candidate ${candidateIndex + 1})`);
          submitted = true;
          break;
        } catch (clickError) {
          this.log.debug(`[search-form] Search button candidate ${candidateIndex + 1} failed: ${errorMessage(clickError)}`);
        }
      }

      if (!submitted) {
        await captureDiagnostic(this.context, "search_error");
        return failed("RESOLUTION", "Search button not found.");
      }

      await this.context.pace("afterSearchMs");
      const results = await resolveTarget(
        this.session,
        SEARCH_RESULT_MARKERS,
        { timeoutMs: this.context.timeouts.defaultMs },
        this.log
      );
      if (!results.found) {
        warn(this.context, "[search-form] Search results did not appear in time; continuing.");
      }
      return succeeded();
    });
  }

  // -------------------------------------------------------------------------

  /** Activate a radio or checkbox unless it already is; true once it reads as checked. */
  private async toggleOn(element: PageElement): Promise<boolean> {
    await element.scrollIntoView();
    await this.context.pace("afterScrollMs");
    if (await element.isChecked()) {
      return true;
    }

    await element.click();
    await this.context.pace("afterToggleMs");
    return element.isChecked();
  }

  private async activateMarketActionTab(): Promise<void> {
    const tab = await resolveTarget(
      this.session,
      MARKET_ACTION_TAB,
      { timeoutMs: this.context.timeouts.marketActionTabMs },
      this.log
    );

    if (!tab.found) {
      warn(this.context, "[search-form] Market-action tab not found; using the default tab.");
    } else {
      try {
        await tab.element.click();
        this.log.info("[search-form] Market-action tab opened");
      } catch (tabError) {
        warn(this.context, `[search-form] Market-action tab click failed: ${errorMessage(tabError)}`);
      }
    }

    await this.context.pace("afterTabSwitchMs");
  }

  private async resetCheckboxes(): Promise<void> {
    try {
      let checkboxes = await this.session.findAll(MARKET_ACTION_CHECKBOXES);
      if (!checkboxes.length) {
        checkboxes = await this.session.findAll(ALL_CHECKBOXES);
      }

      let clearedCount = 0;
      for (const checkbox of checkboxes) {
        try {
          if (await checkbox.isChecked()) {
            await checkbox.click();
            clearedCount += 1;
          }
        } catch (checkboxError) {
          this.log.debug(`[search-form] Checkbox reset skipped one box: ${errorMessage(checkboxError)}`);
        }
      }

      await this.context.pace("afterCheckboxResetMs");
      this.log.info(`[search-form] Cleared ${clearedCount} of ${checkboxes.length} checkbox(es)`);
    } catch (resetError) {
      warn(this.context, `[search-form] Checkbox reset failed: ${errorMessage(resetError)}`);
    }
  }

  private async checkDisclosureType(checkbox: SelectorTarget): Promise<boolean> {
    for await (const { element, candidateIndex } of iterateResolvedCandidates(
      this.session,
      checkbox,
      { timeoutMs: this.context.timeouts.checkboxMs },
      this.log
    )) {
      try {
        if (await this.toggleOn(element)) {
          return true;
        }
        this.log.debug(`[search-form] ${checkbox.name} clicked but not checked (candidate ${candidateIndex + 1})`);
      } catch (toggleError) {
        this.log.debug(`[search-form] ${checkbox.name} candidate ${candidateIndex + 1} failed: ${errorMessage(toggleError)}`);
      }
    }
    return false;
  }

  /** By value, by visible text, by index, then by clicking the option itself. */
  private async selectPageSizeOption(dropdown: PageElement, pageSize: number): Promise<boolean> {
    const optionIndex = PAGE_SIZE_CHOICES.findIndex((choice) => choice === pageSize);
    const selections: Array<{ method: string; choice: SelectOptionChoice }> = [
      { method: "value", choice: { value: String(pageSize) } },
      { method: "visible text", choice: { label: String(pageSize) } },
      ...(optionIndex >= 0 ? [{ method: "index", choice: { index: optionIndex } }] : [])
    ];

    for (const { method, choice } of selections) {
      try {
        await dropdown.selectOption(choice, this.context.timeouts.pageSizeMs);
        this.log.info(`[search-form] Page size ${pageSize} selected by ${method}`);
        return true;
      } catch (selectError) {
        this.log.debug(`[search-form] Page size by ${method} failed: ${errorMessage(selectError)}`);
      }
    }

    for (const candidate of pageSizeOptionCandidates(pageSize)) {
      try {
        const [option] = await this.session.findAll(candidate);
        if (!option) continue;
        await option.click();
        this.log.info(`[search-form] Page size ${pageSize} selected by option click (${candidate.description})`);
        return true;
      } catch (optionError) {
        this.log.debug(`[search-form] Option click ${candidate.description} failed: ${errorMessage(optionError)}`);
      }
    }

    return false;
  }
}

// ---------------------------------------------------------------------------
// Step table
// ---------------------------------------------------------------------------

export interface FormStep {
  name: string;
  criticality: StepCriticality;
  run: (form: SearchForm, configuration: SearchConfiguration) => Promise<StepOutcome>;
}

export const SEARCH_FORM_STEPS: readonly FormStep[] = [
  { name: "open-search-page", criticality: "required", run: (form) => form.openSearchPage() },
  { name: "date-range", criticality: "required", run: (form, configuration) => form.setDateRange(configuration.range) },
  { name: "market", criticality: "optional", run: (form, configuration) => form.selectMarket(configuration.market) },
  {
    name: "disclosure-types",
    criticality: "required",
    run: (form, configuration) => form.selectDisclosureTypes(configuration.disclosureTypes)
  },
  { name: "page-size", criticality: "optional", run: (form, configuration) => form.setPageSize(configuration.pageSize) },
  { name: "search", criticality: "required", run: (form) => form.submitSearch() }
];

export type SearchConfigurationResult =
  | { ok: true; optionalFailures: string[] }
  | { ok: false; failedStep: string; code: ScrapeFailureCode; message: string };

/**
 * Run the step table in order. A failed optional step is recorded and the
 * search continues on portal defaults; a failed required step stops here.
 */
export const applySearchConfiguration = async (
  context: ScrapeContext,
  configuration: SearchConfiguration,
  steps: readonly FormStep[] = SEARCH_FORM_STEPS
): Promise<SearchConfigurationResult> => {
  const form = new SearchForm(context);
  const optionalFailures: string[] = [];

  for (const step of steps) {
    let outcome: StepOutcome;
    try {
      outcome = await step.run(form, configuration);
    } catch (stepError) {
      outcome = failed("SESSION", errorMessage(stepError));
    }

    if (outcome.ok) {
      continue;
    }

    if (step.criticality === "optional") {
      context.log.info(`[search-form] Optional step ${step.name} failed (${outcome.code}); continuing`);
      optionalFailures.push(step.name);
      continue;
    }

    warn(context, `[search-form] Required step ${step.name} failed (${outcome.code}): ${outcome.message}`);
    return { ok: false, failedStep: step.name, code: outcome.code, message: outcome.message };
  }

  return { ok: true, optionalFailures };
};
