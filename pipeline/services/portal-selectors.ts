import type {
  DisclosureTypeFilter,
  MarketFilter
} from "../../packages/shared/src/contracts.js";
import { byId, byName, css, xpath, type LocatorCandidate } from "./browser-session.js";
import type { SelectorTarget } from "./selector-resolver.js";

// Candidate lists for the KIND detailed-search page. Within each list the
// order is the empirical priority: exact ids first, structural fallbacks last.

export const SEARCH_PAGE_PATH = "/disclosure/details.do?method=searchDetailsMain";

export const SEARCH_FORM_MARKERS: SelectorTarget = {
  name: "search form",
  requirement: "present",
  candidates: [
    xpath(
      "//*[@id='searchForm'] | //*[contains(@class, 'search_02')] | //*[@name='fromDate'] | //div[@class='sch_con']"
    )
  ]
};

const dateInputCandidates = (name: string, placeholder: string): LocatorCandidate[] => [
  byName(name),
  byId(name),
  xpath(`//input[@name='${name}']`),
  xpath(`//input[@placeholder='YYYY.MM.DD' or @placeholder='${placeholder}']`)
];

export const START_DATE_INPUT: SelectorTarget = {
  name: "start date input",
  requirement: "present",
  candidates: dateInputCandidates("fromDate", "시작일")
};

export const END_DATE_INPUT: SelectorTarget = {
  name: "end date input",
  requirement: "present",
  candidates: dateInputCandidates("toDate", "종료일")
};

const radioCandidates = (id: string): LocatorCandidate[] => [
  css(`#${id}`),
  xpath(`//*[@id='${id}']`),
  byId(id),
  xpath(`//input[@id='${id}']`)
];

export const MARKET_RADIOS: Record<Exclude<MarketFilter, "all">, SelectorTarget> = {
  "main-board": {
    name: "main-board market radio",
    requirement: "clickable",
    candidates: radioCandidates("rWertpapier")
  },
  "growth-board": {
    name: "growth-board market radio",
    requirement: "clickable",
    candidates: radioCandidates("rKosdaq")
  }
};

export const MARKET_ACTION_TAB: SelectorTarget = {
  name: "market-action tab",
  requirement: "clickable",
  candidates: [
    byId("dsclsType02"),
    xpath("//*[@id='dsclsType02']"),
    xpath("//a[@title='시장조치']"),
    xpath("//a[contains(@onclick, 'fnDisclosureType') and contains(@onclick, '02')]"),
    xpath("//li[contains(@class, 'tab')]/a[contains(text(), '시장조치')]")
  ]
};

export const MARKET_ACTION_CHECKBOXES = xpath(
  "//div[@id='dsclsLayer02']//input[@type='checkbox'] | //div[contains(@class, 'market')]//input[@type='checkbox']"
);

export const ALL_CHECKBOXES = xpath("//input[@type='checkbox']");

export interface DisclosureTypeDefinition {
  label: string;
  checkbox: SelectorTarget;
}

const labelledCheckboxCandidates = (label: string): LocatorCandidate[] => [
  xpath(`//label[contains(text(), '${label}')]/preceding-sibling::input`),
  xpath(`//label[contains(text(), '${label}')]/..//input[@type='checkbox']`),
  xpath(`//input[@type='checkbox' and following-sibling::label[contains(text(), '${label}')]]`)
];

export const DISCLOSURE_TYPES: Record<DisclosureTypeFilter, DisclosureTypeDefinition> = {
  "investment-warning": {
    label: "투자경고종목",
    checkbox: {
      name: "투자경고종목 checkbox",
      requirement: "clickable",
      candidates: [
        byId("dsclsLayer02_33"),
        xpath("//*[@id='dsclsLayer02_33']"),
        xpath("//input[@value='0313']"),
        ...labelledCheckboxCandidates("투자경고종목")
      ]
    }
  },
  "unfaithful-disclosure": {
    label: "불성실공시",
    checkbox: {
      name: "불성실공시 checkbox",
      requirement: "clickable",
      candidates: [xpath("//input[@value='0314']"), ...labelledCheckboxCandidates("불성실공시")]
    }
  },
  "listing-management": {
    label: "상장관리종목",
    checkbox: {
      name: "상장관리종목 checkbox",
      requirement: "clickable",
      candidates: [xpath("//input[@value='0315']"), ...labelledCheckboxCandidates("상장관리종목")]
    }
  }
};

export const PAGE_SIZE_DROPDOWN: SelectorTarget = {
  name: "page-size dropdown",
  requirement: "clickable",
  candidates: [
    css("#currentPageSize"),
    xpath("//*[@id='currentPageSize']"),
    byId("currentPageSize"),
    xpath("//select[@id='currentPageSize']")
  ]
};

/** Options of the page-size dropdown, in document order. */
export const PAGE_SIZE_CHOICES = [10, 20, 50, 100] as const;

export const pageSizeOptionCandidates = (pageSize: number): LocatorCandidate[] => {
  const position = PAGE_SIZE_CHOICES.findIndex((choice) => choice === pageSize) + 1;
  const positional = position > 0
    ? [
        css(`#currentPageSize > option:nth-child(${position})`),
        xpath(`//*[@id='currentPageSize']/option[${position}]`)
      ]
    : [];

  return [
    ...positional,
    xpath(`//option[@value='${pageSize}']`),
    xpath(`//option[text()='${pageSize}']`),
    xpath(`//option[contains(text(), '${pageSize}')]`)
  ];
};

export const SEARCH_BUTTON: SelectorTarget = {
  name: "search button",
  requirement: "clickable",
  candidates: [
    css("#searchForm > section.search-group.type-00 > div > div.btn-group.type-bt > a.btn-sprite.type-00.vmiddle.search-btn"),
    xpath("//*[@id='searchForm']/section[1]/div/div[3]/a[1]"),
    css(".search-btn"),
    css("a.btn-sprite.type-00.search-btn"),
    css(".btn-group.type-bt .search-btn"),
    xpath("//a[contains(@class, 'search-btn')]"),
    xpath("//button[contains(text(), '검색') or contains(@value, '검색')]"),
    xpath("//a[contains(text(), '검색') or contains(@title, '검색')]"),
    xpath("//input[@value='검색' or @title='검색']"),
    css(".btn_search"),
    xpath("//a[contains(@onclick, 'searchContents') or contains(@onclick, 'search')]"),
    xpath("//button[@type='submit']"),
    xpath("//div[@class='btn_area']//a[contains(text(), '검색')]")
  ]
};

export const SEARCH_RESULT_MARKERS: SelectorTarget = {
  name: "search results",
  requirement: "present",
  candidates: [
    xpath(
      "//*[contains(@class, 'list_content')] | //table[contains(@class, 'list')] | //tr[td] | //div[@class='result'] | //tbody//tr"
    )
  ]
};

// ---------------------------------------------------------------------------
// Pagination
// ---------------------------------------------------------------------------

export const CURRENT_PAGE_MARKERS: readonly LocatorCandidate[] = [
  xpath("//a[contains(@class, 'current') or contains(@class, 'on') or contains(@class, 'active')]"),
  xpath("//span[contains(@class, 'current') or contains(@class, 'on') or contains(@class, 'active')]"),
  xpath("//strong[contains(@class, 'current') or contains(@class, 'on')]"),
  xpath("//li[contains(@class, 'on') or contains(@class, 'current')]//a"),
  xpath("//div[@class='paging']//strong"),
  xpath("//div[contains(@class, 'page')]//strong")
];

export const nextPageTarget = (targetPage: number): SelectorTarget => ({
  name: `page ${targetPage} control`,
  requirement: "clickable",
  candidates: [
    xpath(`//a[text()='${targetPage}' and not(contains(@class, 'disabled'))]`),
    xpath("//a[contains(@onclick, 'goPage') and contains(text(), '다음')]"),
    xpath("//a[contains(@class, 'next') and not(contains(@class, 'disabled'))]"),
    xpath(`//a[contains(@onclick, 'goPage(${targetPage})')]`),
    xpath("//a[contains(@title, '다음')]"),
    xpath("//button[contains(text(), '다음')]"),
    xpath(`//a[@href and contains(@href, 'page=${targetPage}')]`)
  ]
});

export const PAGE_LINKS = xpath("//a[contains(@onclick, 'goPage') or @href]");
