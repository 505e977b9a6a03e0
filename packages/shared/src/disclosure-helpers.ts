import type {
  DesignationType,
  DisclosureLink,
  DisclosureTitleAnalysis
} from "./contracts.js";

export const DEFAULT_PORTAL_BASE_URL = "https://kind.krx.co.kr";

// ---------------------------------------------------------------------------
// Title classification
// ---------------------------------------------------------------------------

const REDESIGNATION_KEYWORDS = ["재지정", "재선정", "재대상"];

// Compared against the lower-cased title.
const PREFERRED_STOCK_KEYWORDS = ["우선주", "우선株", "preferred"];

const WARNING_KEYWORD = "투자경고";
const DESIGNATE_KEYWORD = "지정";
const RELEASE_KEYWORD = "해제";

export const classifyDesignationType = (title: string): DesignationType => {
  if (!title.includes(WARNING_KEYWORD)) {
    return "unknown";
  }

  if (title.includes(RELEASE_KEYWORD)) {
    return "cancellation";
  }

  return title.includes(DESIGNATE_KEYWORD) ? "designation" : "other";
};

export const analyzeDisclosureTitle = (title: string): DisclosureTitleAnalysis => {
  const lowerCaseTitle = title.toLowerCase();
  return {
    isRedesignation: REDESIGNATION_KEYWORDS.some((keyword) => title.includes(keyword)),
    isPreferredStock: PREFERRED_STOCK_KEYWORDS.some((keyword) => lowerCaseTitle.includes(keyword)),
    designationType: classifyDesignationType(title)
  };
};

// ---------------------------------------------------------------------------
// Detail-link references
// ---------------------------------------------------------------------------

const VIEWER_CLICK_HANDLER_PATTERN =
  /openDisclsViewer\('([^']*)',\s*'([^']*)',\s*'([^']*)'/;

const VIEWER_HREF_PATTERN =
  /disclsviewer\.do\?method=search&acptno=([^&]+)&docno=([^&]+)&viewerhost=([^&]+)/;

export const buildDisclosureViewerUrl = (
  baseUrl: string,
  accessionNumber: string,
  documentNumber: string,
  viewerHost: string
): string =>
  `${baseUrl}/common/disclsviewer.do?method=search&acptno=${accessionNumber}` +
  `&docno=${documentNumber}&viewerhost=${viewerHost}&viewerport=`;

/**
 * Parse the viewer reference embedded in a title link. The click handler wins
 * when it names the viewer; the href is only consulted otherwise.
 */
export const parseDisclosureLink = (
  onclick: string | null | undefined,
  href: string | null | undefined,
  baseUrl: string = DEFAULT_PORTAL_BASE_URL
): DisclosureLink | null => {
  let match: RegExpMatchArray | null = null;

  if (onclick && onclick.includes("openDisclsViewer")) {
    match = onclick.match(VIEWER_CLICK_HANDLER_PATTERN);
  } else if (href && href.includes("disclsviewer.do")) {
    match = href.match(VIEWER_HREF_PATTERN);
  }

  if (!match) {
    return null;
  }

  const [, accessionNumber = "", documentNumber = "", viewerHost = ""] = match;
  return {
    accessionNumber,
    documentNumber,
    viewerHost,
    url: buildDisclosureViewerUrl(baseUrl, accessionNumber, documentNumber, viewerHost)
  };
};
