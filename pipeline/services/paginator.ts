import { isPositiveIntegerText, normalizeWhitespace } from "../../packages/shared/src/text-utils.js";
import { errorMessage } from "../utils/scrape-log.js";
import type { PageElement } from "./browser-session.js";
import { CURRENT_PAGE_MARKERS, PAGE_LINKS, nextPageTarget } from "./portal-selectors.js";
import { captureDiagnostic, type ScrapeContext } from "./scrape-context.js";
import { iterateResolvedCandidates } from "./selector-resolver.js";

const URL_PAGE_PATTERN = /page(?:[Nn]o?)?=(\d+)/;
const GO_PAGE_PATTERN = /goPage\((\d+)\)/;

export const parsePageNumberFromUrl = (url: string): number | null => {
  const match = url.match(URL_PAGE_PATTERN);
  return match?.[1] ? Number(match[1]) : null;
};

/**
 * Target page of a pagination link: its `goPage(n)` handler, a `page=n` /
 * `pageNo=n` query in its href, or a bare page number as its text.
 */
export const parseLinkTargetPage = (
  onclick: string | null,
  href: string | null,
  text: string
): number | null => {
  const handlerMatch = onclick?.match(GO_PAGE_PATTERN);
  if (handlerMatch?.[1]) return Number(handlerMatch[1]);

  if (href && href.includes("page")) {
    const hrefPage = parsePageNumberFromUrl(href);
    if (hrefPage !== null) return hrefPage;
  }

  const label = normalizeWhitespace(text);
  return isPositiveIntegerText(label) ? Number(label) : null;
};

/**
 * Owns the page cursor of one result listing. The cursor is never stored:
 * it is re-derived from the page after every activation, and an advance only
 * counts when the derived number strictly increases.
 */
export class Paginator {
  constructor(private readonly context: ScrapeContext) {}

  async getCurrentPageNumber(): Promise<number> {
    const { session, log } = this.context;

    for (const marker of CURRENT_PAGE_MARKERS) {
      try {
        for (const element of await session.findAll(marker)) {
          const label = normalizeWhitespace(await element.text());
          if (isPositiveIntegerText(label)) {
            return Number(label);
          }
        }
      } catch (markerError) {
        log.debug(`[paginator] Current-page marker ${marker.description} failed: ${errorMessage(markerError)}`);
      }
    }

    try {
      const urlPage = parsePageNumberFromUrl(session.currentUrl());
      if (urlPage !== null) return urlPage;
    } catch (urlError) {
      log.debug(`[paginator] Could not read the current URL: ${errorMessage(urlError)}`);
    }

    return 1;
  }

  /** Moves to the next page. False when the listing is exhausted. */
  async advance(): Promise<boolean> {
    const { log } = this.context;
    try {
      const currentPage = await this.getCurrentPageNumber();
      const targetPage = currentPage + 1;
      log.info(`[paginator] Page ${currentPage}; looking for page ${targetPage}`);

      if (await this.advanceByCandidates(currentPage, targetPage)) {
        return true;
      }

      log.debug("[paginator] Trying page links directly");
      if (await this.advanceByPageLinks(currentPage, targetPage)) {
        return true;
      }

      log.info("[paginator] No further pages");
      return false;
    } catch (paginationError) {
      log.warn(`[paginator] Pagination failed: ${errorMessage(paginationError)}`);
      await captureDiagnostic(this.context, "pagination_error");
      return false;
    }
  }

  // -------------------------------------------------------------------------

  private async activateAndVerify(element: PageElement, currentPage: number): Promise<number | null> {
    await element.click();
    await this.context.pace("afterPageClickMs");
    const newPage = await this.getCurrentPageNumber();
    return newPage > currentPage ? newPage : null;
  }

  private async advanceByCandidates(currentPage: number, targetPage: number): Promise<boolean> {
    const { session, log, timeouts } = this.context;
    const candidates = iterateResolvedCandidates(
      session,
      nextPageTarget(targetPage),
      {
        timeoutMs: timeouts.nextPageMs,
        accept: async (element) => (await element.isEnabled()) && (await element.isVisible())
      },
      log
    );

    for await (const { element, candidateIndex } of candidates) {
      try {
        await element.scrollIntoView();
        await this.context.pace("afterScrollMs");
        const newPage = await this.activateAndVerify(element, currentPage);
        if (newPage !== null) {
          log.info(`[paginator] Moved to page ${newPage} (candidate ${candidateIndex + 1})`);
          return true;
        }
        log.debug(`[paginator] Page number unchanged after candidate ${candidateIndex + 1}`);
      } catch (candidateError) {
        log.debug(`[paginator] Candidate ${candidateIndex + 1} failed: ${errorMessage(candidateError)}`);
      }
    }
    return false;
  }

  private async advanceByPageLinks(currentPage: number, targetPage: number): Promise<boolean> {
    const { session, log } = this.context;

    for (const link of await session.findAll(PAGE_LINKS)) {
      try {
        const linkPage = parseLinkTargetPage(
          await link.getAttribute("onclick"),
          await link.getAttribute("href"),
          await link.text()
        );
        if (linkPage !== targetPage) continue;

        const newPage = await this.activateAndVerify(link, currentPage);
        if (newPage !== null) {
          log.info(`[paginator] Moved to page ${newPage} (page link)`);
          return true;
        }
      } catch (linkError) {
        log.debug(`[paginator] Page link failed: ${errorMessage(linkError)}`);
      }
    }
    return false;
  }
}
