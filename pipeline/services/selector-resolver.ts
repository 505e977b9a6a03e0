import { errorMessage, type ScrapeLog } from "../utils/scrape-log.js";
import type {
  BrowserSession,
  ElementRequirement,
  LocatorCandidate,
  PageElement
} from "./browser-session.js";

/**
 * A logical element on the portal and the ordered ways of finding it.
 * Candidates are listed most specific first; the first one that becomes
 * actionable wins.
 */
export interface SelectorTarget {
  name: string;
  requirement: ElementRequirement;
  candidates: readonly LocatorCandidate[];
}

export interface ResolvedElement {
  element: PageElement;
  candidate: LocatorCandidate;
  candidateIndex: number;
}

export type ResolveResult =
  | ({ found: true } & ResolvedElement)
  | {
      found: false;
      target: string;
      attempted: string[];
    };

export interface ResolveOptions {
  timeoutMs: number;
  /** Extra check run on a located element; `false` moves on to the next candidate. */
  accept?: (element: PageElement) => Promise<boolean>;
}

const probeCandidate = async (
  session: BrowserSession,
  target: SelectorTarget,
  candidateIndex: number,
  options: ResolveOptions,
  log: ScrapeLog
): Promise<PageElement | null> => {
  const candidate = target.candidates[candidateIndex];
  if (!candidate) {
    return null;
  }

  const label = `[resolver] ${target.name}: candidate ${candidateIndex + 1} (${candidate.description})`;
  try {
    const element = await session.waitFor(candidate, {
      requirement: target.requirement,
      timeoutMs: options.timeoutMs
    });
    if (!element) {
      log.debug(`${label} not found`);
      return null;
    }

    if (options.accept && !(await options.accept(element))) {
      log.debug(`${label} rejected`);
      return null;
    }

    log.debug(`${label} resolved`);
    return element;
  } catch (probeError) {
    log.debug(`${label} errored: ${errorMessage(probeError)}`);
    return null;
  }
};

/**
 * Evaluate the strategy chain lazily with early exit. Session errors while
 * probing a candidate count as that candidate failing; this never throws.
 */
export const resolveTarget = async (
  session: BrowserSession,
  target: SelectorTarget,
  options: ResolveOptions,
  log: ScrapeLog
): Promise<ResolveResult> => {
  for (const [candidateIndex, candidate] of target.candidates.entries()) {
    const element = await probeCandidate(session, target, candidateIndex, options, log);
    if (element) {
      return { found: true, element, candidate, candidateIndex };
    }
  }

  return {
    found: false,
    target: target.name,
    attempted: target.candidates.map((candidate) => candidate.description)
  };
};

/**
 * Yields every candidate that resolves, in order, so the caller can act on
 * one and fall through to the next when the action does not verify.
 */
export async function* iterateResolvedCandidates(
  session: BrowserSession,
  target: SelectorTarget,
  options: ResolveOptions,
  log: ScrapeLog
): AsyncGenerator<ResolvedElement> {
  for (const [candidateIndex, candidate] of target.candidates.entries()) {
    const element = await probeCandidate(session, target, candidateIndex, options, log);
    if (element) {
      yield { element, candidate, candidateIndex };
    }
  }
}
