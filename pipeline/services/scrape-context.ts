import { captureDebugArtifacts } from "../utils/debug-artifacts.js";
import type { Pacer } from "../utils/pacing.js";
import type { ScrapeLog } from "../utils/scrape-log.js";
import type { BrowserSession } from "./browser-session.js";

/** Bounded element waits, per call site. */
export interface WaitTimeouts {
  navigationMs: number;
  defaultMs: number;
  marketRadioMs: number;
  marketActionTabMs: number;
  checkboxMs: number;
  pageSizeMs: number;
  searchButtonMs: number;
  nextPageMs: number;
}

export const DEFAULT_WAIT_TIMEOUTS: WaitTimeouts = {
  navigationMs: 60_000,
  defaultMs: 30_000,
  marketRadioMs: 10_000,
  marketActionTabMs: 10_000,
  checkboxMs: 15_000,
  pageSizeMs: 10_000,
  searchButtonMs: 10_000,
  nextPageMs: 5_000
};

/**
 * Everything one scrape run shares: the session it owns, its configuration
 * and its sinks for logs, warnings and diagnostics.
 */
export interface ScrapeContext {
  session: BrowserSession;
  baseUrl: string;
  log: ScrapeLog;
  pace: Pacer;
  timeouts: WaitTimeouts;
  warnings: string[];
  debugArtifactDirectory: string | null;
}

export const warn = (context: ScrapeContext, message: string): void => {
  context.warnings.push(message);
  context.log.warn(message);
};

export const captureDiagnostic = async (context: ScrapeContext, label: string): Promise<void> => {
  await captureDebugArtifacts(
    context.session,
    context.debugArtifactDirectory,
    label,
    context.log.warn
  );
};
