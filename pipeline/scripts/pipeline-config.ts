import { chromium } from "playwright-extra";
import StealthPlugin from "puppeteer-extra-plugin-stealth";
import "dotenv/config";
import { DEFAULT_PORTAL_BASE_URL } from "../../packages/shared/src/disclosure-helpers.js";
import type { BrowserSessionFactory } from "../services/browser-session.js";
import { createPlaywrightSessionFactory } from "../services/playwright-browser-session.js";
import {
  DEFAULT_DEBUG_ARTIFACT_DIRECTORY,
  DEFAULT_OUTPUT_DIRECTORY
} from "../utils/default-output-paths.js";
import { DEFAULT_PACING, scalePacing } from "../utils/pacing.js";

// ---------------------------------------------------------------------------
// playwright-extra stealth plugin workaround
// ---------------------------------------------------------------------------
process.on("unhandledRejection", (reason: unknown) => {
  const message = reason instanceof Error ? reason.message : String(reason);
  if (message.includes("Target page, context or browser has been closed")) {
    console.warn(
      "[playwright-extra] Suppressed CDP session race (page already closed)."
    );
    return;
  }
  throw reason;
});

chromium.use(StealthPlugin());

// ---------------------------------------------------------------------------
// Environment configuration
// ---------------------------------------------------------------------------

const parseOptionalPositiveInteger = (value: string | undefined): number | null => {
  if (!value) return null;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : null;
};

export const KIND_BASE_URL = process.env.KIND_BASE_URL ?? DEFAULT_PORTAL_BASE_URL;

export const HEADLESS = process.env.HEADLESS !== "false";

export const OUTPUT_DIRECTORY = process.env.OUTPUT_DIR ?? DEFAULT_OUTPUT_DIRECTORY;

export const SCRAPE_DEBUG_ARTIFACT_DIRECTORY =
  process.env.SCRAPE_DEBUG_ARTIFACT_DIR ?? DEFAULT_DEBUG_ARTIFACT_DIRECTORY;

export const BROWSER_USE_STEALTH = process.env.BROWSER_USE_STEALTH !== "false";

export const MAX_PAGES_PER_PERIOD = parseOptionalPositiveInteger(process.env.MAX_PAGES_PER_PERIOD);

const pacingScale = Number(process.env.PACING_SCALE ?? "1");
export const PACING_SCALE = Number.isFinite(pacingScale) && pacingScale >= 0 ? pacingScale : 1;

export const PACING = scalePacing(DEFAULT_PACING, PACING_SCALE);

// ---------------------------------------------------------------------------
// Browser session factory
// ---------------------------------------------------------------------------

export const createBrowserSessionFactory = (
  log: (message: string) => void
): BrowserSessionFactory => {
  const options = {
    headless: HEADLESS,
    downloadDirectory: OUTPUT_DIRECTORY,
    blockResources: true,
    log
  };

  if (!BROWSER_USE_STEALTH) {
    return createPlaywrightSessionFactory(options);
  }

  log("[browser] Using playwright-extra with the stealth plugin");
  return createPlaywrightSessionFactory(options, chromium);
};
