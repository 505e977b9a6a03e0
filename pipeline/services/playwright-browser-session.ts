import { mkdirSync } from "node:fs";
import {
  chromium,
  errors,
  type Browser,
  type BrowserContext,
  type LaunchOptions,
  type Locator,
  type Page
} from "playwright";
import { installResourceBlockingRoutes } from "../utils/resource-blocking.js";
import type {
  BrowserSession,
  BrowserSessionFactory,
  LocatorCandidate,
  PageElement,
  SelectOptionChoice,
  WaitOptions
} from "./browser-session.js";

export const toPlaywrightSelector = (target: LocatorCandidate): string => {
  switch (target.strategy) {
    case "css":
      return `css=${target.expression}`;
    case "xpath":
      return `xpath=${target.expression}`;
    case "id":
      return `css=[id="${target.expression}"]`;
    case "name":
      return `css=[name="${target.expression}"]`;
  }
};

class PlaywrightPageElement implements PageElement {
  constructor(private readonly locator: Locator) {}

  async text(): Promise<string> {
    return this.locator.innerText();
  }

  async getAttribute(name: string): Promise<string | null> {
    return this.locator.getAttribute(name);
  }

  async isChecked(): Promise<boolean> {
    return this.locator.isChecked();
  }

  async isEnabled(): Promise<boolean> {
    return this.locator.isEnabled();
  }

  async isVisible(): Promise<boolean> {
    return this.locator.isVisible();
  }

  async scrollIntoView(): Promise<void> {
    await this.locator.scrollIntoViewIfNeeded();
  }

  async click(): Promise<void> {
    await this.locator.evaluate((element: HTMLElement) => element.click());
  }

  async clearAndType(value: string): Promise<void> {
    await this.locator.evaluate((element: HTMLInputElement) => {
      element.value = "";
    });
    await this.locator.fill(value);
  }

  async selectOption(choice: SelectOptionChoice, timeoutMs: number): Promise<void> {
    await this.locator.selectOption(choice, { timeout: timeoutMs });
  }
}

export class PlaywrightBrowserSession implements BrowserSession {
  constructor(private readonly page: Page) {}

  async goto(url: string, timeoutMs: number): Promise<void> {
    await this.page.goto(url, { waitUntil: "domcontentloaded", timeout: timeoutMs });
  }

  currentUrl(): string {
    return this.page.url();
  }

  async content(): Promise<string> {
    return this.page.content();
  }

  async waitFor(target: LocatorCandidate, options: WaitOptions): Promise<PageElement | null> {
    const locator = this.page.locator(toPlaywrightSelector(target)).first();
    try {
      await locator.waitFor({
        state: options.requirement === "present" ? "attached" : "visible",
        timeout: options.timeoutMs
      });
    } catch (waitError) {
      if (waitError instanceof errors.TimeoutError) {
        return null;
      }
      throw waitError;
    }

    if (options.requirement === "clickable" && !(await locator.isEnabled())) {
      return null;
    }

    return new PlaywrightPageElement(locator);
  }

  async findAll(target: LocatorCandidate): Promise<PageElement[]> {
    const locators = await this.page.locator(toPlaywrightSelector(target)).all();
    return locators.map((locator) => new PlaywrightPageElement(locator));
  }

  async screenshot(filePath: string): Promise<void> {
    await this.page.screenshot({ path: filePath, fullPage: true });
  }
}

// ---------------------------------------------------------------------------
// Launch
// ---------------------------------------------------------------------------

export interface ChromiumLauncher {
  launch: (options: LaunchOptions) => Promise<Browser>;
}

export interface PlaywrightSessionOptions {
  headless: boolean;
  downloadDirectory: string;
  blockResources: boolean;
  log: (message: string) => void;
}

const DESKTOP_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

const hideWebDriverFlag = async (context: BrowserContext): Promise<void> => {
  await context.addInitScript(() => {
    Object.defineProperty(navigator, "webdriver", { get: () => undefined });
  });
};

/**
 * Session factory over a Chromium launcher. Pass the `playwright-extra`
 * launcher to get the stealth plugin; the plain `playwright` one is the default.
 */
export const createPlaywrightSessionFactory = (
  options: PlaywrightSessionOptions,
  launcher: ChromiumLauncher = chromium
): BrowserSessionFactory =>
  async () => {
    mkdirSync(options.downloadDirectory, { recursive: true });
    options.log(`[browser] Launching Chromium (headless=${options.headless})`);

    const browser = await launcher.launch({
      headless: options.headless,
      downloadsPath: options.downloadDirectory,
      args: [
        "--no-sandbox",
        "--disable-dev-shm-usage",
        "--disable-gpu",
        "--disable-blink-features=AutomationControlled"
      ]
    });

    try {
      const context = await browser.newContext({
        userAgent: DESKTOP_USER_AGENT,
        locale: "ko-KR",
        timezoneId: "Asia/Seoul",
        viewport: { width: 1920, height: 1080 },
        acceptDownloads: true
      });
      await hideWebDriverFlag(context);
      if (options.blockResources) {
        await installResourceBlockingRoutes(context, options.log);
      }

      const page = await context.newPage();
      return {
        session: new PlaywrightBrowserSession(page),
        cleanup: async () => {
          await context.close();
          await browser.close();
          options.log("[browser] Browser closed");
        }
      };
    } catch (setupError) {
      await browser.close();
      throw setupError;
    }
  };
