// ---------------------------------------------------------------------------
// Element location candidates
// ---------------------------------------------------------------------------

export type LocatorStrategy = "css" | "xpath" | "id" | "name";

export interface LocatorCandidate {
  strategy: LocatorStrategy;
  expression: string;
  description: string;
}

const candidate = (strategy: LocatorStrategy, expression: string): LocatorCandidate => ({
  strategy,
  expression,
  description: `${strategy}=${expression}`
});

export const css = (expression: string): LocatorCandidate => candidate("css", expression);
export const xpath = (expression: string): LocatorCandidate => candidate("xpath", expression);
export const byId = (expression: string): LocatorCandidate => candidate("id", expression);
export const byName = (expression: string): LocatorCandidate => candidate("name", expression);

/**
 * - present: attached to the DOM.
 * - clickable: attached, visible and enabled.
 */
export type ElementRequirement = "present" | "clickable";

export interface WaitOptions {
  requirement: ElementRequirement;
  timeoutMs: number;
}

export type SelectOptionChoice = { value: string } | { label: string } | { index: number };

// ---------------------------------------------------------------------------
// Capability interfaces
// ---------------------------------------------------------------------------

export interface PageElement {
  /** Rendered text, untrimmed. */
  text: () => Promise<string>;
  getAttribute: (name: string) => Promise<string | null>;
  isChecked: () => Promise<boolean>;
  isEnabled: () => Promise<boolean>;
  isVisible: () => Promise<boolean>;
  scrollIntoView: () => Promise<void>;
  /** Script-driven `element.click()`, bypassing pointer hit-testing. */
  click: () => Promise<void>;
  clearAndType: (value: string) => Promise<void>;
  selectOption: (choice: SelectOptionChoice, timeoutMs: number) => Promise<void>;
}

export interface BrowserSession {
  goto: (url: string, timeoutMs: number) => Promise<void>;
  currentUrl: () => string;
  content: () => Promise<string>;
  /** Resolves to `null` when the element does not meet the requirement in time. */
  waitFor: (target: LocatorCandidate, options: WaitOptions) => Promise<PageElement | null>;
  findAll: (target: LocatorCandidate) => Promise<PageElement[]>;
  screenshot: (filePath: string) => Promise<void>;
}

export interface BrowserSessionFactoryResult {
  session: BrowserSession;
  cleanup: () => Promise<void>;
}

export type BrowserSessionFactory = () => Promise<BrowserSessionFactoryResult>;
