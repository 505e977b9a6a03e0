export interface ScrapeLog {
  info: (message: string) => void;
  warn: (message: string) => void;
  debug: (message: string) => void;
}

export const createConsoleScrapeLog = (verbose: boolean): ScrapeLog => ({
  info: (message) => console.log(`  ${message}`),
  warn: (message) => console.warn(`  ⚠ ${message}`),
  debug: verbose ? (message) => console.log(`    ${message}`) : () => {}
});

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
