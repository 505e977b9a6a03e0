import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { BrowserSession } from "../services/browser-session.js";
import { errorMessage } from "./scrape-log.js";

const sanitizeLabel = (label: string): string =>
  label.replace(/[^a-zA-Z0-9가-힣_-]/g, "_").slice(0, 80);

/**
 * Save a full-page screenshot and the current HTML under a timestamped name.
 * Returns the saved paths; failures are logged and never propagate.
 */
export const captureDebugArtifacts = async (
  session: BrowserSession,
  artifactDirectory: string | null,
  label: string,
  log: (message: string) => void,
  now: () => Date = () => new Date()
): Promise<string[]> => {
  if (!artifactDirectory) return [];

  const savedPaths: string[] = [];
  try {
    if (!existsSync(artifactDirectory)) {
      mkdirSync(artifactDirectory, { recursive: true });
    }

    const timestamp = now().toISOString().replace(/[:.]/g, "-");
    const baseFilename = `${timestamp}_${sanitizeLabel(label)}`;

    const screenshotPath = join(artifactDirectory, `${baseFilename}.png`);
    await session.screenshot(screenshotPath);
    savedPaths.push(screenshotPath);
    log(`[debug-artifact] Screenshot saved: ${screenshotPath}`);

    const htmlPath = join(artifactDirectory, `${baseFilename}.html`);
    writeFileSync(htmlPath, await session.content(), "utf-8");
    savedPaths.push(htmlPath);
    log(`[debug-artifact] HTML saved: ${htmlPath}`);
  } catch (artifactError) {
    log(`[debug-artifact] Failed to capture debug artifacts: ${errorMessage(artifactError)}`);
  }

  return savedPaths;
};
