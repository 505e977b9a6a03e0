import type { BrowserContext } from "playwright";

// Stylesheets stay: visibility checks on form controls depend on layout.
const BLOCKED_RESOURCE_TYPES: ReadonlySet<string> = new Set(["image", "font", "media"]);

/** Analytics and ad hosts the portal pages pull in. */
const BLOCKED_HOSTS = [
  "googletagmanager.com",
  "google-analytics.com",
  "doubleclick.net",
  "fonts.gstatic.com",
  "fonts.googleapis.com"
];

const hostOf = (url: string): string | null => {
  try {
    return new URL(url).hostname;
  } catch {
    return null;
  }
};

export const shouldBlockRequest = (resourceType: string, url: string): boolean => {
  if (BLOCKED_RESOURCE_TYPES.has(resourceType)) return true;
  const host = hostOf(url);
  return host !== null && BLOCKED_HOSTS.some((blocked) => host === blocked || host.endsWith(`.${blocked}`));
};

/**
 * Route filter for a Playwright BrowserContext: documents, scripts,
 * stylesheets and XHR from the portal pass; everything matched by
 * {@link shouldBlockRequest} is aborted.
 */
export const installResourceBlockingRoutes = async (
  context: BrowserContext,
  log?: (message: string) => void
): Promise<void> => {
  log?.("[resource-blocking] Blocking images, fonts, media and analytics hosts");

  await context.route("**/*", (route) => {
    const request = route.request();
    return shouldBlockRequest(request.resourceType(), request.url()) ? route.abort() : route.continue();
  });
};
