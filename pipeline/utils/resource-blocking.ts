import type { BrowserContext } from "playwright";
import type { LogFn } from "./run-log.js";

/**
 * Resource types never needed to read profile text. Scripts and XHR stay
 * allowed because the pages render client-side.
 */
const BLOCKED_RESOURCE_TYPES = new Set(["image", "font", "media"]);

/**
 * Abort image, font and media requests for every page in `context`.
 */
export const installResourceBlockingRoutes = async (
  context: BrowserContext,
  log?: LogFn
): Promise<void> => {
  log?.("[resource-blocking] Installing route filters (images, fonts, media)");

  await context.route("**/*", (route) => {
    if (BLOCKED_RESOURCE_TYPES.has(route.request().resourceType())) {
      return route.abort();
    }

    return route.continue();
  });
};
