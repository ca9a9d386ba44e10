import type { Logger } from "pino";
import type { SteamDbStrategy } from "../../config";
import { FetchError } from "../../errors";
import { logProgress } from "../../utils/logger";
import type { RateLimiter } from "../../utils/rate-limiter";
import type { IdCollection } from "../sources";
import { CookieSteamDbFetcher } from "./cookie-strategy";
import type { PublisherUrls } from "./publishers";
import type { CookieStore, SteamDbPageFetcher } from "./types";

export { loadCookies, parseCookies } from "./cookies";
export { loadPublishers, parsePublishers } from "./publishers";
export type { PublisherUrls } from "./publishers";
export type { CookieStore, SteamDbPageFetcher } from "./types";

/**
 * Creates the fetcher for the configured strategy. There is no switching between strategies mid-run; a blocked cookie
 * run is rerun with the browser strategy.
 *
 * The browser strategy is imported lazily so cookie runs never load Playwright.
 */
export async function createSteamDbFetcher(
  strategy: SteamDbStrategy,
  cookies: CookieStore,
  logger: Logger,
): Promise<SteamDbPageFetcher> {
  switch (strategy) {
    case "cookie":
      return new CookieSteamDbFetcher(cookies, logger);
    case "browser": {
      const { BrowserSteamDbFetcher } = await import("./browser-strategy");

      return new BrowserSteamDbFetcher(cookies, logger);
    }
  }
}

export interface ScrapePublishersOptions {
  limiter: RateLimiter;
}

/**
 * Scrapes every publisher's listing pages into one collection per publisher, with IDs sorted ascending.
 *
 * A page that fails to load is skipped. An {@link AuthError} is not caught: once SteamDB blocks the strategy, every
 * remaining page would be blocked too.
 */
export async function scrapePublisherCollections(
  publishers: PublisherUrls,
  fetcher: SteamDbPageFetcher,
  options: ScrapePublishersOptions,
  logger: Logger,
): Promise<IdCollection[]> {
  const totalUrls = [...publishers.values()].reduce((total, urls) => total + urls.length, 0);
  let processedUrls = 0;

  const collections: IdCollection[] = [];

  for (const [publisher, urls] of publishers) {
    const appIds = new Set<number>();

    for (const url of urls) {
      processedUrls++;
      logProgress(processedUrls, totalUrls, "SteamDB page", logger);

      await options.limiter.wait();

      try {
        (await fetcher.fetchAppIds(url)).forEach((appId) => appIds.add(appId));
      } catch (err) {
        if (!(err instanceof FetchError)) {
          throw err;
        }

        logger.error("skipping %s for %s: %s", url, publisher, err.message);
      }
    }

    logger.info("publisher %s: %d app IDs", publisher, appIds.size);

    if (appIds.size > 0) {
      collections.push({ name: publisher, appIds: [...appIds].sort((a, b) => a - b) });
    }
  }

  return collections;
}
