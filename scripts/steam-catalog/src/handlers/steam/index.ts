import type { Logger } from "pino";
import { FetchError } from "../../errors";
import { logProgress, logSection } from "../../utils/logger";
import type { RateLimiter } from "../../utils/rate-limiter";
import { appendGameDetailRecord, filterPendingAppIds, loadFetchedAppIds, outputPathFor } from "../output";
import { isRecord } from "../sources/ids";
import type { CategoryAppIds } from "../sources";
import { createLookupUrl, lookupSteamGame } from "./api";
import { mapSteamAppToGameDetailRecord } from "./mappers";
import type { GameDetailRecord, StoreLocale } from "./types";

export type { GameDetailRecord, StoreLocale } from "./types";

export type FetchGameDetail = (appId: number) => Promise<GameDetailRecord>;

export interface ProcessCategoryOptions {
  outputDir: string;

  /**
   * The day the output file is named after. Resuming only works within the same day's file.
   */
  date: Date;

  limiter: RateLimiter;
  fetchDetail: FetchGameDetail;
}

export interface CategoryResult {
  category: string;
  outputPath: string;

  requested: number;
  alreadyFetched: number;
  written: number;
  failed: number[];
}

/**
 * Looks up a single app on the Steam Store API.
 *
 * @throws {FetchError} when the request fails, the response is malformed, or the app is unavailable (delisted, region
 *   locked, or never existed)
 */
export async function fetchGameDetail(appId: number, locale: StoreLocale): Promise<GameDetailRecord> {
  const lookupUrl = createLookupUrl(appId, locale);
  const appData = await lookupSteamGame(lookupUrl);

  const entry = isRecord(appData) ? appData[appId.toString()] : undefined;
  if (!isRecord(entry)) {
    throw new FetchError(`response has no entry for app ID ${appId}`);
  }

  if (entry.success !== true) {
    throw new FetchError(`app ID ${appId} is unavailable on the store`);
  }

  if (!isRecord(entry.data)) {
    throw new FetchError(`response for app ID ${appId} has no data`);
  }

  return mapSteamAppToGameDetailRecord(appId, entry.data);
}

export function createGameDetailFetcher(locale: StoreLocale): FetchGameDetail {
  return (appId) => fetchGameDetail(appId, locale);
}

/**
 * Fetches the details of every app ID in a category that isn't already in today's output file.
 *
 * ## How this works
 *
 * 1. The category's output file for {@link ProcessCategoryOptions.date} is read back, and any app ID already in it is
 *    skipped. This is what makes re-running after an interruption pick up where it stopped.
 * 2. Every remaining app ID is fetched one at a time, waiting on the rate limiter before each request.
 * 3. Each record is appended (and synced) before the next request, so at most the in-flight request is lost.
 *
 * A {@link FetchError} only skips that app ID, which is not written and is retried on the next run. Any other error,
 * such as failing to write the output file, aborts the category.
 */
export async function processCategory(
  category: string,
  appIds: number[],
  options: ProcessCategoryOptions,
  logger: Logger,
): Promise<CategoryResult> {
  const outputPath = outputPathFor(options.outputDir, category, options.date);
  const fetched = await loadFetchedAppIds(outputPath, logger);
  const pending = filterPendingAppIds(appIds, fetched);

  const result: CategoryResult = {
    category,
    outputPath,
    requested: appIds.length,
    alreadyFetched: appIds.length - pending.length,
    written: 0,
    failed: [],
  };

  if (result.alreadyFetched > 0) {
    logger.info(
      "resuming %s: %d of %d app IDs already in %s",
      category,
      result.alreadyFetched,
      appIds.length,
      outputPath,
    );
  }

  logger.info("fetching %d app IDs for %s...", pending.length, category);

  for (const [index, appId] of pending.entries()) {
    logProgress(index + 1, pending.length, "game", logger);

    await options.limiter.wait();

    logger.debug("fetching details for app ID %d...", appId);

    let record: GameDetailRecord;
    try {
      record = await options.fetchDetail(appId);
    } catch (err) {
      if (!(err instanceof FetchError)) {
        throw err;
      }

      logger.warn("skipping app ID %d: %s", appId, err.message);
      result.failed.push(appId);

      continue;
    }

    await appendGameDetailRecord(outputPath, record);
    result.written++;

    logger.debug("wrote app ID %d (%s) to %s", appId, record.name, outputPath);
  }

  if (result.failed.length > 0) {
    logger.warn("could not fetch %d app IDs for %s", result.failed.length, category);
    result.failed.forEach((appId) => {
      logger.warn(` - app ID ${appId}`);
    });
  }

  logger.info(
    "completed %s: %d written, %d already present, %d failed",
    category,
    result.written,
    result.alreadyFetched,
    result.failed.length,
  );

  return result;
}

/**
 * Runs {@link processCategory} for every category in order. Categories are independent; each has its own file.
 */
export async function processCategories(
  categories: CategoryAppIds,
  options: ProcessCategoryOptions,
  logger: Logger,
): Promise<CategoryResult[]> {
  const results: CategoryResult[] = [];

  let categoryIndex = 0;
  for (const [category, appIds] of categories) {
    categoryIndex++;

    logSection(`PROCESSING CATEGORY: ${category} (${categoryIndex} of ${categories.size})`, logger);

    results.push(await processCategory(category, appIds, options, logger));
  }

  return results;
}
