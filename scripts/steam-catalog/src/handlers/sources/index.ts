import { readFile } from "node:fs/promises";
import { basename, extname } from "node:path";
import type { Logger } from "pino";
import { ParseError } from "../../errors";
import { parseAppIdsCsv } from "./csv";
import { parseCollectionsJson } from "./json";
import { uniqueAppIds } from "./ids";

export type { IdCollection } from "./json";

/**
 * Category name to the ordered, deduplicated app IDs to fetch for it.
 */
export type CategoryAppIds = Map<string, number[]>;

/**
 * Reads a single JSON or CSV ID source. CSV files produce a single category named after the file.
 *
 * @throws {ParseError} when the file is missing, has an unsupported extension, or cannot be parsed
 */
export async function readIdSourceFile(path: string, logger: Logger): Promise<CategoryAppIds> {
  const extension = extname(path).toLowerCase();
  if (extension !== ".json" && extension !== ".csv") {
    throw new ParseError(`unsupported ID source type "${extension || "(none)"}", expected .json or .csv`, path);
  }

  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err) {
    throw new ParseError(`could not read file: ${String(err)}`, path, { cause: err });
  }

  const categories: CategoryAppIds = new Map();

  if (extension === ".csv") {
    categories.set(basename(path, extname(path)), parseAppIdsCsv(content, path, logger));

    return categories;
  }

  for (const collection of parseCollectionsJson(content, path, logger)) {
    mergeInto(categories, collection.name, collection.appIds);
  }

  return categories;
}

/**
 * Reads every ID source, merging categories that share a name. Unreadable files are reported and skipped.
 *
 * @returns the merged categories, in the order they were first seen
 */
export async function readIdSources(paths: string[], logger: Logger): Promise<CategoryAppIds> {
  const categories: CategoryAppIds = new Map();

  for (const path of paths) {
    try {
      const fileCategories = await readIdSourceFile(path, logger);

      fileCategories.forEach((appIds, name) => mergeInto(categories, name, appIds));

      logger.info(
        "read %d categories (%d app IDs) from %s",
        fileCategories.size,
        [...fileCategories.values()].reduce((total, appIds) => total + appIds.length, 0),
        path,
      );
    } catch (err) {
      if (!(err instanceof ParseError)) {
        throw err;
      }

      logger.error("skipping ID source %s: %s", err.path, err.message);
    }
  }

  return categories;
}

function mergeInto(categories: CategoryAppIds, name: string, appIds: number[]) {
  const existing = categories.get(name) ?? [];

  categories.set(name, uniqueAppIds([...existing, ...appIds]));
}
