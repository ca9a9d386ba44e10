import type { Logger } from "pino";
import type { CatalogEntry } from "./output";
import type { IdCollection } from "./sources";
import { NOT_AVAILABLE } from "./steam/mappers";

export interface AutoCatOptions {
  genrePrefix: string;
  yearPrefix: string;
  /**
   * Genres taken per game, in the store's order. 0 takes them all.
   */
  maxGenres: number;
  ignoredGenres: readonly string[];
}

export const DEFAULT_AUTOCAT_OPTIONS: AutoCatOptions = {
  genrePrefix: "类型-",
  yearPrefix: "年份-",
  maxGenres: 3,
  ignoredGenres: [],
};

const RELEASE_YEAR_PATTERN = /\b(?:19|20)\d{2}\b/;

/**
 * Finds the year in a store release date, whatever the locale wrote it as (`Jul 9, 2013`, `2013 年 7 月 9 日`).
 */
export function releaseYearOf(releaseDate: string): number | undefined {
  const match = releaseDate.match(RELEASE_YEAR_PATTERN);

  return match ? Number(match[0]) : undefined;
}

export function genresOf(genre: string): string[] {
  return genre
    .split(/[,，]/)
    .map((value) => value.trim())
    .filter((value) => value.length > 0 && value !== NOT_AVAILABLE);
}

/**
 * Groups fetched games into one collection per genre and one per release year.
 *
 * Genre collections come first, in the order the genres were first seen, followed by year collections from oldest to
 * newest. IDs within a collection are sorted ascending.
 */
export function buildAutoCollections(
  entries: Iterable<CatalogEntry>,
  options: AutoCatOptions,
  logger: Logger,
): IdCollection[] {
  const ignored = new Set(options.ignoredGenres.map((genre) => genre.toLowerCase()));

  const byGenre = new Map<string, Set<number>>();
  const byYear = new Map<number, Set<number>>();
  let uncategorized = 0;

  for (const entry of entries) {
    let genres = genresOf(entry.genre).filter((genre) => !ignored.has(genre.toLowerCase()));
    if (options.maxGenres > 0) {
      genres = genres.slice(0, options.maxGenres);
    }

    genres.forEach((genre) => addTo(byGenre, genre, entry.appId));

    const year = releaseYearOf(entry.releaseDate);
    if (year !== undefined) {
      addTo(byYear, year, entry.appId);
    }

    if (genres.length === 0 && year === undefined) {
      uncategorized++;
    }
  }

  if (uncategorized > 0) {
    logger.warn("%d games have neither a genre nor a release year", uncategorized);
  }

  return [
    ...[...byGenre].map(([genre, appIds]) => toCollection(options.genrePrefix + genre, appIds)),
    ...[...byYear]
      .sort(([a], [b]) => a - b)
      .map(([year, appIds]) => toCollection(options.yearPrefix + year.toString(), appIds)),
  ];
}

function addTo<K>(groups: Map<K, Set<number>>, key: K, appId: number) {
  const group = groups.get(key);
  if (group) {
    group.add(appId);
  } else {
    groups.set(key, new Set([appId]));
  }
}

function toCollection(name: string, appIds: Set<number>): IdCollection {
  return { name, appIds: [...appIds].sort((a, b) => a - b) };
}
