import type { Logger } from "pino";
import { ParseError } from "../../errors";
import { coerceAppId, isRecord, uniqueAppIds } from "./ids";

export interface IdCollection {
  name: string;
  appIds: number[];
}

/**
 * Parses the collections out of a JSON ID source.
 *
 * ## Accepted shapes
 *
 * 1. `{ "collections": [{ "name": "Indie", "added": [10, 20] }] }`, or the same array at the top level.
 * 2. A Steam cloud-storage namespace dump, i.e. `[["user-collections.uc-…", { "value": "{\"name\": …}" }], …]`. Only
 *    entries whose decoded value carries both `name` and `added` are collections; showcases and other keys are
 *    ignored. IDs listed in a collection's `removed` array are dropped.
 *
 * @throws {ParseError} when the JSON is invalid or a collection is missing its name or ID list
 */
export function parseCollectionsJson(content: string, path: string, logger: Logger): IdCollection[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripBom(content));
  } catch (err) {
    throw new ParseError(`invalid JSON: ${String(err)}`, path, { cause: err });
  }

  if (isRecord(parsed) && Array.isArray(parsed.collections)) {
    return parsed.collections.map((entry, index) => parseCollection(entry, `collections[${index}]`, path, logger));
  }

  if (Array.isArray(parsed)) {
    if (parsed.length > 0 && parsed.every((entry) => Array.isArray(entry))) {
      return parseNamespaceDump(parsed, path, logger);
    }

    return parsed.map((entry, index) => parseCollection(entry, `[${index}]`, path, logger));
  }

  throw new ParseError('expected a "collections" array or a top-level array of collections', path);
}

function parseCollection(entry: unknown, location: string, path: string, logger: Logger): IdCollection {
  if (!isRecord(entry)) {
    throw new ParseError(`${location} is not an object`, path);
  }

  if (typeof entry.name !== "string" || entry.name.trim() === "") {
    throw new ParseError(`${location} is missing "name"`, path);
  }

  if (!Array.isArray(entry.added)) {
    throw new ParseError(`${location} (${entry.name}) is missing the "added" ID array`, path);
  }

  const removed = new Set(
    (Array.isArray(entry.removed) ? entry.removed : [])
      .map((value) => coerceAppId(value))
      .filter((appId): appId is number => appId !== undefined),
  );

  const appIds: number[] = [];
  for (const value of entry.added) {
    const appId = coerceAppId(value);
    if (appId === undefined) {
      logger.warn("ignoring invalid app ID %j in collection %s (%s)", value, entry.name, path);

      continue;
    }

    if (!removed.has(appId)) {
      appIds.push(appId);
    }
  }

  return { name: entry.name.trim(), appIds: uniqueAppIds(appIds) };
}

function parseNamespaceDump(entries: unknown[][], path: string, logger: Logger): IdCollection[] {
  const collections: IdCollection[] = [];

  entries.forEach((entry, index) => {
    const [key, payload] = entry;
    if (!isRecord(payload) || typeof payload.value !== "string") {
      return;
    }

    let value: unknown;
    try {
      value = JSON.parse(payload.value);
    } catch (err) {
      logger.debug("skipping namespace entry %s with a non-JSON value: %s", key, err);

      return;
    }

    if (isRecord(value) && "name" in value && "added" in value) {
      collections.push(parseCollection(value, `[${index}] ${String(key)}`, path, logger));
    }
  });

  logger.debug("found %d collections in %d namespace entries (%s)", collections.length, entries.length, path);

  return collections;
}

export function stripBom(content: string): string {
  return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
}
