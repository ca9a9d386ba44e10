import { createHash } from "node:crypto";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { Logger } from "pino";
import type { CollectionFileFormat } from "../config";
import { FilesystemError, ParseError } from "../errors";
import type { IdCollection } from "./sources";
import { isRecord, uniqueAppIds } from "./sources/ids";
import { stripBom } from "./sources/json";

export const USER_COLLECTION_KEY_PREFIX = "user-collections.";

export type NamespaceEntry = [string, Record<string, unknown>];

export interface WriteCollectionFileOptions {
  format: CollectionFileFormat;
  /**
   * Namespace dump to merge the collections into. Its other entries are kept as they are.
   */
  basePath?: string;
  /**
   * Seconds since the epoch, stamped on every namespace entry written. Defaults to now.
   */
  timestamp?: number;
}

export function prefixCollections(collections: IdCollection[], prefix: string): IdCollection[] {
  return collections.map((collection) => ({ ...collection, name: prefix + collection.name }));
}

/**
 * @throws {ParseError} when the base namespace dump cannot be read
 * @throws {FilesystemError} when the file cannot be written
 */
export async function writeCollectionFile(
  path: string,
  collections: IdCollection[],
  options: WriteCollectionFileOptions,
  logger: Logger,
): Promise<void> {
  switch (options.format) {
    case "collections":
      await writeCollectionsFile(path, collections);

      return;
    case "namespace": {
      const base = options.basePath ? await readNamespaceFile(options.basePath) : [];
      const timestamp = options.timestamp ?? Math.floor(Date.now() / 1000);

      logger.debug("merging %d collections into %d namespace entries", collections.length, base.length);

      await writeJsonFile(path, mergeNamespaceEntries(base, collections, timestamp));

      return;
    }
  }
}

/**
 * Writes collections in the `{ "collections": [{ "name", "added" }] }` shape that the ID source reader accepts.
 *
 * @throws {FilesystemError} when the file cannot be written
 */
export async function writeCollectionsFile(path: string, collections: IdCollection[]): Promise<void> {
  await writeJsonFile(path, {
    collections: collections.map((collection) => ({ name: collection.name, added: collection.appIds })),
  });
}

/**
 * Steam collection IDs are `uc-` and twelve characters. Deriving them from the name keeps a collection's key stable
 * across runs.
 */
export function collectionIdFor(name: string): string {
  return `uc-${createHash("sha1").update(name).digest("hex").slice(0, 12)}`;
}

export function toNamespaceEntry(
  collection: IdCollection,
  timestamp: number,
  id = collectionIdFor(collection.name),
  payload: Record<string, unknown> = {},
): NamespaceEntry {
  const key = `${USER_COLLECTION_KEY_PREFIX}${id}`;
  const added = uniqueAppIds(collection.appIds).sort((a, b) => a - b);

  return [
    key,
    {
      ...payload,
      key,
      timestamp,
      value: JSON.stringify({ id, name: collection.name, added, removed: [] }),
    },
  ];
}

/**
 * Puts collections into a namespace dump. A collection whose name matches an existing user collection replaces that
 * collection's contents under its existing key; the others are appended. Every other entry is kept unchanged.
 */
export function mergeNamespaceEntries(base: unknown[], collections: IdCollection[], timestamp: number): unknown[] {
  const pending = new Map(collections.map((collection) => [collection.name, collection]));

  const merged = base.map((entry) => {
    const existing = readUserCollectionEntry(entry);
    const collection = existing && pending.get(existing.name);
    if (!existing || !collection) {
      return entry;
    }

    pending.delete(existing.name);

    return toNamespaceEntry(collection, timestamp, existing.id, existing.payload);
  });

  for (const collection of pending.values()) {
    merged.push(toNamespaceEntry(collection, timestamp));
  }

  return merged;
}

function readUserCollectionEntry(
  entry: unknown,
): { id: string; name: string; payload: Record<string, unknown> } | undefined {
  if (!Array.isArray(entry)) {
    return undefined;
  }

  const key: unknown = entry[0];
  const payload: unknown = entry[1];
  if (typeof key !== "string" || !key.startsWith(USER_COLLECTION_KEY_PREFIX)) {
    return undefined;
  }

  if (!isRecord(payload) || typeof payload.value !== "string") {
    return undefined;
  }

  let value: unknown;
  try {
    value = JSON.parse(payload.value);
  } catch {
    return undefined;
  }

  if (!isRecord(value) || typeof value.name !== "string" || !Array.isArray(value.added)) {
    return undefined;
  }

  return {
    id: key.slice(USER_COLLECTION_KEY_PREFIX.length),
    name: value.name,
    payload,
  };
}

/**
 * @throws {ParseError} when the file is missing, not JSON, or not an array of entries
 */
export async function readNamespaceFile(path: string): Promise<unknown[]> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err) {
    throw new ParseError(`could not read namespace file: ${String(err)}`, path, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(stripBom(content));
  } catch (err) {
    throw new ParseError(`invalid JSON: ${String(err)}`, path, { cause: err });
  }

  if (!Array.isArray(parsed)) {
    throw new ParseError("expected a namespace dump, i.e. an array of [key, entry] pairs", path);
  }

  return parsed;
}

async function writeJsonFile(path: string, content: unknown): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, JSON.stringify(content, null, 2) + "\n", "utf-8");
  } catch (err) {
    throw new FilesystemError(`could not write collections file: ${String(err)}`, path, { cause: err });
  }
}
