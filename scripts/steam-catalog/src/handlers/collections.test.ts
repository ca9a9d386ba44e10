import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ParseError } from "../errors";
import {
  collectionIdFor,
  mergeNamespaceEntries,
  prefixCollections,
  readNamespaceFile,
  toNamespaceEntry,
  writeCollectionFile,
} from "./collections";
import { readIdSourceFile } from "./sources";

const logger = pino({ level: "silent" });

const SHOWCASE_ENTRY = [
  "showcases.1",
  { key: "showcases.1", timestamp: 1, value: '{"nShowcaseId":0,"strCollectionId":"uc-abc","eSortBy":6}' },
];

const VALVE_ENTRY = [
  "user-collections.uc-abc",
  {
    key: "user-collections.uc-abc",
    timestamp: 1,
    value: '{"id":"uc-abc","name":"供应商-Valve","added":[1],"removed":[]}',
    version: "7",
  },
];

const FAVORITES_ENTRY = [
  "user-collections.uc-fav",
  {
    key: "user-collections.uc-fav",
    timestamp: 1,
    value: '{"id":"uc-fav","name":"Favorites","added":[5],"removed":[]}',
  },
];

describe("namespace entries", () => {
  it("writes a collection as a Steam user collection", () => {
    expect(toNamespaceEntry({ name: "供应商-Valve", appIds: [30, 10, 10] }, 1700000000, "uc-test")).toEqual([
      "user-collections.uc-test",
      {
        key: "user-collections.uc-test",
        timestamp: 1700000000,
        value: '{"id":"uc-test","name":"供应商-Valve","added":[10,30],"removed":[]}',
      },
    ]);
  });

  it("derives stable collection IDs from names", () => {
    expect(collectionIdFor("供应商-Valve")).toMatch(/^uc-[0-9a-f]{12}$/);
    expect(collectionIdFor("供应商-Valve")).toBe(collectionIdFor("供应商-Valve"));
    expect(collectionIdFor("供应商-Valve")).not.toBe(collectionIdFor("供应商-EA"));
  });

  it("updates collections with the same name in place and appends the rest", () => {
    const electronicArts = { name: "供应商-EA", appIds: [30] };

    const merged = mergeNamespaceEntries(
      [SHOWCASE_ENTRY, VALVE_ENTRY, FAVORITES_ENTRY],
      [{ name: "供应商-Valve", appIds: [20, 10] }, electronicArts],
      100,
    );

    expect(merged).toEqual([
      SHOWCASE_ENTRY,
      [
        "user-collections.uc-abc",
        {
          key: "user-collections.uc-abc",
          timestamp: 100,
          value: '{"id":"uc-abc","name":"供应商-Valve","added":[10,20],"removed":[]}',
          version: "7",
        },
      ],
      FAVORITES_ENTRY,
      toNamespaceEntry(electronicArts, 100),
    ]);
  });

  it("prefixes collection names", () => {
    expect(prefixCollections([{ name: "Valve", appIds: [1] }], "供应商-")).toEqual([
      { name: "供应商-Valve", appIds: [1] },
    ]);
  });
});

describe("collection files", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "steam-catalog-collections-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("writes collections the ID source reader can read back", async () => {
    const path = join(directory, "json-config", "steamdb-publishers.json");

    await writeCollectionFile(
      path,
      [
        { name: "Valve", appIds: [10, 20, 30] },
        { name: "Electronic Arts", appIds: [3300] },
      ],
      { format: "collections" },
      logger,
    );

    const categories = await readIdSourceFile(path, logger);

    expect([...categories.entries()]).toEqual([
      ["Valve", [10, 20, 30]],
      ["Electronic Arts", [3300]],
    ]);
  });

  it("merges into a namespace dump the ID source reader can read back", async () => {
    const basePath = join(directory, "cloud-storage-namespace.json");
    const path = join(directory, "publisher-namespace.json");
    await writeFile(basePath, JSON.stringify([SHOWCASE_ENTRY, VALVE_ENTRY, FAVORITES_ENTRY]));

    await writeCollectionFile(
      path,
      [
        { name: "供应商-Valve", appIds: [10, 20] },
        { name: "供应商-EA", appIds: [30] },
      ],
      { format: "namespace", basePath, timestamp: 100 },
      logger,
    );

    const categories = await readIdSourceFile(path, logger);

    expect([...categories.entries()]).toEqual([
      ["供应商-Valve", [10, 20]],
      ["Favorites", [5]],
      ["供应商-EA", [30]],
    ]);
    expect(JSON.parse(await readFile(basePath, "utf-8"))).toEqual([SHOWCASE_ENTRY, VALVE_ENTRY, FAVORITES_ENTRY]);
  });

  it("writes a new namespace dump without a base", async () => {
    const path = join(directory, "namespace.json");

    await writeCollectionFile(
      path,
      [{ name: "年份-2013", appIds: [30] }],
      { format: "namespace", timestamp: 5 },
      logger,
    );

    expect(await readNamespaceFile(path)).toEqual([toNamespaceEntry({ name: "年份-2013", appIds: [30] }, 5)]);
  });

  it("fails with a ParseError when the base is not a namespace dump", async () => {
    const basePath = join(directory, "base.json");
    await writeFile(basePath, '{"collections": []}');

    await expect(readNamespaceFile(basePath)).rejects.toBeInstanceOf(ParseError);
    await expect(readNamespaceFile(join(directory, "missing.json"))).rejects.toBeInstanceOf(ParseError);
  });
});
