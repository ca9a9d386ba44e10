import { mkdir, open, readFile, truncate } from "node:fs/promises";
import { dirname, join } from "node:path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import type { Logger } from "pino";
import { FilesystemError } from "../errors";
import type { GameDetailRecord } from "./steam/types";

/**
 * Output column order. The labels are what ends up in the header row; `app_id` must stay first since resuming reads
 * it back from there.
 */
export const OUTPUT_COLUMNS: readonly { key: keyof GameDetailRecord; label: string }[] = [
  { key: "appId", label: "app_id" },
  { key: "name", label: "名称" },
  { key: "currentPrice", label: "价格" },
  { key: "originalPrice", label: "原价" },
  { key: "reviewRating", label: "好评率" },
  { key: "reviewCount", label: "总评价数" },
  { key: "releaseDate", label: "发布日期" },
  { key: "developer", label: "开发商" },
  { key: "genre", label: "类型" },
  { key: "recommendedRequirements", label: "推荐配置" },
  { key: "storeUrl", label: "Steam链接" },
];

export const OUTPUT_HEADER = OUTPUT_COLUMNS.map((column) => column.label);

const UTF8_BOM = "\ufeff";

// Reserved on Windows, and "/" everywhere.
const ILLEGAL_FILENAME_CHARACTERS = /[\\/:*?"<>|\u0000-\u001f\u007f]/g;

/**
 * Makes a category name safe to use as a filename prefix by removing characters that are illegal in file names.
 */
export function sanitizeCategoryName(name: string): string {
  const sanitized = name
    .replace(ILLEGAL_FILENAME_CHARACTERS, "")
    .trim()
    .replace(/[. ]+$/, "");

  return sanitized.length > 0 ? sanitized : "category";
}

/**
 * Formats a date as `YYYY-MM-DD` in local time.
 */
export function formatDate(date: Date): string {
  const year = date.getFullYear().toString().padStart(4, "0");
  const month = (date.getMonth() + 1).toString().padStart(2, "0");
  const day = date.getDate().toString().padStart(2, "0");

  return `${year}-${month}-${day}`;
}

export function outputPathFor(outputDir: string, category: string, date: Date): string {
  return join(outputDir, `${sanitizeCategoryName(category)}_${formatDate(date)}.csv`);
}

/**
 * Reads the data rows of an output file, header excluded. A missing or empty file has no rows.
 *
 * A run interrupted mid-write can leave a torn last row behind. Every complete record ends with a newline and the file
 * parses up to it, so the file is cut back to its last complete record and the torn row is fetched again.
 *
 * @throws {FilesystemError} when the file cannot be read or repaired, or has no readable header
 */
export async function readOutputRows(outputPath: string, logger?: Logger): Promise<string[][]> {
  let content: string;
  try {
    content = await readFile(outputPath, "utf-8");
  } catch (err) {
    if (isNotFoundError(err)) {
      return [];
    }

    throw new FilesystemError(`could not read output file: ${String(err)}`, outputPath, { cause: err });
  }

  if (content.length === 0) {
    return [];
  }

  let end = content.endsWith("\n") ? content.length : content.lastIndexOf("\n") + 1;
  while (end > 0) {
    const rows = tryParseOutputRows(content.slice(0, end));

    if (rows !== undefined) {
      if (end < content.length) {
        await cutTornTail(outputPath, Buffer.byteLength(content.slice(0, end), "utf-8"));

        logger?.warn("cut a torn row off the end of %s, it will be fetched again", outputPath);
      }

      return rows;
    }

    end = content.lastIndexOf("\n", end - 2) + 1;
  }

  throw new FilesystemError("output file has no readable CSV header", outputPath);
}

/**
 * Reads the app IDs already written to an output file. A missing file means nothing has been fetched yet.
 *
 * @throws {FilesystemError} when the file exists but cannot be read
 */
export async function loadFetchedAppIds(outputPath: string, logger?: Logger): Promise<Set<number>> {
  const fetched = new Set<number>();

  for (const row of await readOutputRows(outputPath, logger)) {
    const appId = Number(row[0]);
    if (Number.isSafeInteger(appId) && appId > 0) {
      fetched.add(appId);
    }
  }

  return fetched;
}

/**
 * The columns of an output row that auto-categorizing reads.
 */
export type CatalogEntry = Pick<GameDetailRecord, "appId" | "genre" | "releaseDate">;

const GENRE_COLUMN = OUTPUT_COLUMNS.findIndex((column) => column.key === "genre");
const RELEASE_DATE_COLUMN = OUTPUT_COLUMNS.findIndex((column) => column.key === "releaseDate");

/**
 * Reads the app ID, genre and release date of every record in an output file.
 *
 * @throws {FilesystemError} when the file exists but cannot be read
 */
export async function readCatalogEntries(outputPath: string, logger?: Logger): Promise<CatalogEntry[]> {
  const entries: CatalogEntry[] = [];

  for (const row of await readOutputRows(outputPath, logger)) {
    const appId = Number(row[0]);
    if (!Number.isSafeInteger(appId) || appId <= 0) {
      continue;
    }

    entries.push({ appId, genre: row[GENRE_COLUMN] ?? "", releaseDate: row[RELEASE_DATE_COLUMN] ?? "" });
  }

  return entries;
}

function tryParseOutputRows(content: string): string[][] | undefined {
  try {
    const rows: string[][] = parse(content, {
      bom: true,
      from_line: 2,
      skip_empty_lines: true,
      relax_column_count: true,
      relax_quotes: true,
    });

    return rows;
  } catch {
    return undefined;
  }
}

async function cutTornTail(outputPath: string, length: number): Promise<void> {
  try {
    await truncate(outputPath, length);
  } catch (err) {
    throw new FilesystemError(`could not cut the torn row off the output file: ${String(err)}`, outputPath, {
      cause: err,
    });
  }
}

export function filterPendingAppIds(appIds: number[], fetched: Set<number>): number[] {
  return appIds.filter((appId) => !fetched.has(appId));
}

/**
 * Appends one record to the output file, creating it with the header row first if needed. The data is synced to disk
 * before this resolves, so an interrupted run keeps every record written so far.
 *
 * @throws {FilesystemError} when the directory or file cannot be created or written
 */
export async function appendGameDetailRecord(outputPath: string, record: GameDetailRecord): Promise<void> {
  try {
    await mkdir(dirname(outputPath), { recursive: true });
  } catch (err) {
    throw new FilesystemError(`could not create output directory: ${String(err)}`, dirname(outputPath), { cause: err });
  }

  const row = OUTPUT_COLUMNS.map((column) => record[column.key]);

  try {
    const handle = await open(outputPath, "a");

    try {
      const { size } = await handle.stat();
      const header = size === 0 ? UTF8_BOM + stringify([OUTPUT_HEADER]) : "";

      await handle.appendFile(header + stringify([row]), "utf-8");
      await handle.datasync();
    } finally {
      await handle.close();
    }
  } catch (err) {
    throw new FilesystemError(`could not append to output file: ${String(err)}`, outputPath, { cause: err });
  }
}

function isNotFoundError(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
