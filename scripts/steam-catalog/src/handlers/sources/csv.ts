import type { Logger } from "pino";
import { parse } from "csv-parse/sync";
import { ParseError } from "../../errors";
import { coerceAppId, uniqueAppIds } from "./ids";
import { stripBom } from "./json";

const ID_COLUMN_PRIORITY = ["app_id", "id"];

/**
 * Reads app IDs out of a CSV file. The column is picked by name (`app_id`, then `id`), falling back to the first
 * column. A file whose first cell is already an app ID has no header row and is read entirely from the first column.
 */
export function parseAppIdsCsv(content: string, path: string, logger: Logger): number[] {
  let rows: string[][];
  try {
    rows = parse(stripBom(content), {
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true,
    });
  } catch (err) {
    throw new ParseError(`invalid CSV: ${String(err)}`, path, { cause: err });
  }

  if (rows.length === 0) {
    return [];
  }

  const [firstRow, ...otherRows] = rows;

  let columnIndex = 0;
  let dataRows = otherRows;

  if (coerceAppId(firstRow[0]) !== undefined) {
    logger.debug("%s has no header row, reading IDs from the first column", path);

    dataRows = rows;
  } else {
    const header = firstRow.map((cell) => cell.toLowerCase());
    const namedColumn = ID_COLUMN_PRIORITY.map((name) => header.indexOf(name)).find((index) => index !== -1);

    columnIndex = namedColumn ?? 0;

    logger.debug("%s: reading IDs from column %s", path, firstRow[columnIndex]);
  }

  const appIds: number[] = [];
  for (const row of dataRows) {
    const cell = row[columnIndex];
    const appId = coerceAppId(cell);
    if (appId === undefined) {
      if (cell !== undefined && cell !== "") {
        logger.warn("ignoring invalid app ID %j in %s", cell, path);
      }

      continue;
    }

    appIds.push(appId);
  }

  return uniqueAppIds(appIds);
}
