import { readFile } from "node:fs/promises";
import { ParseError } from "../../errors";

/**
 * Publisher (or developer) name to the SteamDB listing URLs its games are scraped from.
 */
export type PublisherUrls = Map<string, string[]>;

/**
 * Parses a publisher list, in which a line starting with `★` or `☆` names a publisher and the `http…` lines after it
 * are that publisher's listing pages:
 *
 * ```
 * ★Valve
 * https://steamdb.info/publisher/Valve/?displayOnly=Game
 * ☆Electronic Arts
 * https://steamdb.info/publisher/Electronic%20Arts/?displayOnly=Game
 * ```
 *
 * Any other line is ignored, as are publishers without URLs.
 */
export function parsePublishers(content: string): PublisherUrls {
  const publishers: PublisherUrls = new Map();

  let currentPublisher: string | undefined;
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();

    if (line.startsWith("★") || line.startsWith("☆")) {
      currentPublisher = line.slice(1).trim();
    } else if (line.startsWith("http") && currentPublisher) {
      const urls = publishers.get(currentPublisher) ?? [];
      urls.push(line);
      publishers.set(currentPublisher, urls);
    }
  }

  return publishers;
}

/**
 * @throws {ParseError} when the file cannot be read
 */
export async function loadPublishers(path: string): Promise<PublisherUrls> {
  try {
    return parsePublishers(await readFile(path, "utf-8"));
  } catch (err) {
    throw new ParseError(`could not read publisher file: ${String(err)}`, path, { cause: err });
  }
}
