import { readFile } from "node:fs/promises";
import type { Logger } from "pino";
import type { CookieStore } from "./types";

/**
 * Parses a cookie file of `key=value` lines. Blank lines, `#` comments and lines without `=` are ignored; values may
 * themselves contain `=`.
 */
export function parseCookies(content: string): CookieStore {
  const cookies: Record<string, string> = {};

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) {
      continue;
    }

    const separatorIndex = line.indexOf("=");
    if (separatorIndex <= 0) {
      continue;
    }

    cookies[line.slice(0, separatorIndex).trim()] = line.slice(separatorIndex + 1).trim();
  }

  return cookies;
}

export async function loadCookies(path: string, logger: Logger): Promise<CookieStore> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err) {
    logger.warn("could not read cookie file %s (%s), continuing without cookies", path, err);

    return {};
  }

  const cookies = parseCookies(content);

  logger.info("loaded %d cookies from %s", Object.keys(cookies).length, path);

  return cookies;
}

export function toCookieHeader(cookies: CookieStore): string {
  return Object.entries(cookies)
    .map(([name, value]) => `${name}=${value}`)
    .join("; ");
}
