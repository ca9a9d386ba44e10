import type { Logger } from "pino";
import { AuthError, FetchError } from "../../errors";
import { toCookieHeader } from "./cookies";
import { extractAppIdsFromHtml, isBlockedResponse } from "./parse";
import { BROWSER_USER_AGENT, type CookieStore, type SteamDbPageFetcher } from "./types";

const REQUEST_TIMEOUT_MS = 30_000;

/**
 * Loads SteamDB pages with plain HTTP requests, authenticated with cookies copied from a logged in browser session.
 * Fast, but SteamDB blocks it as soon as the cookies expire or a challenge is served.
 */
export class CookieSteamDbFetcher implements SteamDbPageFetcher {
  readonly strategy = "cookie";

  constructor(
    private readonly cookies: CookieStore,
    private readonly logger: Logger,
  ) {}

  async fetchAppIds(url: string): Promise<number[]> {
    this.logger.debug("requesting %s with %d cookies...", url, Object.keys(this.cookies).length);

    let response: Response;
    try {
      response = await fetch(url, {
        headers: this.createHeaders(),
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });
    } catch (err) {
      throw new FetchError(`request to ${url} failed: ${String(err)}`, undefined, { cause: err });
    }

    const body = await response.text();

    this.logger.debug("%s responded with HTTP %d (%s)", url, response.status, response.headers.get("content-type"));

    if (isBlockedResponse(response.status, response.headers, body)) {
      throw new AuthError(`SteamDB blocked the request (HTTP ${response.status})`, url);
    }

    if (!response.ok) {
      throw new FetchError(`SteamDB responded with HTTP ${response.status}`, response.status);
    }

    const appIds = extractAppIdsFromHtml(body);

    this.logger.info("found %d app IDs on %s", appIds.length, url);

    return appIds;
  }

  async close(): Promise<void> {}

  private createHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      "User-Agent": BROWSER_USER_AGENT,
      Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8",
      "Accept-Language": "zh-CN,zh;q=0.9,en;q=0.8",
      "Upgrade-Insecure-Requests": "1",
      "Sec-Fetch-Dest": "document",
      "Sec-Fetch-Mode": "navigate",
      "Sec-Fetch-Site": "none",
      "Cache-Control": "max-age=0",
    };

    const cookieHeader = toCookieHeader(this.cookies);
    if (cookieHeader) {
      headers.Cookie = cookieHeader;
    }

    return headers;
  }
}
