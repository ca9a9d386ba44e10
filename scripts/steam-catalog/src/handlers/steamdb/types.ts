import type { SteamDbStrategy } from "../../config";

export type CookieStore = Readonly<Record<string, string>>;

/**
 * A way of loading a SteamDB listing page and reading the app IDs listed on it.
 */
export interface SteamDbPageFetcher {
  readonly strategy: SteamDbStrategy;

  /**
   * @throws {AuthError} when SteamDB blocks the request
   * @throws {FetchError} when the page cannot be loaded for any other reason
   */
  fetchAppIds(url: string): Promise<number[]>;

  close(): Promise<void>;
}

export const STEAMDB_COOKIE_DOMAIN = ".steamdb.info";

export const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";
