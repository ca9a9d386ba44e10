import { FetchError } from "../../errors";
import type { StoreLocale } from "./types";

const STEAM_STORE_API_ENDPOINT = "https://store.steampowered.com/api";
const STEAM_STORE_API_APP_DETAILS_METHOD = "appdetails";

const STEAM_STORE_APP_URL_BASE = "https://store.steampowered.com/app";

export function createLookupUrl(appId: number, locale: StoreLocale) {
  const steamStoreApiUrl = new URL(`${STEAM_STORE_API_ENDPOINT}/${STEAM_STORE_API_APP_DETAILS_METHOD}/`);

  steamStoreApiUrl.searchParams.append("appids", appId.toString());
  steamStoreApiUrl.searchParams.append("l", locale.language);
  steamStoreApiUrl.searchParams.append("cc", locale.countryCode);

  return steamStoreApiUrl.toString();
}

export function createStoreUrl(appId: number) {
  return `${STEAM_STORE_APP_URL_BASE}/${appId}/`;
}

/**
 * Performs a single Store API lookup. There is no retry here; rate limiting (429) and blocking (403) surface as
 * {@link FetchError}s like any other failure.
 */
export async function lookupSteamGame(steamStoreApiUrlString: string): Promise<unknown> {
  let result: Response;
  try {
    result = await fetch(steamStoreApiUrlString, { signal: AbortSignal.timeout(10_000) });
  } catch (err) {
    throw new FetchError(`request failed: ${String(err)}`, undefined, { cause: err });
  }

  if (result.status === 429) {
    throw new FetchError("rate limited by Steam Store API", result.status);
  }

  if (!result.ok) {
    throw new FetchError(`Steam Store API responded with HTTP ${result.status}`, result.status);
  }

  try {
    return await result.json();
  } catch (err) {
    throw new FetchError(`malformed Steam Store API response: ${String(err)}`, result.status, { cause: err });
  }
}
