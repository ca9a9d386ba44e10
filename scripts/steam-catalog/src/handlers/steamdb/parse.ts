import * as cheerio from "cheerio";
import { coerceAppId, uniqueAppIds } from "../sources/ids";

export const LISTING_ROW_SELECTOR = "tr.app, tr.app-row, tr[data-appid]";

const APP_LINK_PATTERN = /\/app\/(\d+)/;

/**
 * Reads the app IDs listed on a SteamDB listing page. Listing rows carry a `data-appid` attribute, or else link to
 * `/app/<id>/`; pages without listing rows fall back to every app link on the page.
 */
export function extractAppIdsFromHtml(html: string): number[] {
  const $ = cheerio.load(html);

  const appIds: number[] = [];
  const rows = $(LISTING_ROW_SELECTOR);

  rows.each((_, row) => {
    const appId = coerceAppId($(row).attr("data-appid"));
    if (appId !== undefined) {
      appIds.push(appId);

      return;
    }

    $(row)
      .find("a[href]")
      .each((_, link) => {
        const linkAppId = appIdFromHref($(link).attr("href"));
        if (linkAppId !== undefined) {
          appIds.push(linkAppId);
        }
      });
  });

  if (rows.length === 0) {
    $('a[href*="/app/"]').each((_, link) => {
      const linkAppId = appIdFromHref($(link).attr("href"));
      if (linkAppId !== undefined) {
        appIds.push(linkAppId);
      }
    });
  }

  return uniqueAppIds(appIds);
}

function appIdFromHref(href: string | undefined): number | undefined {
  const match = href?.match(APP_LINK_PATTERN);

  return match ? coerceAppId(match[1]) : undefined;
}

const CHALLENGE_TITLES = ["Just a moment...", "Attention Required! | Cloudflare", "Access Denied"];

const CHALLENGE_SELECTOR = "#cf-browser-verification, #challenge-form, #challenge-running";

/**
 * Whether a page is an anti-bot challenge or denial page. Only the `<title>` and the challenge markup are looked at,
 * and a page that has listing rows is never a challenge, so game names on a listing cannot trip it.
 */
export function isChallengePage(html: string): boolean {
  const $ = cheerio.load(html);

  if ($(LISTING_ROW_SELECTOR).length > 0) {
    return false;
  }

  const title = $("title").first().text().trim();

  return CHALLENGE_TITLES.some((signature) => title.includes(signature)) || $(CHALLENGE_SELECTOR).length > 0;
}

/**
 * Whether a SteamDB HTTP response is an anti-bot challenge or denial rather than the requested page.
 */
export function isBlockedResponse(status: number, headers: Headers, body: string): boolean {
  if (status === 403 || headers.get("cf-mitigated") === "challenge") {
    return true;
  }

  return isChallengePage(body);
}
