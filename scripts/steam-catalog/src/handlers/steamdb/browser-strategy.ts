import type { Logger } from "pino";
import type { Browser, BrowserContext } from "playwright-core";
import { chromium } from "playwright-extra";
import stealth from "puppeteer-extra-plugin-stealth";
import { AuthError, FetchError } from "../../errors";
import { extractAppIdsFromHtml, isChallengePage, LISTING_ROW_SELECTOR } from "./parse";
import { BROWSER_USER_AGENT, STEAMDB_COOKIE_DOMAIN, type CookieStore, type SteamDbPageFetcher } from "./types";

const NAVIGATION_TIMEOUT_MS = 60_000;
const LISTING_ROWS_TIMEOUT_MS = 10_000;

chromium.use(stealth());

/**
 * Loads SteamDB pages in a real (headless, stealth-patched) Chromium so that client-side rendering and anti-bot
 * challenges run. Much slower than {@link CookieSteamDbFetcher}, and needs a Chromium that Playwright can launch
 * (`npx playwright install chromium`).
 *
 * The browser is started on first use and re-used for every page until {@link BrowserSteamDbFetcher.close}.
 */
export class BrowserSteamDbFetcher implements SteamDbPageFetcher {
  readonly strategy = "browser";

  private browser?: Browser;
  private context?: BrowserContext;

  constructor(
    private readonly cookies: CookieStore,
    private readonly logger: Logger,
  ) {}

  async fetchAppIds(url: string): Promise<number[]> {
    const context = await this.getContext();
    const page = await context.newPage();

    try {
      this.logger.debug("loading %s in the browser...", url);

      const response = await page
        .goto(url, { waitUntil: "domcontentloaded", timeout: NAVIGATION_TIMEOUT_MS })
        .catch((err: unknown) => {
          throw new FetchError(`browser could not load ${url}: ${String(err)}`, undefined, { cause: err });
        });

      // A challenge answers the navigation with a 403 and renders the listing once solved; only the final DOM counts.
      this.logger.debug("%s answered the navigation with HTTP %s", url, response?.status() ?? "?");

      const hasListingRows = await page
        .waitForSelector(LISTING_ROW_SELECTOR, { timeout: LISTING_ROWS_TIMEOUT_MS })
        .then(() => true)
        .catch((err: unknown) => {
          this.logger.warn(
            "no listing rows appeared on %s within %dms (%s), reading app links instead",
            url,
            LISTING_ROWS_TIMEOUT_MS,
            err,
          );

          return false;
        });

      const html = await page.content();

      if (!hasListingRows && isChallengePage(html)) {
        throw new AuthError("SteamDB served a challenge the browser could not pass", url);
      }

      const appIds = extractAppIdsFromHtml(html);

      this.logger.info("found %d app IDs on %s", appIds.length, url);

      return appIds;
    } finally {
      await page.close();
    }
  }

  async close(): Promise<void> {
    await this.browser?.close();

    this.browser = undefined;
    this.context = undefined;
  }

  private async getContext(): Promise<BrowserContext> {
    if (this.context) {
      return this.context;
    }

    this.logger.info("launching headless Chromium...");

    const browser = await chromium.launch({ headless: true });
    this.browser = browser;

    try {
      const context = await browser.newContext({
        userAgent: BROWSER_USER_AGENT,
        viewport: { width: 1920, height: 1080 },
        locale: "zh-CN",
      });

      const cookies = Object.entries(this.cookies).map(([name, value]) => ({
        name,
        value,
        domain: STEAMDB_COOKIE_DOMAIN,
        path: "/",
      }));
      if (cookies.length > 0) {
        await context.addCookies(cookies);
      }

      this.context = context;

      return context;
    } catch (err) {
      await this.close();

      throw err;
    }
  }
}
