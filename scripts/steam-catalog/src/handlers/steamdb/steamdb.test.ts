import { tmpdir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import { afterEach, describe, expect, it, vi } from "vitest";
import { AuthError, FetchError, ParseError } from "../../errors";
import { CookieSteamDbFetcher } from "./cookie-strategy";
import { loadCookies, parseCookies, toCookieHeader } from "./cookies";
import { createSteamDbFetcher, scrapePublisherCollections } from "./index";
import { extractAppIdsFromHtml, isBlockedResponse, isChallengePage } from "./parse";
import { loadPublishers, parsePublishers } from "./publishers";
import type { SteamDbPageFetcher } from "./types";

const logger = pino({ level: "silent" });

const LISTING_HTML = `
<table>
  <tbody>
    <tr class="app" data-appid="620"><td><a href="/app/620/">Portal 2</a></td></tr>
    <tr class="app-row"><td><a href="/app/400/info/">Portal</a></td><td><a href="/sub/7/">Package</a></td></tr>
    <tr data-appid="620"><td>Portal 2 (again)</td></tr>
    <tr class="app" data-appid="not-a-number"><td><a href="/app/70/">Half-Life</a></td></tr>
  </tbody>
</table>
<a href="/app/999/">Not part of the listing</a>
`;

describe("parseCookies", () => {
  it("reads key=value lines and ignores comments and blank lines", () => {
    const cookies = parseCookies(
      ["# exported from the browser", "", "sessionid=test-session", "cf_clearance = a=b=c ", "broken line", "=x"].join(
        "\n",
      ),
    );

    expect(cookies).toEqual({ sessionid: "test-session", cf_clearance: "a=b=c" });
  });

  it("builds a Cookie header", () => {
    expect(toCookieHeader({ a: "1", b: "2" })).toBe("a=1; b=2");
    expect(toCookieHeader({})).toBe("");
  });

  it("continues without cookies when the file is missing", async () => {
    await expect(loadCookies(join(tmpdir(), "steam-catalog-missing-cookies.txt"), logger)).resolves.toEqual({});
  });
});

describe("parsePublishers", () => {
  it("groups URLs under the publisher line before them", () => {
    const publishers = parsePublishers(
      [
        "https://steamdb.info/orphan/",
        "★Valve",
        "https://steamdb.info/publisher/Valve/?displayOnly=Game",
        "",
        "some note",
        "☆Electronic Arts",
        "https://steamdb.info/publisher/Electronic%20Arts/?displayOnly=Game",
        "https://steamdb.info/developer/EA/?displayOnly=Game",
        "★Nobody",
      ].join("\r\n"),
    );

    expect([...publishers.entries()]).toEqual([
      ["Valve", ["https://steamdb.info/publisher/Valve/?displayOnly=Game"]],
      [
        "Electronic Arts",
        [
          "https://steamdb.info/publisher/Electronic%20Arts/?displayOnly=Game",
          "https://steamdb.info/developer/EA/?displayOnly=Game",
        ],
      ],
    ]);
  });

  it("fails with a ParseError when the file is missing", async () => {
    await expect(loadPublishers(join(tmpdir(), "steam-catalog-missing-publishers.txt"))).rejects.toBeInstanceOf(
      ParseError,
    );
  });
});

describe("extractAppIdsFromHtml", () => {
  it("reads listing rows by attribute, then by app link", () => {
    expect(extractAppIdsFromHtml(LISTING_HTML)).toEqual([620, 400, 70]);
  });

  it("falls back to every app link when there are no listing rows", () => {
    expect(extractAppIdsFromHtml('<a href="https://steamdb.info/app/10/">A</a><a href="/app/20/">B</a>')).toEqual([
      10, 20,
    ]);
  });
});

describe("isBlockedResponse", () => {
  it("detects 403s and challenge pages", () => {
    expect(isBlockedResponse(403, new Headers(), "")).toBe(true);
    expect(isBlockedResponse(503, new Headers({ "cf-mitigated": "challenge" }), "")).toBe(true);
    expect(isBlockedResponse(200, new Headers(), "<title>Just a moment...</title>")).toBe(true);
    expect(isBlockedResponse(200, new Headers(), LISTING_HTML)).toBe(false);
  });

  it("ignores challenge wording in game names on a listing", () => {
    const html =
      "<html><head><title>Publisher · SteamDB</title></head><body><table>" +
      '<tr class="app" data-appid="1175400"><td>Access Denied</td></tr>' +
      "<tr><td>Just a moment...</td></tr></table></body></html>";

    expect(isBlockedResponse(200, new Headers(), html)).toBe(false);
  });
});

describe("isChallengePage", () => {
  it("reads the title and the challenge markup", () => {
    expect(isChallengePage("<html><head><title>Access Denied</title></head><body></body></html>")).toBe(true);
    expect(isChallengePage('<html><body><form id="challenge-form"></form></body></html>')).toBe(true);
    expect(isChallengePage("<html><head><title>Publisher</title></head><body>Access Denied</body></html>")).toBe(false);
  });

  it("never treats a page with listing rows as a challenge", () => {
    const html =
      "<html><head><title>Just a moment...</title></head>" +
      '<body><table><tr data-appid="10"><td>Game</td></tr></table></body></html>';

    expect(isChallengePage(html)).toBe(false);
  });
});

describe("CookieSteamDbFetcher", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("sends the cookies and parses the listing", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response(LISTING_HTML, { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    const fetcher = new CookieSteamDbFetcher({ sessionid: "test-session" }, logger);

    await expect(fetcher.fetchAppIds("https://steamdb.info/publisher/Valve/")).resolves.toEqual([620, 400, 70]);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://steamdb.info/publisher/Valve/");
    expect(new Headers(init?.headers).get("cookie")).toBe("sessionid=test-session");
  });

  it("fails with an AuthError when blocked", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("Forbidden", { status: 403 })),
    );

    const fetcher = new CookieSteamDbFetcher({}, logger);

    await expect(fetcher.fetchAppIds("https://steamdb.info/publisher/Valve/")).rejects.toBeInstanceOf(AuthError);
  });

  it("reads a listing that names a game after a challenge page", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(
        async () => new Response('<table><tr class="app" data-appid="1175400"><td>Access Denied</td></tr></table>'),
      ),
    );

    const fetcher = new CookieSteamDbFetcher({}, logger);

    await expect(fetcher.fetchAppIds("https://steamdb.info/publisher/Indie/")).resolves.toEqual([1175400]);
  });

  it("fails with an AuthError on a challenge page served with HTTP 200", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("<html><head><title>Just a moment...</title></head><body></body></html>")),
    );

    const fetcher = new CookieSteamDbFetcher({}, logger);

    await expect(fetcher.fetchAppIds("https://steamdb.info/publisher/Valve/")).rejects.toBeInstanceOf(AuthError);
  });

  it("fails with a FetchError on other HTTP errors", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("Not Found", { status: 404 })),
    );

    const fetcher = new CookieSteamDbFetcher({}, logger);

    await expect(fetcher.fetchAppIds("https://steamdb.info/publisher/Nobody/")).rejects.toMatchObject({
      name: "FetchError",
      status: 404,
    });
  });
});

describe("createSteamDbFetcher", () => {
  it("creates the cookie strategy", async () => {
    const fetcher = await createSteamDbFetcher("cookie", {}, logger);

    expect(fetcher).toBeInstanceOf(CookieSteamDbFetcher);
    expect(fetcher.strategy).toBe("cookie");
  });
});

describe("scrapePublisherCollections", () => {
  function createFetcher(pages: Record<string, number[] | Error>): SteamDbPageFetcher {
    return {
      strategy: "cookie",
      fetchAppIds: vi.fn(async (url: string) => {
        const page = pages[url];
        if (page instanceof Error) {
          throw page;
        }

        return page ?? [];
      }),
      close: vi.fn(async () => {}),
    };
  }

  it("merges each publisher's pages and skips pages that fail", async () => {
    const limiter = { wait: vi.fn(async () => 0) };
    const fetcher = createFetcher({
      "https://steamdb.info/a1": [30, 10],
      "https://steamdb.info/a2": [20, 10],
      "https://steamdb.info/a3": new FetchError("SteamDB responded with HTTP 500", 500),
      "https://steamdb.info/b1": [],
    });

    const collections = await scrapePublisherCollections(
      new Map([
        ["Publisher A", ["https://steamdb.info/a1", "https://steamdb.info/a2", "https://steamdb.info/a3"]],
        ["Publisher B", ["https://steamdb.info/b1"]],
      ]),
      fetcher,
      { limiter },
      logger,
    );

    expect(collections).toEqual([{ name: "Publisher A", appIds: [10, 20, 30] }]);
    expect(limiter.wait).toHaveBeenCalledTimes(4);
  });

  it("stops at the first blocked page", async () => {
    const fetcher = createFetcher({
      "https://steamdb.info/a1": new AuthError("SteamDB blocked the request (HTTP 403)", "https://steamdb.info/a1"),
      "https://steamdb.info/a2": [1],
    });

    await expect(
      scrapePublisherCollections(
        new Map([["Publisher A", ["https://steamdb.info/a1", "https://steamdb.info/a2"]]]),
        fetcher,
        { limiter: { wait: async () => 0 } },
        logger,
      ),
    ).rejects.toBeInstanceOf(AuthError);
    expect(fetcher.fetchAppIds).toHaveBeenCalledTimes(1);
  });
});
