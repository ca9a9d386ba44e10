import * as cheerio from "cheerio";
import { isRecord } from "../sources/ids";
import { createStoreUrl } from "./api";
import type { GameDetailRecord } from "./types";

export const NOT_AVAILABLE = "N/A";
export const FREE_PRICE = "免费";
export const MISSING_PRICE = "价格信息缺失";

/**
 * Maps the `data` object of an appdetails response to an output record. The response is untyped JSON, so every field
 * is read defensively and falls back to "N/A" (or zero) when absent.
 */
export function mapSteamAppToGameDetailRecord(appId: number, data: Record<string, unknown>): GameDetailRecord {
  const { currentPrice, originalPrice } = mapPrices(data);

  return {
    // App IDs can be re-used or redirected by Steam, so the requested ID is kept rather than `data.steam_appid`.

    appId,
    name: readString(data.name) ?? NOT_AVAILABLE,

    currentPrice,
    originalPrice,

    reviewRating: NOT_AVAILABLE,
    reviewCount: isRecord(data.recommendations) ? (readNumber(data.recommendations.total) ?? 0) : 0,

    releaseDate: (isRecord(data.release_date) ? readString(data.release_date.date) : undefined) ?? NOT_AVAILABLE,
    developer: joinOrNotAvailable(readStrings(data.developers)),
    genre: joinOrNotAvailable(readDescriptions(data.genres)),

    recommendedRequirements: mapRequirements(data.pc_requirements),

    storeUrl: createStoreUrl(appId),
  };
}

function mapPrices(data: Record<string, unknown>): { currentPrice: string; originalPrice: string } {
  const overview = data.price_overview;

  if (!isRecord(overview)) {
    return {
      currentPrice: data.is_free === true ? FREE_PRICE : MISSING_PRICE,
      originalPrice: "0.00",
    };
  }

  const finalPrice = centsToAmount(overview.final) ?? stripCurrencySymbols(overview.final_formatted);
  const initialPrice =
    centsToAmount(overview.initial) ?? stripCurrencySymbols(overview.initial_formatted) ?? finalPrice;

  if (finalPrice === undefined) {
    return { currentPrice: MISSING_PRICE, originalPrice: initialPrice ?? "0.00" };
  }

  return {
    currentPrice: Number(finalPrice) === 0 ? FREE_PRICE : finalPrice,
    originalPrice: initialPrice ?? finalPrice,
  };
}

function centsToAmount(value: unknown): string | undefined {
  return typeof value === "number" && Number.isFinite(value) ? (value / 100).toFixed(2) : undefined;
}

/**
 * Turns a formatted store price such as `¥ 58.00`, `$1,299.99`, `1.299,99€` or `1.299€` into a plain decimal
 * (`58.00`, `1299.99`, `1299.99`, `1299`).
 */
export function stripCurrencySymbols(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }

  const digits = value.replace(/[^\d.,]/g, "");
  if (!/\d/.test(digits)) {
    return undefined;
  }

  // A trailing ",dd" is a decimal comma and a trailing ".ddd" groups thousands; otherwise commas group thousands.

  if (/,\d{2}$/.test(digits)) {
    return digits.replace(/\./g, "").replace(",", ".");
  }

  if (/\.\d{3}$/.test(digits)) {
    return digits.replace(/[.,]/g, "");
  }

  return digits.replace(/,/g, "");
}

/**
 * `pc_requirements` is an object of HTML snippets, or an empty array when the store has none. Recommended
 * requirements win over minimum ones.
 */
function mapRequirements(requirements: unknown): string {
  if (!isRecord(requirements)) {
    return NOT_AVAILABLE;
  }

  const html = readString(requirements.recommended) ?? readString(requirements.minimum);

  return html ? htmlToText(html) || NOT_AVAILABLE : NOT_AVAILABLE;
}

/**
 * Flattens a requirements snippet into `OS: Windows 10; Memory: 8 GB RAM`, dropping the leading "Recommended:" style
 * heading.
 */
export function htmlToText(html: string): string {
  const $ = cheerio.load(html.replace(/<br\s*\/?>/gi, "\n").replace(/<\/li>/gi, "\n</li>"));

  const lines = $.root()
    .text()
    .split("\n")
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter((line) => line.length > 0);

  if (lines.length > 1 && /[:：]$/.test(lines[0])) {
    lines.shift();
  }

  return lines.join("; ");
}

function readString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }

  const trimmed = value.trim();

  return trimmed.length > 0 ? trimmed : undefined;
}

function readNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function readStrings(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }

  return value.map((item) => readString(item)).filter((item): item is string => item !== undefined);
}

function readDescriptions(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }

  return value
    .map((item) => (isRecord(item) ? readString(item.description) : undefined))
    .filter((item): item is string => item !== undefined);
}

function joinOrNotAvailable(values: string[]): string {
  return values.length > 0 ? values.join(", ") : NOT_AVAILABLE;
}
