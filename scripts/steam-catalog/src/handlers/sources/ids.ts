/**
 * Coerce a raw JSON value or CSV cell into an app ID. Only positive integers (or strings holding one) are app IDs.
 */
export function coerceAppId(value: unknown): number | undefined {
  let candidate: number;
  if (typeof value === "number") {
    candidate = value;
  } else if (typeof value === "string" && /^\s*\d+(\.0+)?\s*$/.test(value)) {
    candidate = Number(value);
  } else {
    return undefined;
  }

  return Number.isSafeInteger(candidate) && candidate > 0 ? candidate : undefined;
}

/**
 * Deduplicate app IDs, keeping the first occurrence of each.
 */
export function uniqueAppIds(appIds: Iterable<number>): number[] {
  return [...new Set(appIds)];
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
