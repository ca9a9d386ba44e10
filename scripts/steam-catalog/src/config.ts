import { config } from "dotenv";

config({ quiet: true });

export type SteamDbStrategy = "cookie" | "browser";

export const STEAMDB_STRATEGIES: readonly SteamDbStrategy[] = ["cookie", "browser"];

/**
 * `collections` is the `{ "collections": [...] }` file the ID source reader takes; `namespace` is a Steam cloud-storage
 * namespace dump, which the Steam client syncs collections from.
 */
export type CollectionFileFormat = "collections" | "namespace";

export const COLLECTION_FILE_FORMATS: readonly CollectionFileFormat[] = ["collections", "namespace"];

export interface AppConfig {
  debug: boolean;

  outputDir: string;
  idSourcePaths: string[];

  steamStoreLanguage: string;
  steamStoreCountry: string;

  /**
   * Delay between Steam Store API requests to avoid rate limiting.
   *
   * ## Notes
   *
   * Steam does not publish rate limits for the Store API and temporary bans can last from minutes to hours. Output is
   * written per game, so an interrupted run can simply be restarted with a longer delay.
   */
  fetchDelaySeconds: number;
  fetchJitterSeconds: number;

  steamDbStrategy: SteamDbStrategy;
  steamDbCookieFile: string;
  steamDbPublisherFile: string;
  steamDbOutputFile: string;
  /**
   * Put in front of every publisher's name to name its collection. May be empty.
   */
  steamDbCollectionPrefix: string;

  collectionFileFormat: CollectionFileFormat;
  /**
   * Namespace dump that written namespace files are merged into, if any.
   */
  namespaceBaseFile?: string;
  autoCatOutputFile: string;
}

export const DEFAULT_CONFIG: AppConfig = {
  debug: false,

  outputDir: "output",
  idSourcePaths: [],

  steamStoreLanguage: "schinese",
  steamStoreCountry: "cn",

  fetchDelaySeconds: 1.5,
  fetchJitterSeconds: 0,

  steamDbStrategy: "cookie",
  steamDbCookieFile: "json-config/support/cookies.txt",
  steamDbPublisherFile: "json-config/support/publisher.txt",
  steamDbOutputFile: "json-config/steamdb-publishers.json",
  steamDbCollectionPrefix: "供应商-",

  collectionFileFormat: "collections",
  autoCatOutputFile: "json-config/autocat-collections.json",
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    debug: parseBoolean(env.DEBUG, DEFAULT_CONFIG.debug),

    outputDir: env.OUTPUT_DIR || DEFAULT_CONFIG.outputDir,
    idSourcePaths: parseList(env.ID_SOURCE_PATHS),

    steamStoreLanguage: env.STEAM_STORE_LANGUAGE || DEFAULT_CONFIG.steamStoreLanguage,
    steamStoreCountry: env.STEAM_STORE_COUNTRY || DEFAULT_CONFIG.steamStoreCountry,

    fetchDelaySeconds: parseSeconds(env.STEAM_FETCH_DELAY_SECONDS, DEFAULT_CONFIG.fetchDelaySeconds),
    fetchJitterSeconds: parseSeconds(env.STEAM_FETCH_JITTER_SECONDS, DEFAULT_CONFIG.fetchJitterSeconds),

    steamDbStrategy: parseStrategy(env.STEAMDB_STRATEGY) ?? DEFAULT_CONFIG.steamDbStrategy,
    steamDbCookieFile: env.STEAMDB_COOKIE_FILE || DEFAULT_CONFIG.steamDbCookieFile,
    steamDbPublisherFile: env.STEAMDB_PUBLISHER_FILE || DEFAULT_CONFIG.steamDbPublisherFile,
    steamDbOutputFile: env.STEAMDB_OUTPUT_FILE || DEFAULT_CONFIG.steamDbOutputFile,
    steamDbCollectionPrefix: env.STEAMDB_COLLECTION_PREFIX ?? DEFAULT_CONFIG.steamDbCollectionPrefix,

    collectionFileFormat:
      parseCollectionFileFormat(env.COLLECTION_FILE_FORMAT) ?? DEFAULT_CONFIG.collectionFileFormat,
    namespaceBaseFile: env.NAMESPACE_BASE_FILE || undefined,
    autoCatOutputFile: env.AUTOCAT_OUTPUT_FILE || DEFAULT_CONFIG.autoCatOutputFile,
  };
}

export function parseStrategy(value: string | undefined): SteamDbStrategy | undefined {
  const normalized = value?.trim().toLowerCase();

  return STEAMDB_STRATEGIES.find((strategy) => strategy === normalized);
}

export function parseCollectionFileFormat(value: string | undefined): CollectionFileFormat | undefined {
  const normalized = value?.trim().toLowerCase();

  return COLLECTION_FILE_FORMATS.find((format) => format === normalized);
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }

  return value === "1" || value.toLowerCase() === "true";
}

function parseSeconds(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }

  const seconds = Number(value);

  return Number.isFinite(seconds) && seconds >= 0 ? seconds : fallback;
}

function parseList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }

  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
