import { ArgumentParser } from "argparse";
import {
  COLLECTION_FILE_FORMATS,
  STEAMDB_STRATEGIES,
  loadConfig,
  parseCollectionFileFormat,
  parseStrategy,
} from "./config";
import { AuthError } from "./errors";
import { prefixCollections, readNamespaceFile, writeCollectionFile } from "./handlers/collections";
import { createSteamDbFetcher, loadCookies, loadPublishers, scrapePublisherCollections } from "./handlers/steamdb";
import { createLogger, logSection } from "./utils/logger";
import { createRateLimiter } from "./utils/rate-limiter";

/**
 * SteamDB rate limits aggressively; wait between 1 and 3 seconds before every page.
 */
const STEAMDB_DELAY_MS = 1000;
const STEAMDB_JITTER_MS = 2000;

async function main() {
  const config = loadConfig();

  const parser = new ArgumentParser({
    description: "scrapes app IDs from SteamDB publisher listings into a collection file",
  });

  parser.add_argument("-v", "--verbose", {
    action: "store_true",
    help: "enable verbose logging",
  });
  parser.add_argument("-s", "--strategy", {
    choices: [...STEAMDB_STRATEGIES],
    default: config.steamDbStrategy,
    help: "how SteamDB pages are loaded: cookie-authenticated requests or a headless browser (default: %(default)s)",
  });
  parser.add_argument("-p", "--publishers", {
    default: config.steamDbPublisherFile,
    help: "publisher list file (default: %(default)s)",
  });
  parser.add_argument("-c", "--cookies", {
    default: config.steamDbCookieFile,
    help: "cookie file of key=value lines (default: %(default)s)",
  });
  parser.add_argument("-o", "--output", {
    default: config.steamDbOutputFile,
    help: "collection file to write (default: %(default)s)",
  });
  parser.add_argument("-f", "--format", {
    choices: [...COLLECTION_FILE_FORMATS],
    default: config.collectionFileFormat,
    help: "write a collection file, or a Steam cloud-storage namespace dump (default: %(default)s)",
  });
  parser.add_argument("-b", "--base", {
    default: config.namespaceBaseFile,
    help: "namespace dump to merge the collections into (namespace format only)",
  });
  parser.add_argument("--prefix", {
    default: config.steamDbCollectionPrefix,
    help: "put in front of each publisher's name to name its collection (default: %(default)s)",
  });

  const args = parser.parse_args();

  const logger = createLogger(args.verbose || config.debug);

  const strategy = parseStrategy(args.strategy) ?? config.steamDbStrategy;
  const format = parseCollectionFileFormat(args.format) ?? config.collectionFileFormat;

  logSection("STARTING", logger);

  logger.info("strategy = %s", strategy);
  logger.info("publishers = %s", args.publishers);
  logger.info("cookies = %s", args.cookies);
  logger.info("output = %s (%s)", args.output, format);

  const publishers = await loadPublishers(args.publishers);
  if (publishers.size === 0) {
    logger.error("no publishers with URLs found in %s, aborting", args.publishers);
    process.exitCode = 1;

    return;
  }

  publishers.forEach((urls, publisher) => logger.info(" - %s: %d URLs", publisher, urls.length));

  if (format === "namespace" && args.base) {
    const base = await readNamespaceFile(args.base);

    logger.info("merging into %s (%d entries)", args.base, base.length);
  }

  const cookies = await loadCookies(args.cookies, logger);
  const fetcher = await createSteamDbFetcher(strategy, cookies, logger);

  logSection("SCRAPING STEAMDB", logger);

  try {
    const collections = await scrapePublisherCollections(
      publishers,
      fetcher,
      { limiter: createRateLimiter({ delayMs: STEAMDB_DELAY_MS, jitterMs: STEAMDB_JITTER_MS }) },
      logger,
    );

    await writeCollectionFile(
      args.output,
      prefixCollections(collections, args.prefix),
      { format, basePath: args.base },
      logger,
    );

    logger.info("wrote %d collections to %s", collections.length, args.output);
  } catch (err) {
    if (!(err instanceof AuthError)) {
      throw err;
    }

    logger.error("SteamDB blocked %s: %s", err.url, err.message);
    logger.error(
      strategy === "cookie"
        ? "refresh the cookies in %s, or rerun with --strategy browser"
        : "refresh the cookies in %s and rerun",
      args.cookies,
    );
    process.exitCode = 1;
  } finally {
    await fetcher.close();
  }
}

main().catch((err) => {
  createLogger().fatal(err, "unhandled error, aborting");
  process.exitCode = 1;
});
