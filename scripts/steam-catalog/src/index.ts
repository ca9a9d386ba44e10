import { ArgumentParser } from "argparse";
import { loadConfig } from "./config";
import { processCategories, createGameDetailFetcher } from "./handlers/steam";
import { readIdSources } from "./handlers/sources";
import { createLogger, logSection } from "./utils/logger";
import { createRateLimiter, secondsToMs } from "./utils/rate-limiter";

async function main() {
  const config = loadConfig();

  const parser = new ArgumentParser({
    description: "fetches Steam Store details for the app IDs in JSON/CSV category files into per-category CSV files",
  });

  parser.add_argument("-v", "--verbose", {
    action: "store_true",
    help: "enable verbose logging",
  });
  parser.add_argument("-o", "--output-dir", {
    default: config.outputDir,
    help: "directory the category CSV files are written to (default: %(default)s)",
  });
  parser.add_argument("--delay", {
    type: "float",
    default: config.fetchDelaySeconds,
    help: "seconds to wait before every Steam Store API request (default: %(default)s)",
  });
  parser.add_argument("--jitter", {
    type: "float",
    default: config.fetchJitterSeconds,
    help: "maximum random seconds added to the delay (default: %(default)s)",
  });
  parser.add_argument("inputs", {
    nargs: "*",
    default: config.idSourcePaths,
    help: "JSON collection files or CSV ID files; defaults to ID_SOURCE_PATHS",
  });

  const args = parser.parse_args();

  const logger = createLogger(args.verbose || config.debug);

  logSection("STARTING", logger);

  logger.info("verbose = %s", args.verbose || false);
  logger.info("output_dir = %s", args.output_dir);
  logger.info("delay = %ss (+ up to %ss jitter)", args.delay, args.jitter);
  logger.info("store locale = %s / %s", config.steamStoreLanguage, config.steamStoreCountry);
  logger.info("inputs (#) = %d", args.inputs.length);

  if (args.inputs.length === 0) {
    logger.error("no ID sources given; pass file paths or set ID_SOURCE_PATHS");
    process.exitCode = 1;

    return;
  }

  logSection("READING ID SOURCES", logger);

  const categories = await readIdSources(args.inputs, logger);
  if (categories.size === 0) {
    logger.error("no categories could be read from the ID sources, aborting");
    process.exitCode = 1;

    return;
  }

  const results = await processCategories(
    categories,
    {
      outputDir: args.output_dir,
      date: new Date(),
      limiter: createRateLimiter({ delayMs: secondsToMs(args.delay), jitterMs: secondsToMs(args.jitter) }),
      fetchDetail: createGameDetailFetcher({
        language: config.steamStoreLanguage,
        countryCode: config.steamStoreCountry,
      }),
    },
    logger,
  );

  logSection("DONE", logger);

  results.forEach((result) => {
    logger.info(
      "%s: %d written, %d already present, %d failed -> %s",
      result.category,
      result.written,
      result.alreadyFetched,
      result.failed.length,
      result.outputPath,
    );
  });
}

main().catch((err) => {
  createLogger().fatal(err, "unhandled error, aborting");
  process.exitCode = 1;
});
