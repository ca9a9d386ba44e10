import { ArgumentParser } from "argparse";
import { COLLECTION_FILE_FORMATS, loadConfig, parseCollectionFileFormat } from "./config";
import { DEFAULT_AUTOCAT_OPTIONS, buildAutoCollections } from "./handlers/autocat";
import { writeCollectionFile } from "./handlers/collections";
import { readCatalogEntries, type CatalogEntry } from "./handlers/output";
import { createLogger, logSection } from "./utils/logger";

async function main() {
  const config = loadConfig();

  const parser = new ArgumentParser({
    description: "groups fetched games into genre and release year collections",
  });

  parser.add_argument("-v", "--verbose", {
    action: "store_true",
    help: "enable verbose logging",
  });
  parser.add_argument("-o", "--output", {
    default: config.autoCatOutputFile,
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
  parser.add_argument("--max-genres", {
    type: "int",
    default: DEFAULT_AUTOCAT_OPTIONS.maxGenres,
    help: "genres taken per game, 0 for all (default: %(default)s)",
  });
  parser.add_argument("--ignore-genre", {
    action: "append",
    default: [],
    help: "genre to leave out; may be repeated",
  });
  parser.add_argument("inputs", {
    nargs: "+",
    help: "CSV files written by fetch-details",
  });

  const args = parser.parse_args();

  const logger = createLogger(args.verbose || config.debug);

  const format = parseCollectionFileFormat(args.format) ?? config.collectionFileFormat;

  logSection("STARTING", logger);

  logger.info("format = %s", format);
  logger.info("output = %s", args.output);
  logger.info("max genres = %d", args.max_genres);
  logger.info("inputs (#) = %d", args.inputs.length);

  logSection("READING FETCHED DETAILS", logger);

  const entries: CatalogEntry[] = [];
  for (const input of args.inputs) {
    const fileEntries = await readCatalogEntries(input, logger);
    if (fileEntries.length === 0) {
      logger.warn("no records in %s", input);
    }

    logger.info("%s: %d records", input, fileEntries.length);
    entries.push(...fileEntries);
  }

  if (entries.length === 0) {
    logger.error("no records could be read, aborting");
    process.exitCode = 1;

    return;
  }

  logSection("CATEGORIZING", logger);

  const collections = buildAutoCollections(
    entries,
    { ...DEFAULT_AUTOCAT_OPTIONS, maxGenres: args.max_genres, ignoredGenres: args.ignore_genre },
    logger,
  );

  collections.forEach((collection) => logger.debug(" - %s: %d games", collection.name, collection.appIds.length));

  await writeCollectionFile(args.output, collections, { format, basePath: args.base }, logger);

  logSection("DONE", logger);

  logger.info("wrote %d collections for %d records to %s", collections.length, entries.length, args.output);
}

main().catch((err) => {
  createLogger().fatal(err, "unhandled error, aborting");
  process.exitCode = 1;
});
