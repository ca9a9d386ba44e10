/**
 * An input file (JSON/CSV ID source, publisher list) is missing or malformed. Reported per file; other files continue.
 */
export class ParseError extends Error {
  constructor(
    message: string,
    readonly path: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "ParseError";
  }
}

/**
 * A single app or page could not be fetched: HTTP failure, rate limiting, a malformed body, or an app the store reports
 * as unavailable. The identifier is skipped and retried naturally on the next run.
 */
export class FetchError extends Error {
  constructor(
    message: string,
    readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "FetchError";
  }
}

/**
 * SteamDB refused the request (403 or an anti-bot challenge). The operator needs fresh cookies or the browser strategy.
 */
export class AuthError extends Error {
  constructor(
    message: string,
    readonly url: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "AuthError";
  }
}

export class FilesystemError extends Error {
  constructor(
    message: string,
    readonly path: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "FilesystemError";
  }
}
