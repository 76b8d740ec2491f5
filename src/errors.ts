/** Startup configuration is missing or invalid. Aborts the run. */
export class ConfigError extends Error {
  override name = "ConfigError";
}

export class FetchError extends Error {
  override name = "FetchError";

  constructor(
    message: string,
    readonly url: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ExtractError extends Error {
  override name = "ExtractError";
}

export class ParseError extends Error {
  override name = "ParseError";

  constructor(readonly input: string) {
    super(`Unrecognized date: "${input}"`);
  }
}

/** Reading or writing the seen-postings ledger failed. */
export class LedgerIOError extends Error {
  override name = "LedgerIOError";

  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
