/**
 * Non-2xx response from a remote page
 */
export class HttpError extends Error {
  constructor(
    public readonly url: string,
    public readonly status: number,
    statusText: string
  ) {
    super(`GET ${url} failed: ${status} ${statusText}`.trim());
    this.name = 'HttpError';
  }
}

/**
 * A listing page could not be fetched. Aborts the run before anything is written.
 */
export class ListingFetchError extends Error {
  constructor(
    public readonly listingUrl: string,
    options?: { cause?: unknown }
  ) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Failed to fetch listing page ${listingUrl}${reason}`, options);
    this.name = 'ListingFetchError';
  }
}

/**
 * A persisted row does not match the record schema
 */
export class RecordValidationError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly line: number,
    detail: string
  ) {
    super(`Invalid record in ${filePath} at line ${line}: ${detail}`);
    this.name = 'RecordValidationError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
