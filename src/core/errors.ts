export class ConfigError extends Error {
  readonly name = "ConfigError";
}

/** The search feed could not be fetched or is not an Atom document. Aborts the run. */
export class FeedUnavailableError extends Error {
  readonly name = "FeedUnavailableError";
  readonly statusCode?: number;

  constructor(message: string, options?: { cause?: unknown; statusCode?: number }) {
    super(message, { cause: options?.cause });
    this.statusCode = options?.statusCode;
  }
}

/** The store answered an existence check with something other than "not found". */
export class StoreQueryError extends Error {
  readonly name = "StoreQueryError";
  readonly key: string;

  constructor(key: string, options?: { cause?: unknown }) {
    super(`Existence check failed for ${key}: ${describeError(options?.cause)}`, { cause: options?.cause });
    this.key = key;
  }
}

export class TransferError extends Error {
  readonly name = "TransferError";
  readonly paperId: string;
  readonly attempt: number;

  constructor(paperId: string, attempt: number, message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.paperId = paperId;
    this.attempt = attempt;
  }
}

export function describeError(error: unknown): string {
  if (error === undefined) {
    return "unknown error";
  }
  return error instanceof Error ? error.message : String(error);
}
