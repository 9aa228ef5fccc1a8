function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

class HttpStatusError extends Error {
  readonly code = 'http-status' as const;
  readonly status: number;
  readonly url: string;

  constructor(url: string, status: number, statusText?: string) {
    super(`HTTP ${status}${statusText ? ` ${statusText}` : ''}`);
    this.name = 'HttpStatusError';
    this.url = url;
    this.status = status;
  }
}

class FetchFailure extends Error {
  readonly code = 'fetch-failure' as const;
  readonly url: string;
  readonly attempts: number;

  constructor(url: string, cause: unknown, attempts: number) {
    super(
      `Failed to fetch ${url} after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${describeCause(cause)}`,
      { cause },
    );
    this.name = 'FetchFailure';
    this.url = url;
    this.attempts = attempts;
  }
}

class ParseFailure extends Error {
  readonly code = 'parse-failure' as const;
  readonly url: string;

  constructor(url: string, cause: unknown) {
    super(`Malformed document at ${url}: ${describeCause(cause)}`, { cause });
    this.name = 'ParseFailure';
    this.url = url;
  }
}

class ConversionFailure extends Error {
  readonly code = 'conversion-failure' as const;
  readonly identity: string;

  constructor(identity: string, cause: unknown) {
    super(`Failed to convert member ${identity}: ${describeCause(cause)}`, {
      cause,
    });
    this.name = 'ConversionFailure';
    this.identity = identity;
  }
}

class StatePersistFailure extends Error {
  readonly code = 'state-persist-failure' as const;
  readonly statePath: string;

  constructor(statePath: string, cause: unknown) {
    super(`Failed to save state to ${statePath}: ${describeCause(cause)}`, {
      cause,
    });
    this.name = 'StatePersistFailure';
    this.statePath = statePath;
  }
}

/** Failures that leave a page in the frontier for a later run. */
type PageFailure = FetchFailure | ParseFailure;

function isPageFailure(error: unknown): error is PageFailure {
  return error instanceof FetchFailure || error instanceof ParseFailure;
}

export {
  ConversionFailure,
  FetchFailure,
  HttpStatusError,
  ParseFailure,
  StatePersistFailure,
  describeCause,
  isPageFailure,
};
export type { PageFailure };
