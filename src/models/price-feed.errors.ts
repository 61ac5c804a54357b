export class PriceFeedError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'PriceFeedError';
  }
}

/** The exchange could not be reached, or answered with a non-2xx status. */
export class NetworkError extends PriceFeedError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = 'NetworkError';
  }
}

/** The exchange answered, but not with the JSON shape we expect. */
export class ParseError extends PriceFeedError {
  constructor(message: string, public readonly url: string, cause?: unknown) {
    super(message, cause);
    this.name = 'ParseError';
  }
}

export class RemoteWriteError extends PriceFeedError {
  constructor(message: string, public readonly spreadsheet: string, cause?: unknown) {
    super(message, cause);
    this.name = 'RemoteWriteError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
