function describe(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}

export class UpstreamUnavailableError extends Error {
  readonly symbol: string;

  constructor(symbol: string, cause: unknown) {
    super(`Failed to fetch quote for ${symbol}: ${describe(cause)}`, { cause });
    this.name = 'UpstreamUnavailableError';
    this.symbol = symbol;
  }
}

export class SubscriptionFailedError extends Error {
  readonly symbol: string;

  constructor(symbol: string, cause: unknown) {
    super(`Failed to subscribe to ${symbol}: ${describe(cause)}`, { cause });
    this.name = 'SubscriptionFailedError';
    this.symbol = symbol;
  }
}

export class DecodeError extends Error {
  readonly payload: unknown;

  constructor(message: string, payload: unknown) {
    super(message);
    this.name = 'DecodeError';
    this.payload = payload;
  }
}

/** Expected outcome while nothing has been cached yet. */
export class EmptyCacheError extends Error {
  constructor() {
    super('No data present');
    this.name = 'EmptyCacheError';
  }
}
