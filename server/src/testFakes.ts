import type { CurrencyListing, Quote, QuoteSource, RawTickerUpdate, SymbolListing, TickerFeedTransport } from './types';
import { UpdateChannel } from './updateChannel';

export const SYMBOLS: SymbolListing[] = [
  { id: 'ETHBTC', feeCurrency: 'BTC' },
  { id: 'LTCBTC', feeCurrency: 'BTC' },
  { id: 'XRPBTC', feeCurrency: 'BTC' },
  { id: 'BTCUSD', feeCurrency: 'USD' }
];

export const CURRENCIES: CurrencyListing[] = [
  { id: 'BTC', fullName: 'Bitcoin' },
  { id: 'ETH', fullName: 'Ethereum' }
];

export function makeQuote(symbol: string, overrides: Partial<Quote> = {}): Quote {
  return {
    symbol,
    last: 0.033,
    ask: 0.034,
    bid: 0.032,
    open: 0.031,
    low: 0.03,
    high: 0.035,
    volume: 1200,
    volumeQuote: 39.6,
    timestamp: Date.parse('2024-03-01T10:00:00.000Z'),
    ...overrides
  };
}

export class FakeQuoteSource implements QuoteSource {
  readonly fetched: string[] = [];
  quotes = new Map<string, Quote>();
  failure: Error | null = null;

  async fetchQuote(symbol: string): Promise<Quote> {
    this.fetched.push(symbol);
    await Promise.resolve();
    if (this.failure) {
      throw this.failure;
    }
    const quote = this.quotes.get(symbol);
    if (!quote) {
      throw new Error(`HitBTC error 2001: Symbol not found`);
    }
    return quote;
  }

  async listSymbols(): Promise<SymbolListing[]> {
    return SYMBOLS;
  }

  async listCurrencies(): Promise<CurrencyListing[]> {
    return CURRENCIES;
  }
}

export class CountingChannel extends UpdateChannel<RawTickerUpdate> {
  closeCount = 0;

  override close(): boolean {
    const closed = super.close();
    if (closed) {
      this.closeCount += 1;
    }
    return closed;
  }
}

export class FakeTransport implements TickerFeedTransport {
  readonly channels = new Map<string, CountingChannel>();
  readonly subscribed: string[] = [];
  readonly unsubscribed: string[] = [];
  readonly failing = new Set<string>();
  /** Holds every unsubscribe call until it resolves. */
  unsubscribeGate: Promise<void> | null = null;
  private listeners = new Set<(error: Error) => void>();

  async subscribe(symbol: string): Promise<CountingChannel> {
    this.subscribed.push(symbol);
    await Promise.resolve();
    if (this.failing.has(symbol)) {
      throw new Error('Subscribe not successful');
    }
    const channel = new CountingChannel();
    this.channels.set(symbol, channel);
    return channel;
  }

  async unsubscribe(symbol: string): Promise<void> {
    this.unsubscribed.push(symbol);
    await (this.unsubscribeGate ?? Promise.resolve());
    this.channels.get(symbol)?.close();
  }

  onError(listener: (error: Error) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emitError(error: Error): void {
    for (const listener of this.listeners) {
      listener(error);
    }
  }

  deliver(symbol: string, update: Omit<RawTickerUpdate, 'symbol'> & { symbol?: string }): boolean {
    const channel = this.channels.get(symbol);
    return channel ? channel.push({ ...update, symbol: update.symbol ?? symbol }) : false;
  }
}

export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
