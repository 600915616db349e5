import type { DecimalField } from './constants';

export type DecimalValues = Record<DecimalField, number>;

export interface Quote extends DecimalValues {
  symbol: string;
  timestamp: number | null;
}

export interface SummaryRecord extends Quote {
  id: string;
  feeCurrency: string;
  fullName: string;
}

export interface SymbolListing {
  id: string;
  feeCurrency: string;
}

export interface CurrencyListing {
  id: string;
  fullName: string;
}

/**
 * Ticker notification as delivered by the push feed: decimals are strings and
 * any field other than the symbol may be missing.
 */
export type RawTickerUpdate = Partial<Record<DecimalField | 'timestamp', unknown>> & {
  symbol: string;
};

export interface QuoteSource {
  fetchQuote(symbol: string): Promise<Quote>;
  listSymbols(): Promise<SymbolListing[]>;
  listCurrencies(): Promise<CurrencyListing[]>;
}

export interface UpdateStream<T> extends AsyncIterable<T> {
  next(): Promise<IteratorResult<T, undefined>>;
  close(): boolean;
  readonly closed: boolean;
}

export interface TickerFeedTransport {
  subscribe(symbol: string): Promise<UpdateStream<RawTickerUpdate>>;
  unsubscribe(symbol: string): Promise<void>;
  onError(listener: (error: Error) => void): () => void;
}

export type FeedState = 'unsubscribed' | 'subscribing' | 'active' | 'closing';

export interface FeedStartReport {
  active: string[];
  failed: Array<{ symbol: string; error: Error }>;
}
