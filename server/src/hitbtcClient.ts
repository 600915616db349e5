import { API_TIMEOUT_MS, HITBTC_API_BASE } from './constants';
import { normalizeSymbol } from './symbolCatalog';
import { isRecord, parseDecimal, parseTimestamp } from './tickerDecode';
import type { CurrencyListing, Quote, QuoteSource, SymbolListing } from './types';

export interface HitbtcRequestOptions {
  baseUrl?: string;
  timeoutMs?: number;
}

function exchangeErrorMessage(body: unknown): string | null {
  if (!isRecord(body) || !isRecord(body.error)) {
    return null;
  }
  const { code, message, description } = body.error;
  const text = typeof message === 'string' ? message : 'Unknown error';
  const detail = typeof description === 'string' && description !== '' ? ` (${description})` : '';
  return `HitBTC error ${String(code)}: ${text}${detail}`;
}

async function fetchJson(path: string, options: HitbtcRequestOptions = {}): Promise<unknown> {
  const baseUrl = options.baseUrl ?? HITBTC_API_BASE;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs ?? API_TIMEOUT_MS);
  try {
    const response = await fetch(`${baseUrl}${path}`, {
      method: 'GET',
      signal: controller.signal
    });
    const body: unknown = await response.json().catch(() => null);
    const exchangeError = exchangeErrorMessage(body);
    if (exchangeError) {
      throw new Error(exchangeError);
    }
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} while fetching ${path}`);
    }
    return body;
  } finally {
    clearTimeout(timeout);
  }
}

function expectList(body: unknown, path: string): unknown[] {
  if (!Array.isArray(body)) {
    throw new Error(`Unexpected response shape from ${path}`);
  }
  return body;
}

export async function fetchTicker(symbol: string, options?: HitbtcRequestOptions): Promise<Quote> {
  const path = `/public/ticker/${encodeURIComponent(normalizeSymbol(symbol))}`;
  const body = await fetchJson(path, options);
  if (!isRecord(body) || typeof body.symbol !== 'string') {
    throw new Error(`Unexpected response shape from ${path}`);
  }
  return {
    symbol: normalizeSymbol(body.symbol),
    last: parseDecimal(body.last),
    ask: parseDecimal(body.ask),
    bid: parseDecimal(body.bid),
    open: parseDecimal(body.open),
    low: parseDecimal(body.low),
    high: parseDecimal(body.high),
    volume: parseDecimal(body.volume),
    volumeQuote: parseDecimal(body.volumeQuote),
    timestamp: parseTimestamp(body.timestamp)
  };
}

export async function fetchSymbols(options?: HitbtcRequestOptions): Promise<SymbolListing[]> {
  const path = '/public/symbol';
  const symbols: SymbolListing[] = [];
  for (const item of expectList(await fetchJson(path, options), path)) {
    if (!isRecord(item) || typeof item.id !== 'string') {
      continue;
    }
    symbols.push({
      id: normalizeSymbol(item.id),
      feeCurrency: typeof item.feeCurrency === 'string' ? item.feeCurrency : ''
    });
  }
  return symbols;
}

export async function fetchCurrencies(options?: HitbtcRequestOptions): Promise<CurrencyListing[]> {
  const path = '/public/currency';
  const currencies: CurrencyListing[] = [];
  for (const item of expectList(await fetchJson(path, options), path)) {
    if (!isRecord(item) || typeof item.id !== 'string') {
      continue;
    }
    currencies.push({
      id: item.id,
      fullName: typeof item.fullName === 'string' ? item.fullName : ''
    });
  }
  return currencies;
}

export function createHitbtcQuoteSource(options: HitbtcRequestOptions = {}): QuoteSource {
  return {
    fetchQuote: (symbol) => fetchTicker(symbol, options),
    listSymbols: () => fetchSymbols(options),
    listCurrencies: () => fetchCurrencies(options)
  };
}
