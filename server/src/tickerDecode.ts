import { DecodeError } from './errors';
import { normalizeSymbol } from './symbolCatalog';
import type { Quote, RawTickerUpdate } from './types';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Partial ticker data is still useful: anything unparsable reads as zero. */
export function parseDecimal(value: unknown): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : 0;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return 0;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : 0;
}

export function parseTimestamp(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string' || value === '') {
    return null;
  }
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? null : parsed;
}

export function decodeTickerUpdate(payload: unknown): RawTickerUpdate {
  if (!isRecord(payload)) {
    throw new DecodeError('Ticker update is not an object', payload);
  }
  const { symbol } = payload;
  if (typeof symbol !== 'string' || symbol.trim() === '') {
    throw new DecodeError('Ticker update has no symbol', payload);
  }
  return { ...payload, symbol: normalizeSymbol(symbol) };
}

export function toQuote(raw: RawTickerUpdate): Quote {
  return {
    symbol: raw.symbol,
    last: parseDecimal(raw.last),
    ask: parseDecimal(raw.ask),
    bid: parseDecimal(raw.bid),
    open: parseDecimal(raw.open),
    low: parseDecimal(raw.low),
    high: parseDecimal(raw.high),
    volume: parseDecimal(raw.volume),
    volumeQuote: parseDecimal(raw.volumeQuote),
    timestamp: parseTimestamp(raw.timestamp)
  };
}
