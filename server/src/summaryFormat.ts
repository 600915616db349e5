import type { SummaryRecord } from './types';

export interface SummaryPayload {
  id: string;
  fullName: string;
  ask: string;
  bid: string;
  last: string;
  open: string;
  low: string;
  high: string;
  volume: string;
  volumeQuote: string;
  timestamp: string | null;
  feeCurrency: string;
}

/** Decimals leave as strings, the way the exchange itself sends them. */
export function toSummaryPayload(record: Readonly<SummaryRecord>): SummaryPayload {
  return {
    id: record.id,
    fullName: record.fullName,
    ask: String(record.ask),
    bid: String(record.bid),
    last: String(record.last),
    open: String(record.open),
    low: String(record.low),
    high: String(record.high),
    volume: String(record.volume),
    volumeQuote: String(record.volumeQuote),
    timestamp: record.timestamp === null ? null : new Date(record.timestamp).toISOString(),
    feeCurrency: record.feeCurrency
  };
}
