export const HITBTC_API_BASE = 'https://api.hitbtc.com/api/2';

export const HITBTC_WS_URL = 'wss://api.hitbtc.com/api/2/ws';

export const DEFAULT_PORT = 4000;

export const API_TIMEOUT_MS = 15000;

export const FEED_CALL_TIMEOUT_MS = 10000;

export const DECIMAL_FIELDS = [
  'last',
  'ask',
  'bid',
  'open',
  'low',
  'high',
  'volume',
  'volumeQuote'
] as const;

export type DecimalField = typeof DECIMAL_FIELDS[number];
