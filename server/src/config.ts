import { API_TIMEOUT_MS, DEFAULT_PORT, FEED_CALL_TIMEOUT_MS, HITBTC_API_BASE, HITBTC_WS_URL } from './constants';

export interface ServerConfig {
  port: number;
  apiBase: string;
  wsUrl: string;
  apiTimeoutMs: number;
  feedCallTimeoutMs: number;
  supportedSymbols?: string[];
}

type Env = Record<string, string | undefined>;

function readNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function readList(value: string | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  const items = value
    .split(',')
    .map((item) => item.trim().toUpperCase())
    .filter(Boolean);
  return items.length > 0 ? items : undefined;
}

export function loadConfig(env: Env = process.env): ServerConfig {
  return {
    port: readNumber(env.PORT, DEFAULT_PORT),
    apiBase: env.HITBTC_API_BASE || HITBTC_API_BASE,
    wsUrl: env.HITBTC_WS_URL || HITBTC_WS_URL,
    apiTimeoutMs: readNumber(env.API_TIMEOUT_MS, API_TIMEOUT_MS),
    feedCallTimeoutMs: readNumber(env.FEED_CALL_TIMEOUT_MS, FEED_CALL_TIMEOUT_MS),
    supportedSymbols: readList(env.SUPPORTED_SYMBOLS)
  };
}
