import type { Server } from 'node:http';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createApp } from './app';
import { MarketService } from './marketService';
import { FakeQuoteSource, FakeTransport, makeQuote } from './testFakes';

async function listen(market: MarketService): Promise<{ server: Server; baseUrl: string }> {
  const server = createApp(market).listen(0, '127.0.0.1');
  await new Promise<void>((resolve) => server.once('listening', () => resolve()));
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Server is not bound to a port');
  }
  return { server, baseUrl: `http://127.0.0.1:${address.port}` };
}

function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

describe('HTTP routes', () => {
  let source: FakeQuoteSource;
  let market: MarketService;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    source = new FakeQuoteSource();
    market = new MarketService(source, new FakeTransport(), { supportedSymbols: ['ETHBTC'] });
    await market.bootstrap();
    ({ server, baseUrl } = await listen(market));
  });

  afterEach(async () => {
    await close(server);
    vi.restoreAllMocks();
  });

  it('reports health with the cached count', async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: 'ok', time: expect.any(Number), cached: 0 });
  });

  it('answers 404 for the full listing while nothing is cached', async () => {
    const response = await fetch(`${baseUrl}/currency/all`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'No data Found' });
  });

  it('serves a fetched record and then lists it', async () => {
    source.quotes.set('ETHBTC', makeQuote('ETHBTC'));
    const expected = {
      id: 'ETHBTC',
      fullName: 'Bitcoin',
      ask: '0.034',
      bid: '0.032',
      last: '0.033',
      open: '0.031',
      low: '0.03',
      high: '0.035',
      volume: '1200',
      volumeQuote: '39.6',
      timestamp: '2024-03-01T10:00:00.000Z',
      feeCurrency: 'BTC'
    };

    const single = await fetch(`${baseUrl}/currency/ethbtc`);
    expect(single.status).toBe(200);
    expect(await single.json()).toEqual(expected);

    const all = await fetch(`${baseUrl}/currency/all`);
    expect(all.status).toBe(200);
    expect(await all.json()).toEqual({ currencies: [expected] });
  });

  it('answers 404 for a symbol the exchange does not list', async () => {
    const response = await fetch(`${baseUrl}/currency/DOGEUSD`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'Not a valid Symbol' });
    expect(source.fetched).toEqual([]);
  });

  it('fetches a listed symbol outside the supported set without caching it', async () => {
    source.quotes.set('XRPBTC', makeQuote('XRPBTC', { last: 0.00002 }));

    const response = await fetch(`${baseUrl}/currency/XRPBTC`);

    expect(response.status).toBe(200);
    const body: unknown = await response.json();
    expect(body).toMatchObject({ id: 'XRPBTC', last: '0.00002', feeCurrency: 'BTC' });
    expect(source.fetched).toEqual(['XRPBTC']);
    expect(market.cachedCount).toBe(0);
  });

  it('answers 502 when the quote fetch fails', async () => {
    source.failure = new Error('HTTP 503 while fetching /public/ticker/ETHBTC');

    const response = await fetch(`${baseUrl}/currency/ETHBTC`);

    expect(response.status).toBe(502);
    expect(await response.json()).toEqual({
      error: 'Failed to fetch quote for ETHBTC: HTTP 503 while fetching /public/ticker/ETHBTC'
    });
  });
});
