import { createApp } from './app';
import { loadConfig } from './config';
import { createHitbtcQuoteSource } from './hitbtcClient';
import { HitbtcFeedClient } from './hitbtcFeedClient';
import { MarketService } from './marketService';

async function main(): Promise<void> {
  const config = loadConfig();
  const shutdown = new AbortController();

  const source = createHitbtcQuoteSource({
    baseUrl: config.apiBase,
    timeoutMs: config.apiTimeoutMs
  });
  const feedClient = new HitbtcFeedClient({
    url: config.wsUrl,
    callTimeoutMs: config.feedCallTimeoutMs
  });
  const market = new MarketService(source, feedClient, {
    supportedSymbols: config.supportedSymbols,
    signal: shutdown.signal
  });

  await market.bootstrap();
  try {
    await feedClient.connect();
    await market.start();
  } catch (error) {
    console.error('[market] live feed unavailable, serving fetched quotes only', error);
  }

  const app = createApp(market);
  const server = app.listen(config.port, () => {
    console.log(`Server listening on http://localhost:${config.port}`);
    console.log(`All cached: http://localhost:${config.port}/currency/all`);
  });

  const onSignal = (signal: NodeJS.Signals): void => {
    if (shutdown.signal.aborted) {
      return;
    }
    console.info(`[market] ${signal} received, shutting down`);
    shutdown.abort();
    market
      .stop()
      .catch((error: unknown) => {
        console.error('[market] feed shutdown failed', error);
      })
      .finally(() => {
        feedClient.close();
        server.close();
      });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

void main().catch((error) => {
  console.error('Fatal error while starting server', error);
  process.exitCode = 1;
});
