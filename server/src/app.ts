import cors from 'cors';
import express, { type Express, type Response } from 'express';
import { EmptyCacheError, UpstreamUnavailableError } from './errors';
import type { MarketService } from './marketService';
import { toSummaryPayload } from './summaryFormat';
import { normalizeSymbol } from './symbolCatalog';

function sendError(res: Response, status: number, message: string): void {
  res.status(status).json({ error: message });
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createApp(market: MarketService): Express {
  const app = express();
  app.use(cors());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', time: Date.now(), cached: market.cachedCount });
  });

  app.get('/currency/all', (_req, res) => {
    try {
      const currencies = market.allCached().map(toSummaryPayload);
      res.json({ currencies });
    } catch (error) {
      if (error instanceof EmptyCacheError) {
        sendError(res, 404, 'No data Found');
        return;
      }
      console.error('[http] failed to list cached currencies', error);
      sendError(res, 500, errorMessage(error));
    }
  });

  app.get('/currency/:symbol', async (req, res) => {
    const symbol = normalizeSymbol(String(req.params.symbol ?? ''));
    if (!symbol || !market.catalog.isListed(symbol)) {
      sendError(res, 404, 'Not a valid Symbol');
      return;
    }
    try {
      const record = await market.lookup(symbol);
      res.json(toSummaryPayload(record));
    } catch (error) {
      if (error instanceof UpstreamUnavailableError) {
        console.error('[http] quote fetch failed', { symbol, error: error.message });
        sendError(res, 502, error.message);
        return;
      }
      console.error('[http] lookup failed', { symbol, error });
      sendError(res, 500, errorMessage(error));
    }
  });

  return app;
}
