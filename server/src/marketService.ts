import { FeedCoordinator } from './feedCoordinator';
import { SummaryResolver } from './summaryResolver';
import { SummaryStore } from './summaryStore';
import { SymbolCatalog } from './symbolCatalog';
import type {
  CurrencyListing,
  FeedStartReport,
  QuoteSource,
  SummaryRecord,
  TickerFeedTransport
} from './types';

export interface MarketServiceOptions {
  /** Restricts caching and streaming to these symbols. */
  supportedSymbols?: readonly string[];
  onFeedError?: (error: Error) => void;
  signal?: AbortSignal;
}

interface MarketRuntime {
  catalog: SymbolCatalog;
  resolver: SummaryResolver;
  feed: FeedCoordinator;
}

export class MarketService {
  private readonly store = new SummaryStore();
  private runtime: MarketRuntime | null = null;

  constructor(
    private readonly source: QuoteSource,
    private readonly transport: TickerFeedTransport,
    private readonly options: MarketServiceOptions = {}
  ) {}

  async bootstrap(): Promise<SymbolCatalog> {
    if (this.runtime) {
      return this.runtime.catalog;
    }
    const symbols = await this.source.listSymbols();
    let currencies: CurrencyListing[] = [];
    try {
      currencies = await this.source.listCurrencies();
    } catch (error) {
      console.error('[market] currency listing failed, display names stay empty', error);
    }

    const catalog = new SymbolCatalog(symbols, currencies, this.options.supportedSymbols);
    this.runtime = {
      catalog,
      resolver: new SummaryResolver(this.store, catalog, this.source),
      feed: new FeedCoordinator(this.store, catalog, this.transport, {
        onError: this.options.onFeedError,
        signal: this.options.signal
      })
    };
    console.info('[market] catalog loaded', {
      listed: symbols.length,
      supported: catalog.supportedSymbols.length,
      currencies: currencies.length
    });
    return catalog;
  }

  async start(): Promise<FeedStartReport> {
    const { feed } = this.requireRuntime();
    const report = await feed.start();
    for (const { symbol, error } of report.failed) {
      console.error('[market] feed subscription failed', { symbol, error: error.message });
    }
    console.info('[market] feed started', {
      active: report.active.length,
      failed: report.failed.length
    });
    return report;
  }

  async stop(): Promise<void> {
    if (!this.runtime) {
      return;
    }
    await this.runtime.feed.stop();
  }

  get catalog(): SymbolCatalog {
    return this.requireRuntime().catalog;
  }

  get feed(): FeedCoordinator {
    return this.requireRuntime().feed;
  }

  get cachedCount(): number {
    return this.store.size;
  }

  async lookup(symbol: string): Promise<Readonly<SummaryRecord>> {
    return this.requireRuntime().resolver.resolve(symbol);
  }

  allCached(): Readonly<SummaryRecord>[] {
    return this.store.getAll();
  }

  private requireRuntime(): MarketRuntime {
    if (!this.runtime) {
      throw new Error('Market service is not bootstrapped');
    }
    return this.runtime;
  }
}
