import { UpstreamUnavailableError } from './errors';
import type { SummaryStore } from './summaryStore';
import { normalizeSymbol, type SymbolCatalog } from './symbolCatalog';
import type { QuoteSource, SummaryRecord } from './types';

/**
 * Read-through lookup. A hit is served as is; the push feed is the only thing
 * that refreshes an entry. A miss fetches and, for supported symbols, caches.
 *
 * The get and the set are not coordinated: concurrent misses for one symbol
 * each fetch and each write, and the last write wins.
 */
export class SummaryResolver {
  constructor(
    private readonly store: SummaryStore,
    private readonly catalog: SymbolCatalog,
    private readonly source: Pick<QuoteSource, 'fetchQuote'>
  ) {}

  async resolve(symbolRaw: string): Promise<Readonly<SummaryRecord>> {
    const symbol = normalizeSymbol(symbolRaw);
    const cached = this.store.get(symbol);
    if (cached) {
      return cached;
    }

    let record: SummaryRecord;
    try {
      record = this.catalog.enrich(await this.source.fetchQuote(symbol));
    } catch (error) {
      throw new UpstreamUnavailableError(symbol, error);
    }

    if (this.catalog.isSupported(record.symbol)) {
      this.store.set(record.symbol, record);
    }
    return record;
  }
}
