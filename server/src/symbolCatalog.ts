import type { CurrencyListing, Quote, SummaryRecord, SymbolListing } from './types';

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

/**
 * Read-only view of the exchange listings taken once at startup: which
 * symbols are cached and streamed, and the lookups used to enrich quotes.
 */
export class SymbolCatalog {
  readonly supportedSymbols: readonly string[];
  private readonly supported: ReadonlySet<string>;
  private readonly feeCurrencyBySymbol: ReadonlyMap<string, string>;
  private readonly fullNameByCurrency: ReadonlyMap<string, string>;

  constructor(
    symbols: SymbolListing[],
    currencies: CurrencyListing[],
    allowList?: readonly string[]
  ) {
    this.feeCurrencyBySymbol = new Map(symbols.map((item) => [item.id, item.feeCurrency]));
    this.fullNameByCurrency = new Map(currencies.map((item) => [item.id, item.fullName]));

    const listed = symbols.map((item) => item.id);
    const selected = allowList
      ? allowList.map(normalizeSymbol).filter((symbol) => this.feeCurrencyBySymbol.has(symbol))
      : listed;
    this.supportedSymbols = Object.freeze(Array.from(new Set(selected)));
    this.supported = new Set(this.supportedSymbols);
  }

  /** Listed on the exchange, whether or not it is cached and streamed. */
  isListed(symbol: string): boolean {
    return this.feeCurrencyBySymbol.has(symbol);
  }

  isSupported(symbol: string): boolean {
    return this.supported.has(symbol);
  }

  feeCurrencyOf(symbol: string): string {
    return this.feeCurrencyBySymbol.get(symbol) ?? '';
  }

  fullNameOf(currency: string): string {
    return this.fullNameByCurrency.get(currency) ?? '';
  }

  enrich(quote: Quote): SummaryRecord {
    const feeCurrency = this.feeCurrencyOf(quote.symbol);
    return {
      ...quote,
      id: quote.symbol,
      feeCurrency,
      fullName: this.fullNameOf(feeCurrency)
    };
  }
}
