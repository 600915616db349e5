import { describe, expect, it } from 'vitest';
import { SymbolCatalog, normalizeSymbol } from './symbolCatalog';
import { CURRENCIES, SYMBOLS, makeQuote } from './testFakes';

describe('normalizeSymbol', () => {
  it('trims and upper-cases', () => {
    expect(normalizeSymbol('  ethbtc ')).toBe('ETHBTC');
  });
});

describe('SymbolCatalog', () => {
  it('supports every listed symbol in listing order', () => {
    const catalog = new SymbolCatalog(SYMBOLS, CURRENCIES);
    expect(catalog.supportedSymbols).toEqual(['ETHBTC', 'LTCBTC', 'XRPBTC', 'BTCUSD']);
    expect(catalog.isSupported('XRPBTC')).toBe(true);
    expect(catalog.isSupported('DOGEUSD')).toBe(false);
  });

  it('narrows support to an allow list in its order, skipping unlisted symbols', () => {
    const catalog = new SymbolCatalog(SYMBOLS, CURRENCIES, ['btcusd', 'DOGEUSD', 'ETHBTC']);
    expect(catalog.supportedSymbols).toEqual(['BTCUSD', 'ETHBTC']);
    expect(catalog.isSupported('XRPBTC')).toBe(false);
    expect(catalog.feeCurrencyOf('XRPBTC')).toBe('BTC');
  });

  it('keeps every listed symbol known outside the allow list', () => {
    const catalog = new SymbolCatalog(SYMBOLS, CURRENCIES, ['ETHBTC']);
    expect(catalog.isListed('XRPBTC')).toBe(true);
    expect(catalog.isListed('ETHBTC')).toBe(true);
    expect(catalog.isListed('DOGEUSD')).toBe(false);
  });

  it('enriches a quote with fee currency and its display name', () => {
    const catalog = new SymbolCatalog(SYMBOLS, CURRENCIES);
    const record = catalog.enrich(makeQuote('ETHBTC'));
    expect(record.id).toBe('ETHBTC');
    expect(record.feeCurrency).toBe('BTC');
    expect(record.fullName).toBe('Bitcoin');
    expect(record.last).toBe(0.033);
  });

  it('leaves enrichment fields empty when a lookup misses', () => {
    const catalog = new SymbolCatalog(SYMBOLS, CURRENCIES);
    expect(catalog.enrich(makeQuote('BTCUSD'))).toMatchObject({ feeCurrency: 'USD', fullName: '' });
    expect(catalog.enrich(makeQuote('DOGEUSD'))).toMatchObject({ feeCurrency: '', fullName: '' });
  });

  it('cannot be grown after construction', () => {
    const catalog = new SymbolCatalog(SYMBOLS, CURRENCIES);
    expect(Object.isFrozen(catalog.supportedSymbols)).toBe(true);
  });
});
