import { DecodeError, SubscriptionFailedError } from './errors';
import type { SummaryStore } from './summaryStore';
import { normalizeSymbol, type SymbolCatalog } from './symbolCatalog';
import { decodeTickerUpdate, toQuote } from './tickerDecode';
import type {
  FeedStartReport,
  FeedState,
  RawTickerUpdate,
  TickerFeedTransport,
  UpdateStream
} from './types';

interface FeedCoordinatorOptions {
  /** Side channel for per-message failures; defaults to a warning log. */
  onError?: (error: Error) => void;
  /** Process-wide shutdown signal. */
  signal?: AbortSignal;
}

interface FeedEntry {
  symbol: string;
  state: FeedState;
  controller: AbortController;
  channel: UpdateStream<RawTickerUpdate> | null;
  task: Promise<void> | null;
  opening: Promise<void> | null;
  closing: Promise<void> | null;
}

const STOP = Symbol('stop');

function waitForAbort(signal: AbortSignal): Promise<typeof STOP> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve(STOP);
      return;
    }
    signal.addEventListener('abort', () => resolve(STOP), { once: true });
  });
}

function logFeedError(error: Error): void {
  console.warn('[feed] stream error', error.message);
}

/**
 * Keeps one push subscription per symbol and writes every update it delivers
 * into the store. Each symbol is drained by its own loop; loops share nothing
 * but the store.
 */
export class FeedCoordinator {
  private readonly entries = new Map<string, FeedEntry>();
  private readonly onError: (error: Error) => void;
  private readonly detachTransportErrors: () => void;
  private stopping: Promise<void> | null = null;

  constructor(
    private readonly store: SummaryStore,
    private readonly catalog: SymbolCatalog,
    private readonly transport: TickerFeedTransport,
    options: FeedCoordinatorOptions = {}
  ) {
    this.onError = options.onError ?? logFeedError;
    this.detachTransportErrors = transport.onError((error) => this.onError(error));
    const { signal } = options;
    if (signal) {
      if (signal.aborted) {
        void this.stop();
      } else {
        signal.addEventListener('abort', () => void this.stop(), { once: true });
      }
    }
  }

  get stopped(): boolean {
    return this.stopping !== null;
  }

  state(symbolRaw: string): FeedState {
    return this.entries.get(normalizeSymbol(symbolRaw))?.state ?? 'unsubscribed';
  }

  activeSymbols(): string[] {
    return Array.from(this.entries.values())
      .filter((entry) => entry.state === 'active')
      .map((entry) => entry.symbol);
  }

  async start(symbols: readonly string[] = this.catalog.supportedSymbols): Promise<FeedStartReport> {
    const normalized = symbols.map(normalizeSymbol);
    const settled = await Promise.allSettled(normalized.map((symbol) => this.subscribe(symbol)));
    const report: FeedStartReport = { active: [], failed: [] };
    settled.forEach((result, index) => {
      const symbol = normalized[index];
      if (result.status === 'fulfilled') {
        report.active.push(symbol);
      } else {
        const error = result.reason instanceof Error ? result.reason : new Error(String(result.reason));
        report.failed.push({ symbol, error });
      }
    });
    return report;
  }

  async subscribe(symbolRaw: string): Promise<void> {
    const symbol = normalizeSymbol(symbolRaw);
    if (this.stopping) {
      throw new SubscriptionFailedError(symbol, new Error('Feed coordinator is stopped'));
    }
    const existing = this.entries.get(symbol);
    if (existing?.state === 'subscribing' && existing.opening) {
      await existing.opening;
      // Unsubscribed while the first call was in flight.
      if (existing.controller.signal.aborted) {
        return this.subscribe(symbol);
      }
      return;
    }
    if (existing?.state === 'closing') {
      await existing.closing?.catch(() => undefined);
      return this.subscribe(symbol);
    }
    if (existing?.state === 'active') {
      return;
    }

    const entry: FeedEntry = {
      symbol,
      state: 'subscribing',
      controller: new AbortController(),
      channel: null,
      task: null,
      opening: null,
      closing: null
    };
    this.entries.set(symbol, entry);
    entry.opening = this.open(entry);
    await entry.opening;
  }

  async unsubscribe(symbolRaw: string): Promise<void> {
    const entry = this.entries.get(normalizeSymbol(symbolRaw));
    if (!entry) {
      return;
    }
    await this.teardown(entry);
  }

  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.stopAll();
    }
    return this.stopping;
  }

  private async stopAll(): Promise<void> {
    const entries = Array.from(this.entries.values());
    const results = await Promise.allSettled(entries.map((entry) => this.teardown(entry)));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        console.error('[feed] unsubscribe failed during shutdown', {
          symbol: entries[index]?.symbol,
          error: result.reason
        });
      }
    });
    this.detachTransportErrors();
  }

  private async open(entry: FeedEntry): Promise<void> {
    let channel: UpdateStream<RawTickerUpdate>;
    try {
      channel = await this.transport.subscribe(entry.symbol);
    } catch (error) {
      this.release(entry);
      throw new SubscriptionFailedError(entry.symbol, error);
    }

    entry.channel = channel;
    entry.state = 'active';
    entry.task = this.drain(entry, channel);

    // Shutdown arrived while the subscribe call was in flight.
    if (entry.controller.signal.aborted) {
      await this.teardown(entry);
    }
  }

  private async teardown(entry: FeedEntry): Promise<void> {
    entry.controller.abort();
    if (entry.state === 'subscribing' && entry.opening) {
      // A subscribe that fails leaves nothing to tear down.
      await entry.opening.catch(() => undefined);
    }
    if (entry.state === 'active') {
      entry.state = 'closing';
      entry.closing = this.close(entry);
    }
    await entry.closing;
  }

  private async close(entry: FeedEntry): Promise<void> {
    try {
      await this.transport.unsubscribe(entry.symbol);
    } finally {
      entry.channel?.close();
      await entry.task;
      this.release(entry);
    }
  }

  private release(entry: FeedEntry): void {
    entry.state = 'unsubscribed';
    if (this.entries.get(entry.symbol) === entry) {
      this.entries.delete(entry.symbol);
    }
  }

  private async drain(entry: FeedEntry, channel: UpdateStream<RawTickerUpdate>): Promise<void> {
    const { signal } = entry.controller;
    const stopped = waitForAbort(signal);
    for (;;) {
      const next = await Promise.race([channel.next(), stopped]);
      if (next === STOP || signal.aborted) {
        return;
      }
      if (next.done) {
        break;
      }
      this.apply(entry.symbol, next.value);
    }

    // The transport closed the channel on its own, e.g. a dropped connection.
    if (entry.state === 'active') {
      console.warn('[feed] ticker stream closed by transport', { symbol: entry.symbol });
      entry.controller.abort();
      this.release(entry);
    }
  }

  private apply(symbol: string, payload: unknown): void {
    let update: RawTickerUpdate;
    try {
      update = decodeTickerUpdate(payload);
    } catch (error) {
      this.onError(error instanceof Error ? error : new DecodeError(String(error), payload));
      return;
    }
    if (update.symbol !== symbol) {
      this.onError(new DecodeError(`Ticker update for ${update.symbol} on the ${symbol} stream`, payload));
      return;
    }
    if (!this.catalog.isSupported(symbol)) {
      return;
    }
    this.store.set(symbol, this.catalog.enrich(toQuote(update)));
  }
}
