import { EmptyCacheError } from './errors';
import type { SummaryRecord } from './types';

/**
 * Latest known summary per symbol. Every method runs to completion on the
 * event loop, so a reader sees either the previous record or the new one,
 * never a mix. Records are frozen on the way in.
 */
export class SummaryStore {
  private entries = new Map<string, Readonly<SummaryRecord>>();

  get(symbol: string): Readonly<SummaryRecord> | undefined {
    return this.entries.get(symbol);
  }

  set(symbol: string, record: SummaryRecord): Readonly<SummaryRecord> | undefined {
    const previous = this.entries.get(symbol);
    this.entries.set(symbol, Object.freeze({ ...record }));
    return previous;
  }

  getAll(): Readonly<SummaryRecord>[] {
    if (this.entries.size === 0) {
      throw new EmptyCacheError();
    }
    return Array.from(this.entries.values());
  }

  get size(): number {
    return this.entries.size;
  }
}
