import type { UpdateStream } from './types';

type Waiter<T> = (result: IteratorResult<T, undefined>) => void;

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

/**
 * Unbounded queue between a push transport and one consumer. `close` takes
 * effect once: later pushes are dropped, queued values are still read, then
 * reads finish as done.
 */
export class UpdateChannel<T> implements UpdateStream<T> {
  private buffer: Array<{ value: T }> = [];
  private waiters: Waiter<T>[] = [];
  private isClosed = false;

  get closed(): boolean {
    return this.isClosed;
  }

  push(value: T): boolean {
    if (this.isClosed) {
      return false;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ done: false, value });
    } else {
      this.buffer.push({ value });
    }
    return true;
  }

  close(): boolean {
    if (this.isClosed) {
      return false;
    }
    this.isClosed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(DONE);
    }
    return true;
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const buffered = this.buffer.shift();
    if (buffered) {
      return Promise.resolve({ done: false, value: buffered.value });
    }
    if (this.isClosed) {
      return Promise.resolve(DONE);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return DONE;
      }
    };
  }
}
