import { ExecutorError } from '../errors.js';
import { RowBounds } from '../mapping/row-bounds.js';

/**
 * Forward-only, single-pass sequence of rows fetched on demand.
 *
 * Cursors bypass the local cache. Running cached queries on the same session
 * while a cursor is open is not supported.
 */
export interface Cursor<T> extends AsyncIterable<T> {
  isOpen(): boolean;
  /** True once every row of the window has been read */
  isConsumed(): boolean;
  /** Index of the last row returned, -1 before the first one */
  getCurrentIndex(): number;
  close(): Promise<void>;
}

/**
 * Pull-based source a store driver hands to a cursor.
 */
export interface RowSource<T> {
  next(): Promise<IteratorResult<T, undefined>>;
  close(): Promise<void>;
}

type CursorStatus = 'created' | 'open' | 'closed' | 'consumed';

export class DefaultCursor<T> implements Cursor<T> {
  private status: CursorStatus = 'created';
  private iteratorRetrieved = false;
  private indexWithRowBound = -1;
  private skipped = false;

  constructor(
    private readonly source: RowSource<T>,
    private readonly bounds: RowBounds = RowBounds.DEFAULT
  ) {}

  isOpen(): boolean {
    return this.status === 'open';
  }

  isConsumed(): boolean {
    return this.status === 'consumed';
  }

  getCurrentIndex(): number {
    return this.bounds.offset + this.indexWithRowBound;
  }

  async close(): Promise<void> {
    if (this.status === 'closed' || this.status === 'consumed') {
      return;
    }
    this.status = 'closed';
    await this.source.close();
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    if (this.iteratorRetrieved) {
      throw new ExecutorError('Cannot open more than one iterator on a Cursor');
    }
    if (this.status === 'closed') {
      throw new ExecutorError('A Cursor is already closed.');
    }
    this.iteratorRetrieved = true;

    try {
      for (;;) {
        const next = await this.fetchNextUsingRowBound();
        if (next.done) {
          return;
        }
        yield next.value;
      }
    } finally {
      await this.close();
    }
  }

  private async fetchNextUsingRowBound(): Promise<IteratorResult<T, undefined>> {
    if (this.status === 'closed' || this.status === 'consumed') {
      return { done: true, value: undefined };
    }
    this.status = 'open';

    if (!this.skipped) {
      this.skipped = true;
      for (let i = 0; i < this.bounds.offset; i++) {
        const skippedRow = await this.source.next();
        if (skippedRow.done) {
          return this.markConsumed();
        }
      }
    }

    if (this.indexWithRowBound + 1 >= this.bounds.limit) {
      return this.markConsumed();
    }

    const next = await this.source.next();
    if (next.done) {
      return this.markConsumed();
    }
    this.indexWithRowBound++;
    return next;
  }

  private async markConsumed(): Promise<IteratorResult<T, undefined>> {
    this.status = 'consumed';
    await this.source.close();
    return { done: true, value: undefined };
  }
}

/**
 * Row source over rows that are already in memory.
 */
export const rowSourceFromArray = <T>(rows: readonly T[]): RowSource<T> => {
  let index = 0;
  return {
    async next() {
      return index < rows.length ? { done: false, value: rows[index++] } : { done: true, value: undefined };
    },
    async close() {},
  };
};
