import { describe, expect, it } from 'vitest';

import { ExecutorError } from '../../src/core/errors.js';
import { DefaultCursor, type RowSource, rowSourceFromArray } from '../../src/core/execution/cursor.js';
import { RowBounds } from '../../src/core/mapping/row-bounds.js';

const trackedSource = (rows: number[]) => {
  const state = { fetched: 0, closed: 0 };
  const inner = rowSourceFromArray(rows);
  const source: RowSource<number> = {
    async next() {
      state.fetched++;
      return inner.next();
    },
    async close() {
      state.closed++;
    },
  };
  return { source, state };
};

const collect = async <T>(iterable: AsyncIterable<T>): Promise<T[]> => {
  const rows: T[] = [];
  for await (const row of iterable) {
    rows.push(row);
  }
  return rows;
};

describe('DefaultCursor', () => {
  it('should yield every row and end consumed', async () => {
    const { source, state } = trackedSource([1, 2, 3]);
    const cursor = new DefaultCursor(source);

    expect(cursor.getCurrentIndex()).toBe(-1);
    expect(await collect(cursor)).toEqual([1, 2, 3]);
    expect(cursor.isConsumed()).toBe(true);
    expect(cursor.isOpen()).toBe(false);
    expect(cursor.getCurrentIndex()).toBe(2);
    expect(state.closed).toBe(1);
  });

  it('should apply the pagination window', async () => {
    const { source, state } = trackedSource([1, 2, 3, 4, 5]);
    const cursor = new DefaultCursor(source, new RowBounds(1, 2));

    expect(await collect(cursor)).toEqual([2, 3]);
    expect(cursor.getCurrentIndex()).toBe(2);
    expect(state.fetched).toBe(3);
  });

  it('should close when iteration stops early', async () => {
    const { source, state } = trackedSource([1, 2, 3]);
    const cursor = new DefaultCursor(source);

    for await (const row of cursor) {
      expect(row).toBe(1);
      expect(cursor.isOpen()).toBe(true);
      break;
    }

    expect(cursor.isOpen()).toBe(false);
    expect(cursor.isConsumed()).toBe(false);
    expect(state.closed).toBe(1);
  });

  it('should only be iterated once', async () => {
    const cursor = new DefaultCursor(rowSourceFromArray([1]));
    await collect(cursor);

    await expect(collect(cursor)).rejects.toThrow(ExecutorError);
  });

  it('should refuse iteration after close', async () => {
    const cursor = new DefaultCursor(rowSourceFromArray([1]));
    await cursor.close();

    await expect(collect(cursor)).rejects.toThrow('A Cursor is already closed.');
  });
});
