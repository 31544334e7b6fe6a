/**
 * Tests for the async FIFO queue
 */

import { describe, test, expect } from 'vitest';
import { AsyncQueue } from './async-queue.js';

async function collect<T>(queue: AsyncQueue<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of queue) {
    items.push(item);
  }
  return items;
}

describe('AsyncQueue', () => {
  test('yields items in push order', async () => {
    const queue = new AsyncQueue<number>();
    queue.push(1);
    queue.push(2);
    queue.push(3);
    queue.end();

    expect(await collect(queue)).toEqual([1, 2, 3]);
  });

  test('delivers to a consumer that is already waiting', async () => {
    const queue = new AsyncQueue<string>();
    const consumed = collect(queue);

    queue.push('a');
    queue.push('b');
    queue.end();

    expect(await consumed).toEqual(['a', 'b']);
  });

  test('end() lets queued items drain', async () => {
    const queue = new AsyncQueue<string>();
    queue.push('queued');
    queue.end();

    expect(queue.size).toBe(1);
    expect(await collect(queue)).toEqual(['queued']);
  });

  test('rejects pushes after close', () => {
    const queue = new AsyncQueue<string>();
    queue.end();

    expect(queue.push('late')).toBe(false);
    expect(queue.isClosed).toBe(true);
    expect(queue.size).toBe(0);
  });

  test('cancel() drops queued items', async () => {
    const queue = new AsyncQueue<string>();
    queue.push('dropped');
    queue.cancel();

    expect(await collect(queue)).toEqual([]);
  });

  test('cancel() releases a waiting consumer', async () => {
    const queue = new AsyncQueue<string>();
    const consumed = collect(queue);

    queue.cancel();

    expect(await consumed).toEqual([]);
  });
});
