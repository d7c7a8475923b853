import { describe, expect, it } from 'vitest';

import { AsyncQueue } from './asyncQueue.js';

describe('AsyncQueue', () => {
  it('hands items out in push order', async () => {
    const queue = new AsyncQueue<string>();
    queue.push('first');
    queue.push('second');

    await expect(queue.next()).resolves.toEqual({ value: 'first', done: false });
    await expect(queue.next()).resolves.toEqual({ value: 'second', done: false });
  });

  it('wakes a waiting consumer', async () => {
    const queue = new AsyncQueue<number>();
    const pending = queue.next();

    queue.push(7);

    await expect(pending).resolves.toEqual({ value: 7, done: false });
  });

  it('ends iteration on close and drops what was pending', async () => {
    const queue = new AsyncQueue<string>();
    queue.push('never read');
    queue.close();

    const seen: string[] = [];
    for await (const item of queue) seen.push(item);

    expect(seen).toEqual([]);
    expect(queue.pending).toBe(0);
  });

  it('releases a waiting consumer on close', async () => {
    const queue = new AsyncQueue<string>();
    const pending = queue.next();

    queue.close();

    await expect(pending).resolves.toEqual({ value: undefined, done: true });
  });

  it('rejects pushes after close', () => {
    const queue = new AsyncQueue<string>();
    queue.close();

    expect(queue.push('late')).toBe(false);
    expect(queue.isClosed).toBe(true);
  });
});
