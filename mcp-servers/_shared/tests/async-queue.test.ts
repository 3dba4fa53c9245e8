import { describe, it, expect } from 'vitest';
import { AsyncQueue } from '../ts/async-queue';

describe('AsyncQueue', () => {
  it('should hand items to waiting consumers in order', async () => {
    const queue = new AsyncQueue<string>();
    const first = queue.shift();
    const second = queue.shift();
    queue.push('a');
    queue.push('b');

    expect(await first).toBe('a');
    expect(await second).toBe('b');
  });

  it('should drain buffered items before ending after close', async () => {
    const queue = new AsyncQueue<number>();
    queue.push(1);
    queue.push(2);
    queue.close();

    const seen: number[] = [];
    for await (const item of queue.drain()) seen.push(item);
    expect(seen).toEqual([1, 2]);
  });

  it('should release waiters on close and refuse new items', async () => {
    const queue = new AsyncQueue<string>();
    const pending = queue.shift();
    queue.close();

    expect(await pending).toBeUndefined();
    expect(() => queue.push('late')).toThrow('AsyncQueue is closed');
  });
});
