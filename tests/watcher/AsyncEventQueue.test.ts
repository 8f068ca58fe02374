/**
 * Tests for AsyncEventQueue
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { AsyncEventQueue } from '../../src/watcher/AsyncEventQueue.js';

describe('AsyncEventQueue', () => {
  let queue: AsyncEventQueue<string>;

  beforeEach(() => {
    queue = new AsyncEventQueue<string>();
  });

  it('should yield buffered items in order and end after close', async () => {
    queue.push('a');
    queue.push('b');
    queue.close();

    const items: string[] = [];
    for await (const item of queue) {
      items.push(item);
    }

    expect(items).toEqual(['a', 'b']);
  });

  it('should hand a pushed item to a waiting consumer', async () => {
    const pending = queue.next();
    queue.push('a');

    await expect(pending).resolves.toEqual({ value: 'a', done: false });
    expect(queue.size).toBe(0);
  });

  it('should end a waiting consumer on close', async () => {
    const pending = queue.next();
    queue.close();

    await expect(pending).resolves.toEqual({ value: undefined, done: true });
  });

  it('should deliver buffered items before the failure', async () => {
    const failure = new Error('backend gone');
    queue.push('a');
    queue.fail(failure);

    await expect(queue.next()).resolves.toEqual({ value: 'a', done: false });
    await expect(queue.next()).rejects.toBe(failure);
  });

  it('should reject a waiting consumer on failure', async () => {
    const failure = new Error('backend gone');
    const pending = queue.next();
    queue.fail(failure);

    await expect(pending).rejects.toBe(failure);
  });

  it('should refuse items once closed', () => {
    expect(queue.push('a')).toBe(true);
    queue.close();

    expect(queue.push('b')).toBe(false);
    expect(queue.size).toBe(1);
  });

  it('should ignore a failure after close', async () => {
    queue.close();
    queue.fail(new Error('late'));

    await expect(queue.next()).resolves.toEqual({ value: undefined, done: true });
  });

  it('should close when the consumer breaks out', async () => {
    queue.push('a');
    queue.push('b');

    for await (const item of queue) {
      expect(item).toBe('a');
      break;
    }

    expect(queue.push('c')).toBe(false);
    await expect(queue.next()).resolves.toEqual({ value: 'b', done: false });
    await expect(queue.next()).resolves.toEqual({ value: undefined, done: true });
  });
});
