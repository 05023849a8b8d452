import { describe, it, expect } from 'vitest';
import { FrontierQueue } from './frontier-queue.js';

describe('FrontierQueue', () => {
  it('dequeues in insertion order', () => {
    const queue = new FrontierQueue();
    queue.enqueue('https://example.com/', 0, null);
    queue.enqueue('https://example.com/a', 1, 'https://example.com/');

    expect(queue.dequeue()?.url).toBe('https://example.com/');
    expect(queue.dequeue()).toEqual({
      url: 'https://example.com/a',
      depth: 1,
      discoveredFrom: 'https://example.com/',
    });
    expect(queue.dequeue()).toBeUndefined();
  });

  it('keeps the first discovery of a URL', () => {
    const queue = new FrontierQueue();

    expect(queue.enqueue('https://example.com/a', 1, 'https://example.com/')).toBe(true);
    expect(queue.enqueue('https://example.com/a', 2, 'https://example.com/b')).toBe(false);
    expect(queue.pending).toBe(1);
    expect(queue.dequeue()?.depth).toBe(1);
  });

  it('remembers dequeued URLs as visited', () => {
    const queue = new FrontierQueue();
    queue.enqueue('https://example.com/', 0, null);
    queue.dequeue();

    expect(queue.enqueue('https://example.com/', 1, null)).toBe(false);
    expect(queue.hasVisited('https://example.com/')).toBe(true);
    expect(queue.visitedCount).toBe(1);
    expect(queue.pending).toBe(0);
  });
});
