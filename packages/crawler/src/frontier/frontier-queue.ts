import type { FrontierEntry } from './types.js';

/**
 * FIFO of discovered URLs. A URL is visited from the moment it is enqueued,
 * so a link seen on two pages of the same layer is queued once, at the depth
 * of its first discovery.
 */
export class FrontierQueue {
  private readonly entries: FrontierEntry[];
  private readonly visited: Set<string>;
  private head: number;

  constructor() {
    this.entries = [];
    this.visited = new Set();
    this.head = 0;
  }

  enqueue(url: string, depth: number, discoveredFrom: string | null): boolean {
    if (this.visited.has(url)) {
      return false;
    }

    this.visited.add(url);
    this.entries.push(Object.freeze({ url, depth, discoveredFrom }));
    return true;
  }

  /** Records a URL reached some other way, such as a redirect target. */
  markVisited(url: string): void {
    this.visited.add(url);
  }

  dequeue(): FrontierEntry | undefined {
    const entry = this.entries[this.head];
    if (entry) {
      this.head += 1;
    }

    return entry;
  }

  hasVisited(url: string): boolean {
    return this.visited.has(url);
  }

  get pending(): number {
    return this.entries.length - this.head;
  }

  get visitedCount(): number {
    return this.visited.size;
  }
}
