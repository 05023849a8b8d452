/**
 * Push-based queue read with `for await`. One consumer; ends after `close`
 * once drained, or throws the error given to `fail`.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private readonly items: T[];
  private wake: (() => void) | undefined;
  private closed: boolean;
  private failure: { error: unknown } | undefined;

  constructor() {
    this.items = [];
    this.closed = false;
  }

  push(item: T): void {
    if (this.closed) {
      return;
    }

    this.items.push(item);
    this.notify();
  }

  close(): void {
    this.closed = true;
    this.notify();
  }

  fail(error: unknown): void {
    this.failure = { error };
    this.close();
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      const item = this.items.shift();
      if (item !== undefined) {
        yield item;
        continue;
      }

      if (this.failure) {
        throw this.failure.error;
      }
      if (this.closed) {
        return;
      }

      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = undefined;
    wake?.();
  }
}
