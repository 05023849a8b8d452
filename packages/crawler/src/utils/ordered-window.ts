type Slot<T, R> = {
  item: T;
  promise: Promise<R>;
};

/**
 * Runs up to `size` jobs at once and yields their values in the order the
 * items were taken from `next`. The window is refilled only when the
 * consumer asks for the next value, so anything the consumer adds to the
 * source while handling a value is seen by the following `next()` call.
 *
 * `next` returning undefined stops refilling; jobs already started are
 * still awaited and yielded.
 */
export async function* releaseInOrder<T, R>(
  next: () => T | undefined,
  work: (item: T) => Promise<R>,
  size: number,
): AsyncGenerator<{ item: T; value: R }> {
  const window: Slot<T, R>[] = [];

  const fill = (): void => {
    while (window.length < Math.max(1, size)) {
      const item = next();
      if (item === undefined) {
        return;
      }

      const promise = work(item);
      // the rejection surfaces when this slot reaches the head
      promise.catch(() => undefined);
      window.push({ item, promise });
    }
  };

  fill();
  let head = window.shift();
  while (head) {
    const value = await head.promise;
    yield { item: head.item, value };
    fill();
    head = window.shift();
  }
}
