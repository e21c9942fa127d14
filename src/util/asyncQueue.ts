/**
 * Bounded Async Queue
 *
 * FIFO buffer shared by one producer side and one consumer loop.
 * Producers choose between `offer` (never waits, reports a full queue) and
 * `put` (waits for room). Consumers `take` one item at a time.
 */

type Waiter<T> = (item: T | undefined) => void;

export class QueueClosedError extends Error {
  constructor() {
    super('Queue is closed');
    this.name = 'QueueClosedError';
  }
}

export class AsyncQueue<T> {
  private readonly items: T[] = [];
  private readonly takers: Waiter<T>[] = [];
  private readonly putters: Array<{ item: T; resolve: () => void; reject: (err: Error) => void }> = [];
  private isClosed = false;

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Adds an item without waiting
   *
   * @returns false when the queue is full or closed
   */
  offer(item: T): boolean {
    if (this.isClosed) return false;
    const taker = this.takers.shift();
    if (taker) {
      taker(item);
      return true;
    }
    if (this.items.length >= this.capacity) return false;
    this.items.push(item);
    return true;
  }

  /**
   * Adds an item, waiting for room when the queue is full
   *
   * @throws QueueClosedError if the queue is (or becomes) closed first
   */
  put(item: T): Promise<void> {
    if (this.offer(item)) return Promise.resolve();
    if (this.isClosed) return Promise.reject(new QueueClosedError());
    return new Promise<void>((resolve, reject) => {
      this.putters.push({ item, resolve, reject });
    });
  }

  /**
   * Removes the oldest item, waiting for one if the queue is empty
   *
   * Resolves `undefined` once the queue is closed and drained, or when
   * `signal` aborts before an item arrives.
   */
  take(signal?: AbortSignal): Promise<T | undefined> {
    if (this.items.length > 0) {
      const item = this.items.shift();
      this.admitPutter();
      return Promise.resolve(item);
    }
    if (this.isClosed || signal?.aborted) return Promise.resolve(undefined);

    return new Promise<T | undefined>((resolve) => {
      const onAbort = () => {
        const index = this.takers.indexOf(waiter);
        if (index !== -1) this.takers.splice(index, 1);
        resolve(undefined);
      };
      const waiter: Waiter<T> = (item) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(item);
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.takers.push(waiter);
    });
  }

  /**
   * Closes the queue. Buffered items stay available to `take`.
   *
   * @returns false if the queue was already closed
   */
  close(): boolean {
    if (this.isClosed) return false;
    this.isClosed = true;
    for (const taker of this.takers.splice(0)) taker(undefined);
    for (const putter of this.putters.splice(0)) putter.reject(new QueueClosedError());
    return true;
  }

  private admitPutter(): void {
    const putter = this.putters.shift();
    if (!putter) return;
    this.items.push(putter.item);
    putter.resolve();
  }
}
