/**
 * Bounded FIFO channel between two async parties.
 *
 * The non-blocking side uses trySend / tryReceive; the worker side may
 * await send / receive. After close(), buffered items can still be
 * received, new sends are refused and every waiter is released.
 */

export class Channel<T extends NonNullable<unknown>> {
  readonly capacity: number;
  private readonly buffer: T[] = [];
  private readonly receivers: Array<(item: T | undefined) => void> = [];
  private readonly senders: Array<() => void> = [];
  private closed = false;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer. Got: ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Enqueue without waiting; false when the channel is full or closed. */
  trySend(item: T): boolean {
    if (this.closed) return false;

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(item);
      return true;
    }

    if (this.buffer.length >= this.capacity) return false;
    this.buffer.push(item);
    return true;
  }

  /** Enqueue, waiting for room; false if the channel closes first. */
  async send(item: T): Promise<boolean> {
    while (!this.trySend(item)) {
      if (this.closed) return false;
      await new Promise<void>((resolve) => {
        this.senders.push(resolve);
      });
    }
    return true;
  }

  /** Dequeue without waiting; undefined when empty. */
  tryReceive(): T | undefined {
    const item = this.buffer.shift();
    if (item !== undefined) {
      this.senders.shift()?.();
    }
    return item;
  }

  /** Dequeue, waiting for an item; undefined once closed and drained. */
  receive(): Promise<T | undefined> {
    const item = this.tryReceive();
    if (item !== undefined || this.closed) {
      return Promise.resolve(item);
    }
    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const receiver of this.receivers.splice(0)) receiver(undefined);
    for (const sender of this.senders.splice(0)) sender();
  }
}
