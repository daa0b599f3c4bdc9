type Waiter = () => void;

/**
 * Bounded single-producer / single-consumer queue. `send` suspends while the buffer
 * is full; once the consumer detaches every send resolves immediately and the
 * value is dropped.
 */
export class ProgressChannel<T> implements AsyncIterable<T> {
  private readonly buffer: Array<{ value: T }> = [];
  private readonly capacity: number;
  private readonly senders: Waiter[] = [];
  private receiver: Waiter | null = null;
  private closed = false;
  private detached = false;
  private iterating = false;

  constructor(capacity = 64) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`ProgressChannel capacity must be a positive integer, got ${capacity}`);
    }

    this.capacity = capacity;
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get isDetached(): boolean {
    return this.detached;
  }

  async send(value: T): Promise<void> {
    if (this.closed) {
      throw new Error('Cannot send on a closed ProgressChannel');
    }

    while (!this.detached && this.buffer.length >= this.capacity) {
      await new Promise<void>((resolve) => this.senders.push(resolve));
    }

    if (this.detached) {
      return;
    }

    this.buffer.push({ value });
    this.wakeReceiver();
  }

  /** No further sends; buffered values are still delivered. */
  close(): void {
    if (this.closed) {
      return;
    }

    this.closed = true;
    this.wakeReceiver();
  }

  /** Consumer side gives up: drop what is buffered and release blocked senders. */
  detach(): void {
    this.detached = true;
    this.buffer.length = 0;
    this.releaseSenders();
    this.wakeReceiver();
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    if (this.iterating) {
      throw new Error('ProgressChannel supports a single consumer');
    }

    this.iterating = true;

    return {
      next: async (): Promise<IteratorResult<T>> => {
        while (true) {
          if (this.detached) {
            return { done: true, value: undefined };
          }

          const item = this.buffer.shift();

          if (item) {
            this.releaseOneSender();
            return { done: false, value: item.value };
          }

          if (this.closed) {
            return { done: true, value: undefined };
          }

          await new Promise<void>((resolve) => {
            this.receiver = resolve;
          });
        }
      },
      return: async (): Promise<IteratorResult<T>> => {
        this.detach();
        return { done: true, value: undefined };
      },
    };
  }

  private wakeReceiver(): void {
    const receiver = this.receiver;
    this.receiver = null;
    receiver?.();
  }

  private releaseOneSender(): void {
    this.senders.shift()?.();
  }

  private releaseSenders(): void {
    while (this.senders.length > 0) {
      this.releaseOneSender();
    }
  }
}
