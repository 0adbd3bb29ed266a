export const DEFAULT_CHANNEL_CAPACITY = 50;

type Receiver<T> = {
  readonly resolve: (result: IteratorResult<T, undefined>) => void;
  readonly reject: (error: Error) => void;
};

/**
 * Bounded single-producer, single-consumer queue.
 *
 * `send` waits while the buffer is full and resolves `false` once the channel
 * is closed. A producer error passed to `close` is raised by the consumer only
 * after everything already buffered has been received.
 */
export class Channel<T> implements AsyncIterable<T> {
  private readonly buffer: Array<{ readonly value: T }> = [];
  private readonly capacity: number;
  private readonly waitingSenders: Array<() => void> = [];
  private receiver: Receiver<T> | null = null;
  private closed = false;
  private failure: Error | null = null;

  constructor(capacity: number = DEFAULT_CHANNEL_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`channel capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async send(value: T): Promise<boolean> {
    while (!this.closed && this.buffer.length >= this.capacity) {
      await new Promise<void>((resolve) => {
        this.waitingSenders.push(resolve);
      });
    }

    if (this.closed) {
      return false;
    }

    if (this.receiver) {
      const receiver = this.receiver;
      this.receiver = null;
      receiver.resolve({ value, done: false });
      return true;
    }

    this.buffer.push({ value });
    return true;
  }

  close(error?: Error): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.failure = error ?? null;

    for (const wake of this.waitingSenders.splice(0)) {
      wake();
    }

    if (this.receiver) {
      const receiver = this.receiver;
      this.receiver = null;
      if (this.failure) {
        const failure = this.failure;
        this.failure = null;
        receiver.reject(failure);
      } else {
        receiver.resolve({ value: undefined, done: true });
      }
    }
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    const entry = this.buffer.shift();
    if (entry) {
      this.waitingSenders.shift()?.();
      return Promise.resolve({ value: entry.value, done: false });
    }

    if (this.failure) {
      const failure = this.failure;
      this.failure = null;
      return Promise.reject(failure);
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve, reject) => {
      this.receiver = { resolve, reject };
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.receive(),
      return: async () => {
        this.close();
        return { value: undefined, done: true };
      },
    };
  }
}
