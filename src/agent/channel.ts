// ── TurnChannel — coordinator → caller message channel ──
// Unbounded single-consumer queue. The producer never waits on the reader;
// the reader awaits the next message or the end of the channel.

export class TurnChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private waiting: ((result: IteratorResult<T, undefined>) => void) | undefined;
  private closed = false;
  private iterated = false;

  push(message: T): void {
    if (this.closed) return;
    const waiter = this.waiting;
    if (waiter) {
      this.waiting = undefined;
      waiter({ value: message, done: false });
      return;
    }
    this.buffer.push(message);
  }

  /** No more messages. Buffered ones are still delivered. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    const waiter = this.waiting;
    this.waiting = undefined;
    waiter?.({ value: undefined, done: true });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    if (this.iterated) {
      throw new Error("TurnChannel supports a single consumer");
    }
    this.iterated = true;

    return {
      next: () => {
        if (this.buffer.length > 0) {
          const value = this.buffer.shift();
          if (value !== undefined) return Promise.resolve({ value, done: false });
        }
        if (this.closed) return Promise.resolve({ value: undefined, done: true });
        return new Promise((resolve) => {
          this.waiting = resolve;
        });
      },
      return: () => {
        this.buffer.length = 0;
        this.close();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}
