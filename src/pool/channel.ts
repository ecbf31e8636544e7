/**
 * Unbounded multi-producer/multi-consumer FIFO channel
 * Closing is the only shutdown signal; queued items still drain after close
 */

export type Received<T> = { ok: true; value: T } | { ok: false };

export class ChannelClosedError extends Error {
  constructor() {
    super('Channel is closed');
    this.name = 'ChannelClosedError';
  }
}

export class Channel<T> {
  private items: Array<{ value: T }> = [];
  private waiters: Array<(result: Received<T>) => void> = [];
  private closed = false;

  /**
   * Hand an item to the longest-waiting receiver, or buffer it
   */
  send(value: T): void {
    if (this.closed) throw new ChannelClosedError();

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ ok: true, value });
      return;
    }
    this.items.push({ value });
  }

  /**
   * Resolves with the next item, or `{ ok: false }` once closed and drained
   */
  receive(): Promise<Received<T>> {
    const next = this.items.shift();
    if (next) return Promise.resolve({ ok: true, value: next.value });
    if (this.closed) return Promise.resolve({ ok: false });

    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    // Buffered items imply no waiters, so only idle receivers are woken here
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter({ ok: false });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Items buffered and not yet received */
  get length(): number {
    return this.items.length;
  }

  /** Receivers currently parked on an empty channel */
  get waiting(): number {
    return this.waiters.length;
  }
}
