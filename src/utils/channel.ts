/**
 * Unbounded single-consumer channel between pipeline stages.
 *
 * Producers never block. The consumer awaits `receive()` with a timeout so a
 * stage loop can re-check its stop signal between items.
 */
export class Channel<T> {
  private items: T[] = [];
  private waiter: ((item: T | undefined) => void) | null = null;
  private _closed = false;

  /** Enqueue an item. Dropped silently once the channel is closed. */
  push(item: T): void {
    if (this._closed) return;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(item);
      return;
    }
    this.items.push(item);
  }

  /**
   * Next item, or `undefined` when nothing arrives within `timeoutMs`
   * or the channel is closed.
   */
  receive(timeoutMs: number): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }
    if (this._closed) {
      return Promise.resolve(undefined);
    }
    if (this.waiter) {
      return Promise.reject(new Error('Channel already has a pending receiver'));
    }

    return new Promise<T | undefined>((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(undefined);
      }, timeoutMs);
      this.waiter = (item) => {
        clearTimeout(timer);
        resolve(item);
      };
    });
  }

  /** Non-blocking take. */
  tryReceive(): T | undefined {
    return this.items.shift();
  }

  /** Discard everything queued; returns how many items were dropped. */
  drain(): number {
    const dropped = this.items.length;
    this.items = [];
    return dropped;
  }

  /** Wake a pending receiver and refuse further pushes. */
  close(): void {
    this._closed = true;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(undefined);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get closed(): boolean {
    return this._closed;
  }
}
