/**
 * @fileoverview Single-producer, single-consumer queue between the child's
 * output reader and the supervisor loop.
 */

export type QueueItem = { type: 'line'; line: string } | { type: 'end' } | { type: 'timeout' };

/**
 * Unbounded FIFO of lines followed by one end marker.
 *
 * The consumer waits with a bound, so it regains control during silence.
 * Only one `take()` may be pending at a time.
 */
export class LineQueue {
  private readonly items: QueueItem[] = [];
  private closed = false;
  private waiter: ((item: QueueItem) => void) | undefined;

  push(line: string): void {
    if (this.closed) {
      return;
    }
    this.deliver({ type: 'line', line });
  }

  /** Marks end of stream. Later pushes are ignored. */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.deliver({ type: 'end' });
  }

  get size(): number {
    return this.items.length;
  }

  /**
   * Next item, or `{ type: 'timeout' }` after `timeoutMs` or when `signal`
   * aborts. Without a timeout it waits indefinitely.
   */
  take(timeoutMs?: number, signal?: AbortSignal): Promise<QueueItem> {
    const ready = this.items.shift();
    if (ready) {
      return Promise.resolve(ready);
    }
    if (this.waiter) {
      return Promise.reject(new Error('LineQueue supports a single pending take()'));
    }
    if (signal?.aborted) {
      return Promise.resolve({ type: 'timeout' });
    }

    return new Promise<QueueItem>((resolve) => {
      let timer: NodeJS.Timeout | undefined;

      const finish = (item: QueueItem): void => {
        if (timer) {
          clearTimeout(timer);
        }
        signal?.removeEventListener('abort', onAbort);
        this.waiter = undefined;
        resolve(item);
      };
      const onAbort = (): void => finish({ type: 'timeout' });

      this.waiter = finish;
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => finish({ type: 'timeout' }), timeoutMs);
      }
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private deliver(item: QueueItem): void {
    if (this.waiter) {
      this.waiter(item);
    } else {
      this.items.push(item);
    }
  }
}
