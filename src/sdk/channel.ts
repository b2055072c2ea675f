/**
 * EventChannel: a single-consumer async queue.
 *
 * Bridges push-based delivery (socket callbacks, session effects) into
 * pull-based `for await...of` iteration.
 *
 * @example
 * ```ts
 * const channel = new EventChannel<string>();
 * channel.push("a");
 * channel.close();
 * for await (const item of channel.iterate()) console.log(item);
 * ```
 */

export class EventChannel<T extends NonNullable<unknown>> {
  readonly #items: T[] = [];
  #closed = false;
  #resolve: (() => void) | null = null;

  /** Whether close() has been called. */
  get closed(): boolean {
    return this.#closed;
  }

  /** Queue an item. Ignored once the channel is closed. */
  push(item: T): void {
    if (this.#closed) return;
    this.#items.push(item);
    this.#wake();
  }

  /** End the channel after buffered items are drained. Idempotent. */
  close(): void {
    if (this.#closed) return;
    this.#closed = true;
    this.#wake();
  }

  /**
   * Iterate buffered and future items. Aborting the signal ends the
   * iteration quietly; items still buffered stay in the queue.
   */
  async *iterate(signal?: AbortSignal): AsyncGenerator<T, void, undefined> {
    const onAbort = (): void => this.#wake();
    signal?.addEventListener("abort", onAbort, { once: true });
    try {
      while (true) {
        if (signal?.aborted) return;

        const next = this.#items.shift();
        if (next !== undefined) {
          yield next;
          continue;
        }

        if (this.#closed) return;

        await new Promise<void>((r) => {
          this.#resolve = r;
        });
        this.#resolve = null;
      }
    } finally {
      signal?.removeEventListener("abort", onAbort);
      this.#resolve = null;
    }
  }

  #wake(): void {
    this.#resolve?.();
  }
}
