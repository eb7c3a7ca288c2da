interface Waiter<T> {
  resolve(value: T): void;
  reject(error: Error): void;
}

/**
 * Unbounded in-memory message queue
 *
 * Backs the receive side of channels opened in process: `push` never blocks, `next`
 * waits until a message is available. Messages are delivered in push order, and
 * waiting consumers are served in call order.
 *
 * @example
 * ```typescript
 * const inbox = new MessageQueue<ReceiveMessage>();
 *
 * inbox.push({ type: 'lifespan.startup' });
 * await app.handle({ type: 'lifespan' }, () => inbox.next(), send);
 * ```
 */
export class MessageQueue<T> {

  private readonly items: Array<{ value: T }> = [];

  private readonly waiters: Array<Waiter<T>> = [];

  private failure?: Error;

  /**
   * Messages pushed and not yet taken
   */
  public get size(): number {
    return this.items.length;
  }

  public push(value: T): void {
    const waiter = this.waiters.shift();

    if (waiter) {
      waiter.resolve(value);
      return;
    }

    this.items.push({ value });
  }

  public next(): Promise<T> {
    const item = this.items.shift();

    if (item) {
      return Promise.resolve(item.value);
    }

    if (this.failure) {
      return Promise.reject(this.failure);
    }

    return new Promise<T>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /**
   * Rejects every pending and future `next` once queued messages run out
   */
  public fail(error: Error): void {
    this.failure = error;

    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(error);
    }
  }

}
