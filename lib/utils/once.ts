/**
 * Single-flight initialization
 *
 * `run()` starts the factory on first use; callers arriving while it is in flight
 * share the same promise, and every later caller gets the settled value. A rejected
 * run is forgotten so the next caller starts a fresh attempt.
 *
 * @example
 * ```typescript
 * const stack = new Once(() => buildStack());
 *
 * const [a, b] = await Promise.all([stack.run(), stack.run()]);
 * // buildStack() ran once, a === b
 * ```
 */
export class Once<T> {

  private readonly factory: () => Promise<T>;

  private pending: Promise<T> | null = null;

  private settled: { value: T } | null = null;

  public constructor(factory: () => Promise<T>) {
    this.factory = factory;
  }

  /**
   * True once the factory has resolved
   */
  public get done(): boolean {
    return this.settled !== null;
  }

  /**
   * True while the factory is in flight or once it has resolved
   */
  public get started(): boolean {
    return this.pending !== null || this.settled !== null;
  }

  /**
   * The resolved value, if any
   */
  public get value(): T | undefined {
    return this.settled?.value;
  }

  public run(): Promise<T> {
    if (this.settled) {
      return Promise.resolve(this.settled.value);
    }

    if (!this.pending) {
      this.pending = this.start();
    }

    return this.pending;
  }

  private async start(): Promise<T> {
    try {
      const value = await this.factory();

      this.settled = { value };
      return value;
    } finally {
      this.pending = null;
    }
  }

}
