import { MiddlewareLoadError } from '../errors';
import type { ServerLogger } from '../logger';
import type { ChannelApp } from '../types/Channel';
import type { Middleware } from '../types/Handler';
import { Once } from '../utils/once';

/**
 * In-flight or settled load hooks, per middleware instance
 *
 * A middleware shared by several chains is still loaded once.
 */
const loads = new WeakMap<Middleware, Promise<void>>();

const loaded = new WeakSet<Middleware>();

/**
 * Display name used in logs and load faults
 */
export function describeMiddleware(middleware: Middleware): string {
  if (middleware.name) {
    return middleware.name;
  }

  const constructorName = middleware.constructor?.name;

  return constructorName && constructorName !== 'Object' ? constructorName : 'anonymous middleware';
}

export function hasLoaded(middleware: Middleware): boolean {
  return loaded.has(middleware) || typeof middleware.onLoad !== 'function';
}

/**
 * Runs a middleware's load hook at most once; concurrent callers share the run
 */
export function loadMiddleware(middleware: Middleware): Promise<void> {
  const hook = middleware.onLoad;

  if (typeof hook !== 'function' || loaded.has(middleware)) {
    return Promise.resolve();
  }

  let pending = loads.get(middleware);

  if (!pending) {
    pending = (async () => {
      try {
        await hook.call(middleware);
        loaded.add(middleware);
      } finally {
        loads.delete(middleware);
      }
    })();

    loads.set(middleware, pending);
  }

  return pending;
}

/**
 * MiddlewareChain - lazily assembled processing chain
 *
 * Used for the application stack (terminal: the router) and for each route's
 * private stack (terminal: the adapted handler).
 *
 * Assembly walks the middleware list back to front. Each middleware is loaded if it
 * has not been yet, then wrapped in a node whose successor is the node built before
 * it. The first-declared middleware therefore sees the request first and the response
 * last. The entry point is published only after every hook succeeded.
 *
 * The middleware array is read when the build runs, not when the chain is created.
 */
export class MiddlewareChain {

  /**
   * Route or application the chain belongs to (used in load faults)
   */
  public readonly owner: string;

  private readonly middleware: readonly Middleware[];

  private readonly terminal: ChannelApp;

  private readonly logger?: ServerLogger;

  private readonly once: Once<ChannelApp>;

  public constructor(owner: string, middleware: readonly Middleware[], terminal: ChannelApp, logger?: ServerLogger) {
    this.owner = owner;
    this.middleware = middleware;
    this.terminal = terminal;
    this.logger = logger;
    this.once = new Once(() => this.assemble());
  }

  /**
   * True once the entry point is available
   */
  public get built(): boolean {
    return this.once.done;
  }

  /**
   * True while a build is in flight or once the chain is built
   */
  public get started(): boolean {
    return this.once.started;
  }

  /**
   * Entry point of the built chain, if built
   */
  public get entry(): ChannelApp | undefined {
    return this.once.value;
  }

  /**
   * Builds the chain once and returns its entry point
   *
   * Concurrent callers share one build. A failed build publishes nothing and the
   * next call tries again; hooks that already succeeded are not re-run.
   *
   * @throws MiddlewareLoadError when a load hook fails
   */
  public build(): Promise<ChannelApp> {
    return this.once.run();
  }

  private async assemble(): Promise<ChannelApp> {
    const stopProfile = this.logger?.profile(`Middleware chain built for ${this.owner}`);
    let previous: ChannelApp = this.terminal;

    for (let index = this.middleware.length - 1; index >= 0; index--) {
      const middleware = this.middleware[index];

      try {
        await loadMiddleware(middleware);
      } catch (error) {
        throw new MiddlewareLoadError(describeMiddleware(middleware), this.owner, error);
      }

      const next = previous;

      previous = (scope, receive, send) => middleware.handle(scope, receive, send, next);
    }

    stopProfile?.();
    return previous;
  }

}
