import type { LifespanHandler, LifespanPhase } from './LifespanHandler';

/**
 * Ordered startup and shutdown handlers of one application
 */
export class LifecycleRegistry<App = unknown> {

  private readonly handlers: Record<LifespanPhase, Array<LifespanHandler<App>>> = {
    startup: [],
    shutdown: [],
  };

  public get startup(): ReadonlyArray<LifespanHandler<App>> {
    return this.handlers.startup;
  }

  public get shutdown(): ReadonlyArray<LifespanHandler<App>> {
    return this.handlers.shutdown;
  }

  public add(handler: LifespanHandler<App>): this {
    this.handlers[handler.phase].push(handler);
    return this;
  }

  /**
   * Puts a handler in front of every handler of its phase
   */
  public prepend(handler: LifespanHandler<App>): this {
    this.handlers[handler.phase].unshift(handler);
    return this;
  }

}
