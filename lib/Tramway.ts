import { resolveConfig, type TramwayConfig, type TramwayConfigInput } from './config';
import type { ConfigService } from './defaults/ConfigService';
import { TramwayError } from './errors';
import { LifecycleCoordinator, type LifecycleState } from './lifecycle/LifecycleCoordinator';
import { LifecycleRegistry } from './lifecycle/LifecycleRegistry';
import { lifespan, type LifespanHandler } from './lifecycle/LifespanHandler';
import { createDefaultLogger, type ServerLogger } from './logger';
import { ExceptionMiddleware } from './middlewares/ExceptionMiddleware';
import { MiddlewareChain } from './middlewares/MiddlewareChain';
import type { ConverterMap } from './routing/converters';
import type { Route, RouteOptions } from './routing/Route';
import { Router, type RouteShortcutOptions } from './routing/Router';
import type { ChannelApp, HttpScope, Receive, Scope, Send } from './types/Channel';
import type { Middleware, TramwayHandler } from './types/Handler';

/**
 * Options accepted by Tramway
 */
export interface TramwayOptions extends TramwayConfigInput {

  /**
   * Custom logger instance
   * If not provided, a console logger is used
   */
  logger?: ServerLogger;

  /**
   * Application middleware, outermost first; runs inside the fault boundary and any
   * class-level middleware
   */
  middleware?: Middleware[];

  /**
   * Startup and shutdown handlers, run after the ones the class declares
   */
  lifespans?: Array<LifespanHandler<Tramway>>;

  /**
   * Global error handler
   */
  config?: ConfigService;

  /**
   * Router to serve; a fresh one is created when omitted
   */
  router?: Router;

  /**
   * Converters for the fresh router; ignored when `router` is given
   */
  converters?: ConverterMap;
}

/**
 * Tramway - channel application
 *
 * Serves the three channel kinds a hosting server opens: the lifespan channel goes
 * to the lifecycle coordinator, http channels go through the application chain
 * (fault boundary, class-level middleware, application middleware, then the router),
 * websocket channels are accepted and left alone.
 *
 * @example
 * ```typescript
 * const app = new Tramway({ name: 'api' });
 *
 * app.get('/health', () => ({ status: 'ok' }));
 * app.post('/users/{id:int}', async (request) => updateUser(request.getParam('id'), await request.json()));
 *
 * const server = new NodeServer(app, { port: 3000 });
 * await server.start();
 * ```
 *
 * @example
 * ```typescript
 * // Class-level middleware and lifespan handlers
 * class Api extends Tramway {
 *   protected override declareMiddleware() {
 *     return [...super.declareMiddleware(), new RequestIdMiddleware()];
 *   }
 *
 *   protected override declareLifespans() {
 *     return [...super.declareLifespans(), lifespan.startup((state) => state.set('pool', createPool()))];
 *   }
 * }
 * ```
 */
export class Tramway {

  public readonly name: string;

  public readonly logger: ServerLogger;

  public readonly router: Router;

  public readonly settings: TramwayConfig;

  protected readonly lifecycle = new LifecycleRegistry<Tramway>();

  private readonly stack: Middleware[];

  private readonly errorConfig?: ConfigService;

  private readonly optionLifespans: Array<LifespanHandler<Tramway>>;

  private declared = false;

  private readonly chain: MiddlewareChain;

  private readonly coordinator: LifecycleCoordinator<Tramway>;

  private announced = false;

  /**
   * @throws ZodError when a setting is invalid
   */
  public constructor(options: TramwayOptions = {}) {
    this.settings = resolveConfig({
      name: options.name,
      debug: options.debug,
      buildOnStartup: options.buildOnStartup,
      rootPath: options.rootPath,
    });
    this.name = this.settings.name;
    this.logger = options.logger ?? createDefaultLogger();
    this.router = options.router ?? new Router({ converters: options.converters });

    this.errorConfig = options.config;
    this.optionLifespans = options.lifespans ?? [];
    this.stack = [...(options.middleware ?? [])];
    this.chain = new MiddlewareChain(
      `application ${this.name}`,
      this.stack,
      (scope, receive, send) => this.router.dispatch(scope, receive, send),
      this.logger,
    );

    this.lifecycle.add(
      lifespan.startup(
        async () => {
          if (this.settings.buildOnStartup) {
            await this.ensureChainBuilt();
          }
        },
        { name: `${this.name} chain builder` },
      ),
    );

    this.coordinator = new LifecycleCoordinator({
      app: this,
      appName: this.name,
      registry: this.lifecycle,
      logger: this.logger,
    });
  }

  /**
   * Where the lifespan handshake stands
   */
  public get lifecycleState(): LifecycleState {
    return this.coordinator.state;
  }

  public get chainBuilt(): boolean {
    return this.chain.built;
  }

  /**
   * Adds application middleware after the ones already registered
   *
   * @throws TramwayError once the application chain is being built or built
   */
  public use(...middleware: Middleware[]): this {
    if (this.chain.started) {
      const reason = this.chain.built ? 'already built' : 'being built';

      throw new TramwayError(`Cannot add middleware to ${this.name}: the application chain is ${reason}`);
    }

    this.stack.push(...middleware);
    return this;
  }

  public addRoute(route: Route): Route {
    return this.router.addRoute(route);
  }

  public route(path: string, handler: TramwayHandler, options: RouteOptions = {}): Route {
    return this.router.route(path, handler, options);
  }

  public get(path: string, handler: TramwayHandler, options?: RouteShortcutOptions): Route {
    return this.router.get(path, handler, options);
  }

  public post(path: string, handler: TramwayHandler, options?: RouteShortcutOptions): Route {
    return this.router.post(path, handler, options);
  }

  public put(path: string, handler: TramwayHandler, options?: RouteShortcutOptions): Route {
    return this.router.put(path, handler, options);
  }

  public patch(path: string, handler: TramwayHandler, options?: RouteShortcutOptions): Route {
    return this.router.patch(path, handler, options);
  }

  public delete(path: string, handler: TramwayHandler, options?: RouteShortcutOptions): Route {
    return this.router.delete(path, handler, options);
  }

  /**
   * Builds the application chain once; concurrent callers share the build
   *
   * @throws MiddlewareLoadError when a middleware load hook fails
   */
  public async ensureChainBuilt(): Promise<ChannelApp> {
    this.collectDeclarations();

    const entry = await this.chain.build();

    if (!this.announced) {
      this.announced = true;
      this.logger.info(
        `${this.name} ready: ${this.stack.length} middleware, ${this.router.routes.length} routes`,
        this.router.routes.map((route) => route.toString()),
      );
    }

    return entry;
  }

  /**
   * Entry point for a hosting server, one call per channel
   */
  public async handle(scope: Scope, receive: Receive, send: Send): Promise<void> {
    switch (scope.type) {
      case 'lifespan':
        this.collectDeclarations();
        await this.coordinator.run(scope, receive, send);
        return;
      case 'http':
        await this.handleHttp(scope, receive, send);
        return;
      case 'websocket':
        if (this.settings.debug) {
          this.logger.info(`${this.name} does not handle websocket channels (${scope.path})`);
        }
    }
  }

  /**
   * `handle` bound to this application
   */
  public toChannelApp(): ChannelApp {
    return (scope, receive, send) => this.handle(scope, receive, send);
  }

  /**
   * Class-level middleware, placed between the fault boundary and the application
   * middleware; subclasses extend `super.declareMiddleware()`
   *
   * Called once, on the first lifespan or http channel, so subclass fields are set.
   */
  protected declareMiddleware(): Middleware[] {
    return [];
  }

  /**
   * Class-level lifespan handlers, run before the ones passed as options; subclasses
   * extend `super.declareLifespans()` so base handlers come first
   *
   * Called once, on the first lifespan or http channel, so subclass fields are set.
   */
  protected declareLifespans(): Array<LifespanHandler<Tramway>> {
    return [];
  }

  /**
   * Pulls in the class-level middleware and lifespans on first use
   */
  private collectDeclarations(): void {
    if (this.declared) {
      return;
    }

    this.declared = true;
    this.stack.unshift(
      new ExceptionMiddleware({ logger: this.logger, debug: this.settings.debug, config: this.errorConfig }),
      ...this.declareMiddleware(),
    );

    for (const handler of [...this.declareLifespans(), ...this.optionLifespans]) {
      this.lifecycle.add(handler);
    }
  }

  private async handleHttp(scope: HttpScope, receive: Receive, send: Send): Promise<void> {
    if (scope.root_path === undefined && this.settings.rootPath !== undefined) {
      scope.root_path = this.settings.rootPath;
    }

    scope.app = this;

    const entry = await this.ensureChainBuilt();

    await entry(scope, receive, send);
  }

}
