import { MethodNotAllowedException, NotFoundException } from '../errors';
import type { Receive, Scope, Send } from '../types/Channel';
import type { TramwayHandler } from '../types/Handler';
import { getRoutePath } from '../utils/paths';
import type { ConverterMap } from './converters';
import { Route, type RouteOptions } from './Route';

export type RouteShortcutOptions = Omit<RouteOptions, 'methods'>;

/**
 * Routing decision for one request
 */
export type Resolution =
  | { kind: 'found'; route: Route; params: Record<string, unknown> }
  | { kind: 'method-not-allowed'; allowed: readonly string[] }
  | { kind: 'not-found' };

export interface RouterOptions {

  /**
   * Converters shared by every route of this router; a route's own converters win
   */
  converters?: ConverterMap;

  routes?: Route[];
}

/**
 * Router - ordered route table
 *
 * Routes are tried in registration order and the first full match wins.
 *
 * @example
 * ```typescript
 * const router = new Router();
 *
 * router.get('/users/{id:int}', async (request) => ({ id: request.getParam('id') }));
 * router.post('/users', async (request) => createUser(await request.json()));
 * ```
 */
export class Router {

  public readonly converters: ConverterMap;

  private readonly _routes: Route[] = [];

  public constructor(options: RouterOptions = {}) {
    this.converters = { ...options.converters };

    for (const route of options.routes ?? []) {
      this.addRoute(route);
    }
  }

  public get routes(): readonly Route[] {
    return this._routes;
  }

  /**
   * @throws InvalidRouterError when the route already belongs to a router
   */
  public addRoute(route: Route): Route {
    route.attach(this);
    this._routes.push(route);
    return route;
  }

  public route(path: string, handler: TramwayHandler, options: RouteOptions = {}): Route {
    return this.addRoute(new Route(path, handler, options));
  }

  public get(path: string, handler: TramwayHandler, options: RouteShortcutOptions = {}): Route {
    return this.route(path, handler, { ...options, methods: ['GET'] });
  }

  public post(path: string, handler: TramwayHandler, options: RouteShortcutOptions = {}): Route {
    return this.route(path, handler, { ...options, methods: ['POST'] });
  }

  public put(path: string, handler: TramwayHandler, options: RouteShortcutOptions = {}): Route {
    return this.route(path, handler, { ...options, methods: ['PUT'] });
  }

  public patch(path: string, handler: TramwayHandler, options: RouteShortcutOptions = {}): Route {
    return this.route(path, handler, { ...options, methods: ['PATCH'] });
  }

  public delete(path: string, handler: TramwayHandler, options: RouteShortcutOptions = {}): Route {
    return this.route(path, handler, { ...options, methods: ['DELETE'] });
  }

  public options(path: string, handler: TramwayHandler, options: RouteShortcutOptions = {}): Route {
    return this.route(path, handler, { ...options, methods: ['OPTIONS'] });
  }

  public head(path: string, handler: TramwayHandler, options: RouteShortcutOptions = {}): Route {
    return this.route(path, handler, { ...options, methods: ['HEAD'] });
  }

  /**
   * Takes over the routes of another router, keeping their order
   *
   * The routes were compiled against the other router's converters; they keep them.
   */
  public include(router: Router): void {
    if (router === this) {
      return;
    }

    this._routes.push(...router._routes.splice(0));
  }

  /**
   * Finds the route for a path and method
   *
   * When no route matches fully, the `Allow` list is the one of the first route whose
   * path matched with another method.
   *
   * @throws BadRequestException when a matched route rejects a path parameter
   */
  public async resolve(path: string, method: string): Promise<Resolution> {
    let mismatch: readonly string[] | undefined;

    for (const route of this._routes) {
      const match = await route.match(path, method);

      if (match.kind === 'full') {
        return { kind: 'found', route, params: match.params };
      }

      if (match.kind === 'method-mismatch' && mismatch === undefined) {
        mismatch = match.allowed;
      }
    }

    return mismatch ? { kind: 'method-not-allowed', allowed: mismatch } : { kind: 'not-found' };
  }

  /**
   * Terminal of the application chain
   *
   * @throws NotFoundException when nothing matches the path
   * @throws MethodNotAllowedException when the path matched with another method
   */
  public async dispatch(scope: Scope, receive: Receive, send: Send): Promise<void> {
    if (scope.type !== 'http') {
      return;
    }

    const resolution = await this.resolve(getRoutePath(scope), scope.method);

    switch (resolution.kind) {
      case 'not-found':
        throw new NotFoundException();
      case 'method-not-allowed':
        throw new MethodNotAllowedException(resolution.allowed);
      case 'found':
        scope.pathParams = resolution.params;
        await resolution.route.invoke(scope, receive, send);
    }
  }

}
