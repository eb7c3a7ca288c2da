import {
  BadRequestException,
  HttpException,
  InternalServerErrorException,
  InvalidRouterError,
  MethodNotAllowedException,
  RouteAlreadyExistsError,
} from '../errors';
import { MiddlewareChain } from '../middlewares/MiddlewareChain';
import { EmptyResponse, JSONResponse, PlainTextResponse, TramwayResponse, withoutBody } from '../responses';
import { TramwayRequest } from '../TramwayRequest';
import type { ChannelApp, Receive, Scope, Send } from '../types/Channel';
import type { Middleware, TramwayHandler } from '../types/Handler';
import { BASE_CONVERTERS, type ConverterMap, mergeConverters } from './converters';
import { compilePath, type PathTemplate } from './PathTemplate';

export interface RouteOptions {

  /**
   * Accepted methods, case-insensitive; `GET` also accepts `HEAD`
   * @default ['GET']
   */
  methods?: Iterable<string>;

  /**
   * Middleware in front of this route only, outermost first
   */
  middleware?: Middleware[];

  /**
   * Type tag → converter; wins over router and built-in converters
   */
  converters?: ConverterMap;

  name?: string;
}

/**
 * Outcome of matching one route against a request
 */
export type RouteMatch =
  | { kind: 'full'; params: Record<string, unknown> }
  | { kind: 'none' }
  | { kind: 'method-mismatch'; allowed: readonly string[] };

/**
 * Handler return values, classified by shape
 */
export type HandlerOutcome =
  | { kind: 'empty' }
  | { kind: 'response'; response: TramwayResponse }
  | { kind: 'plain-text'; body: string | Uint8Array }
  | { kind: 'structured'; body: object }
  | { kind: 'unsupported'; value: unknown };

function isPlainObject(value: object): boolean {
  const prototype: unknown = Object.getPrototypeOf(value);

  return prototype === Object.prototype || prototype === null;
}

export function classifyHandlerResult(value: unknown): HandlerOutcome {
  if (value === undefined || value === null || value === '') {
    return { kind: 'empty' };
  }

  if (value instanceof TramwayResponse) {
    return { kind: 'response', response: value };
  }

  if (value instanceof Uint8Array) {
    return value.byteLength === 0 ? { kind: 'empty' } : { kind: 'plain-text', body: value };
  }

  if (typeof value === 'string') {
    return { kind: 'plain-text', body: value };
  }

  if (typeof value === 'object' && (Array.isArray(value) || isPlainObject(value))) {
    return { kind: 'structured', body: value };
  }

  return { kind: 'unsupported', value };
}

/**
 * Turns a handler's return value into the response to send
 *
 * @throws InternalServerErrorException for shapes that have no response form
 */
export function toResponse(value: unknown): TramwayResponse {
  const outcome = classifyHandlerResult(value);

  switch (outcome.kind) {
    case 'empty':
      return new EmptyResponse();
    case 'response':
      return outcome.response;
    case 'plain-text':
      return new PlainTextResponse(outcome.body);
    case 'structured':
      return new JSONResponse(outcome.body);
    case 'unsupported':
      throw new InternalServerErrorException(`Unsupported handler return value (${typeof outcome.value})`);
  }
}

/**
 * Handlers already registered as routes
 */
const registeredHandlers = new WeakMap<TramwayHandler, Route>();

/**
 * Anything a route can be attached to
 */
export interface RouteOwner {
  readonly converters: ConverterMap;
}

/**
 * Route - one path template, its methods, its private middleware and its handler
 *
 * The middleware chain in front of the handler is assembled on first use and
 * shared by every later request.
 *
 * @example
 * ```typescript
 * const route = new Route('/items/{id:int}', async (request) => ({ id: request.getParam('id') }), {
 *   methods: ['get', 'put'],
 *   middleware: [auditMiddleware],
 * });
 *
 * router.addRoute(route);
 * ```
 */
export class Route {

  public readonly path: string;

  public readonly handler: TramwayHandler;

  public readonly name: string;

  /**
   * Uppercase methods, in registration order
   */
  public readonly methods: ReadonlySet<string>;

  public readonly middleware: readonly Middleware[];

  private ownConverters: ConverterMap;

  private _template: PathTemplate;

  private _owner?: RouteOwner;

  private readonly chain: MiddlewareChain;

  /**
   * @throws RouteAlreadyExistsError when the handler is already a route
   * @throws PathTemplateError when the path template is malformed
   */
  public constructor(path: string, handler: TramwayHandler, options: RouteOptions = {}) {
    const existing = registeredHandlers.get(handler);

    if (existing) {
      throw new RouteAlreadyExistsError(
        `Handler ${handler.name || '(anonymous)'} is already a route: ${existing.toString()}`,
      );
    }

    this.path = path;
    this.handler = handler;
    this.name = options.name ?? handler.name;
    this.methods = Route.normalizeMethods(options.methods ?? ['GET']);
    this.middleware = [...(options.middleware ?? [])];
    this.ownConverters = { ...options.converters };
    this._template = compilePath(path, mergeConverters(BASE_CONVERTERS, this.ownConverters));
    this.chain = new MiddlewareChain(`route ${this.toString()}`, this.middleware, (scope, receive, send) =>
      this.callHandler(scope, receive, send),
    );

    registeredHandlers.set(handler, this);
  }

  /**
   * Uppercases methods and adds `HEAD` wherever `GET` is accepted
   */
  public static normalizeMethods(methods: Iterable<string>): ReadonlySet<string> {
    const normalized = new Set<string>();

    for (const method of methods) {
      normalized.add(method.toUpperCase());
    }

    if (normalized.has('GET')) {
      normalized.add('HEAD');
    }

    return normalized;
  }

  public get template(): PathTemplate {
    return this._template;
  }

  /**
   * Methods for an `Allow` header
   */
  public get allowed(): string[] {
    return Array.from(this.methods);
  }

  public get attached(): boolean {
    return this._owner !== undefined;
  }

  public get chainBuilt(): boolean {
    return this.chain.built;
  }

  /**
   * Replaces this route's own converters and recompiles its template
   *
   * @throws InvalidRouterError once the route is attached
   */
  public setConverters(converters: ConverterMap): void {
    if (this._owner) {
      throw new InvalidRouterError(`Converters of ${this.toString()} cannot change after it joined a router`);
    }

    this.ownConverters = { ...converters };
    this._template = compilePath(this.path, mergeConverters(BASE_CONVERTERS, this.ownConverters));
  }

  /**
   * Attaches the route to its router; router converters act as defaults
   *
   * @throws InvalidRouterError when the route already belongs to a router
   */
  public attach(owner: RouteOwner): void {
    if (this._owner) {
      throw new InvalidRouterError(`${this.toString()} is already attached to a router`);
    }

    this._template = compilePath(this.path, mergeConverters(BASE_CONVERTERS, owner.converters, this.ownConverters));
    this._owner = owner;
  }

  /**
   * Matches a request path and method
   *
   * Parameters are converted only on a full match.
   *
   * @throws BadRequestException when a converter rejects a parameter
   */
  public async match(path: string, method: string): Promise<RouteMatch> {
    const rawParams = this._template.match(path);

    if (!rawParams) {
      return { kind: 'none' };
    }

    if (!this.methods.has(method.toUpperCase())) {
      return { kind: 'method-mismatch', allowed: this.allowed };
    }

    try {
      return { kind: 'full', params: await this._template.convert(rawParams) };
    } catch (error) {
      if (error instanceof HttpException) {
        throw error;
      }

      throw new BadRequestException(`Malformed path parameter for ${this.path}`);
    }
  }

  /**
   * Builds this route's middleware chain once; concurrent callers share the build
   *
   * @throws MiddlewareLoadError when a middleware load hook fails
   */
  public ensureChainBuilt(): Promise<ChannelApp> {
    return this.chain.build();
  }

  /**
   * Runs the request through this route's chain
   *
   * @throws MethodNotAllowedException when the route does not accept the method
   */
  public async invoke(scope: Scope, receive: Receive, send: Send): Promise<void> {
    if (scope.type !== 'http') {
      return;
    }

    if (!this.methods.has(scope.method.toUpperCase())) {
      throw new MethodNotAllowedException(this.allowed);
    }

    const entry = await this.ensureChainBuilt();

    await entry(scope, receive, send);
  }

  public toString(): string {
    return `${this.allowed.join('|')} ${this.path}`;
  }

  /**
   * Terminal node of the route chain: runs the handler and sends what it returned
   */
  private async callHandler(scope: Scope, receive: Receive, send: Send): Promise<void> {
    if (scope.type !== 'http') {
      return;
    }

    const request = new TramwayRequest(scope, receive, send);
    const response = toResponse(await this.handler(request));

    await response.send(request.method === 'HEAD' ? withoutBody(send) : send);
  }

}
