import { describe, expect, it, vi } from 'vitest';
import {
  BadRequestException,
  classifyHandlerResult,
  EmptyResponse,
  HTMLResponse,
  InternalServerErrorException,
  InvalidRouterError,
  MethodNotAllowedException,
  MiddlewareLoadError,
  Route,
  RouteAlreadyExistsError,
  Router,
  type Converter,
  type Middleware,
} from '../lib';
import { createHttpChannel, readResponse } from './helpers';

describe('Route', () => {
  describe('constructor', () => {
    it('should default to GET and imply HEAD', () => {
      const route = new Route('/health', () => 'ok');

      expect(route.allowed).toEqual(['GET', 'HEAD']);
    });

    it('should uppercase methods', () => {
      const route = new Route('/items', () => 'ok', { methods: ['post', 'Put'] });

      expect(route.allowed).toEqual(['POST', 'PUT']);
    });

    it('should name the route after its handler', () => {
      async function listItems() {
        return [];
      }

      expect(new Route('/items', listItems).name).toBe('listItems');
      expect(new Route('/other', () => [], { name: 'other-items' }).name).toBe('other-items');
    });

    it('should reject a handler that is already a route', () => {
      const handler = () => 'once';

      new Route('/first', handler);

      expect(() => new Route('/second', handler)).toThrow(RouteAlreadyExistsError);
    });
  });

  describe('match', () => {
    it('should report a full match with converted params', async () => {
      const route = new Route('/items/{id:int}', () => 'ok');

      expect(await route.match('/items/7', 'get')).toEqual({ kind: 'full', params: { id: 7 } });
    });

    it('should report a method mismatch with the allowed methods', async () => {
      const route = new Route('/items/{id:int}', () => 'ok', { methods: ['PUT'] });

      expect(await route.match('/items/7', 'GET')).toEqual({ kind: 'method-mismatch', allowed: ['PUT'] });
    });

    it('should report no match for other paths', async () => {
      const route = new Route('/items/{id:int}', () => 'ok');

      expect(await route.match('/items/seven', 'GET')).toEqual({ kind: 'none' });
    });

    it('should not convert params on a method mismatch', async () => {
      const convert = vi.fn((raw: string) => raw);
      const route = new Route('/tags/{tag:custom}', () => 'ok', {
        methods: ['POST'],
        converters: { custom: { pattern: '[a-z]+', convert } },
      });

      await route.match('/tags/red', 'GET');

      expect(convert).not.toHaveBeenCalled();
    });

    it('should turn a converter failure into a bad request', async () => {
      const strict: Converter<number> = {
        pattern: '[0-9]+',
        convert: (raw) => {
          if (raw.length > 3) {
            throw new RangeError('too long');
          }

          return Number(raw);
        },
      };
      const route = new Route('/pages/{page:strict}', () => 'ok', { converters: { strict } });

      await expect(route.match('/pages/12345', 'GET')).rejects.toThrow(BadRequestException);
      await expect(route.match('/pages/123', 'GET')).resolves.toEqual({ kind: 'full', params: { page: 123 } });
    });

    it('should answer oversized integers with a bad request', async () => {
      const route = new Route('/items/{id:int}', () => 'ok');

      await expect(route.match('/items/9007199254740993', 'GET')).rejects.toThrow(
        'Malformed path parameter for /items/{id:int}',
      );
    });
  });

  describe('attach', () => {
    it('should refuse a second router', () => {
      const route = new Route('/once', () => 'ok');

      new Router().addRoute(route);

      expect(() => new Router().addRoute(route)).toThrow(InvalidRouterError);
    });

    it('should use router converters under its own', async () => {
      const router = new Router({
        converters: {
          code: { pattern: '[A-Z]+', convert: (raw) => `router:${raw}` },
          slug: { pattern: '[a-z]+', convert: (raw) => `router:${raw}` },
        },
      });
      const route = new Route('/{code:code}/{slug:slug}', () => 'ok', {
        converters: { slug: { pattern: '[a-z-]+', convert: (raw) => `route:${raw}` } },
      });

      router.addRoute(route);

      expect(await route.match('/AB/hello-world', 'GET')).toEqual({
        kind: 'full',
        params: { code: 'router:AB', slug: 'route:hello-world' },
      });
    });

    it('should refuse converter changes once attached', () => {
      const route = new Route('/locked', () => 'ok');

      route.setConverters({});
      new Router().addRoute(route);

      expect(() => route.setConverters({})).toThrow(InvalidRouterError);
    });
  });

  describe('invoke', () => {
    it('should reject a method the route does not accept', async () => {
      const route = new Route('/items', () => 'ok', { methods: ['POST', 'PUT'] });
      const channel = createHttpChannel({ method: 'DELETE', path: '/items' });

      const error = await route.invoke(channel.scope, channel.receive, channel.send).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(MethodNotAllowedException);
      expect(error).toMatchObject({ status: 405, allowed: ['POST', 'PUT'] });
      expect(channel.sent).toEqual([]);
    });

    it('should send a plain-text response for a string result', async () => {
      const route = new Route('/hello', () => 'hi');
      const channel = createHttpChannel({ path: '/hello' });

      await route.invoke(channel.scope, channel.receive, channel.send);

      expect(readResponse(channel.sent)).toEqual({
        status: 200,
        headers: { 'content-length': '2', 'content-type': 'text/plain; charset=utf-8' },
        text: 'hi',
      });
    });

    it('should send a JSON response for an object result', async () => {
      const route = new Route('/user', () => ({ id: 1, name: 'Ada' }));
      const channel = createHttpChannel({ path: '/user' });

      await route.invoke(channel.scope, channel.receive, channel.send);

      const response = readResponse(channel.sent);

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toBe('application/json');
      expect(response.text).toBe('{"id":1,"name":"Ada"}');
    });

    it('should send a 204 for an empty result', async () => {
      const route = new Route('/nothing', async () => undefined);
      const channel = createHttpChannel({ path: '/nothing' });

      await route.invoke(channel.scope, channel.receive, channel.send);

      expect(readResponse(channel.sent)).toEqual({ status: 204, headers: {}, text: '' });
    });

    it('should send a returned response as-is', async () => {
      const route = new Route('/page', () => new HTMLResponse('<p>hi</p>', { status: 201 }));
      const channel = createHttpChannel({ path: '/page' });

      await route.invoke(channel.scope, channel.receive, channel.send);

      const response = readResponse(channel.sent);

      expect(response.status).toBe(201);
      expect(response.headers['content-type']).toBe('text/html; charset=utf-8');
      expect(response.text).toBe('<p>hi</p>');
    });

    it('should send headers without a body for HEAD', async () => {
      const route = new Route('/hello-head', () => 'hello');
      const channel = createHttpChannel({ method: 'HEAD', path: '/hello-head' });

      await route.invoke(channel.scope, channel.receive, channel.send);

      expect(readResponse(channel.sent)).toEqual({
        status: 200,
        headers: { 'content-length': '5', 'content-type': 'text/plain; charset=utf-8' },
        text: '',
      });
    });

    it('should fail on an unsupported result', async () => {
      const route = new Route('/number', () => new Date(0));
      const channel = createHttpChannel({ path: '/number' });

      await expect(route.invoke(channel.scope, channel.receive, channel.send)).rejects.toThrow(
        InternalServerErrorException,
      );
      expect(channel.sent).toEqual([]);
    });

    it('should run route middleware around the handler, first-declared outermost', async () => {
      const calls: string[] = [];
      const wrap = (name: string): Middleware => ({
        name,
        async handle(scope, receive, send, next) {
          calls.push(`${name}:before`);
          await next(scope, receive, send);
          calls.push(`${name}:after`);
        },
      });
      const route = new Route(
        '/wrapped',
        () => {
          calls.push('handler');
          return 'ok';
        },
        { middleware: [wrap('outer'), wrap('inner')] },
      );
      const channel = createHttpChannel({ path: '/wrapped' });

      await route.invoke(channel.scope, channel.receive, channel.send);

      expect(calls).toEqual(['outer:before', 'inner:before', 'handler', 'inner:after', 'outer:after']);
    });
  });

  describe('ensureChainBuilt', () => {
    it('should load middleware once across concurrent builds', async () => {
      const onLoad = vi.fn(async () => {
        await new Promise((resolve) => setTimeout(resolve, 5));
      });
      const middleware: Middleware = {
        name: 'slow-loader',
        onLoad,
        handle: (scope, receive, send, next) => next(scope, receive, send),
      };
      const route = new Route('/concurrent', () => 'ok', { middleware: [middleware] });

      const [first, second] = await Promise.all([route.ensureChainBuilt(), route.ensureChainBuilt()]);

      expect(first).toBe(second);
      expect(onLoad).toHaveBeenCalledTimes(1);
      expect(route.chainBuilt).toBe(true);

      await route.ensureChainBuilt();
      expect(onLoad).toHaveBeenCalledTimes(1);
    });

    it('should name the middleware and the route when a hook fails', async () => {
      const middleware: Middleware = {
        name: 'broken',
        onLoad: () => {
          throw new Error('no connection');
        },
        handle: (scope, receive, send, next) => next(scope, receive, send),
      };
      const route = new Route('/broken', () => 'ok', { middleware: [middleware] });

      const error = await route.ensureChainBuilt().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(MiddlewareLoadError);
      expect(error).toMatchObject({
        middleware: 'broken',
        owner: 'route GET|HEAD /broken',
        message: 'The middleware broken failed to load for route GET|HEAD /broken: no connection',
      });
      expect(route.chainBuilt).toBe(false);
    });
  });
});

describe('classifyHandlerResult', () => {
  it.each([
    ['undefined', undefined],
    ['null', null],
    ['an empty string', ''],
    ['empty bytes', new Uint8Array(0)],
  ])('should classify %s as empty', (_label, value) => {
    expect(classifyHandlerResult(value)).toEqual({ kind: 'empty' });
  });

  it('should classify strings and bytes as plain text', () => {
    const bytes = new Uint8Array([104, 105]);

    expect(classifyHandlerResult('hi')).toEqual({ kind: 'plain-text', body: 'hi' });
    expect(classifyHandlerResult(bytes)).toEqual({ kind: 'plain-text', body: bytes });
  });

  it('should classify plain objects and arrays as structured', () => {
    expect(classifyHandlerResult({ a: 1 })).toEqual({ kind: 'structured', body: { a: 1 } });
    expect(classifyHandlerResult([1, 2])).toEqual({ kind: 'structured', body: [1, 2] });
  });

  it('should classify responses as responses', () => {
    const response = new EmptyResponse();

    expect(classifyHandlerResult(response)).toEqual({ kind: 'response', response });
  });

  it('should classify everything else as unsupported', () => {
    expect(classifyHandlerResult(42)).toEqual({ kind: 'unsupported', value: 42 });
    expect(classifyHandlerResult(new Map()).kind).toBe('unsupported');
  });
});
