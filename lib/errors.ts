import { STATUS_CODES } from 'node:http';
import { Headers, type HeadersInit } from './headers';
import { JSONResponse, PlainTextResponse, type TramwayResponse } from './responses';

/**
 * Options accepted by HttpException
 */
export interface HttpExceptionOptions {
  headers?: HeadersInit;
}

/**
 * HTTP Exception for Tramway
 *
 * Public API for throwing HTTP errors in handlers and middlewares. The fault
 * boundary (ExceptionMiddleware) turns it into a response.
 *
 * @example
 * ```typescript
 * // In middleware
 * if (!user) {
 *   throw new HttpException(401, 'Unauthorized', {
 *     headers: { 'WWW-Authenticate': 'Bearer' }
 *   });
 * }
 *
 * // In handler
 * if (!isValid) {
 *   throw new HttpException(400, { error: 'Invalid data' });
 * }
 * ```
 */
export class HttpException extends Error {

  /**
   * HTTP status code
   */
  public readonly status: number;

  /**
   * Response body (string or JSON-serializable object)
   */
  public readonly body: string | object;

  /**
   * Optional response options (headers)
   */
  public readonly options?: HttpExceptionOptions;

  /**
   * Creates a new HttpException
   *
   * @param status - HTTP status code (e.g., 401, 403, 404)
   * @param body - Response body; defaults to the status phrase
   * @param options - Optional headers
   */
  public constructor(status: number, body?: string | object, options?: HttpExceptionOptions) {
    const resolvedBody = body ?? STATUS_CODES[status] ?? '';
    const message = typeof resolvedBody === 'string' ? resolvedBody : JSON.stringify(resolvedBody);

    super(message);
    this.name = new.target.name;
    this.status = status;
    this.body = resolvedBody;
    this.options = options;
  }

  /**
   * Converts the exception to a response
   */
  public getResponse(): TramwayResponse {
    const headers = new Headers(this.options?.headers);

    if (typeof this.body === 'string') {
      return new PlainTextResponse(this.body, { status: this.status, headers });
    }

    return new JSONResponse(this.body, { status: this.status, headers });
  }

}

export class BadRequestException extends HttpException {

  public constructor(body?: string | object, options?: HttpExceptionOptions) {
    super(400, body, options);
  }

}

export class NotFoundException extends HttpException {

  public constructor(body?: string | object, options?: HttpExceptionOptions) {
    super(404, body, options);
  }

}

/**
 * 405 carrying the methods the matched path accepts
 */
export class MethodNotAllowedException extends HttpException {

  public readonly allowed: readonly string[];

  public constructor(allowed: Iterable<string>, body?: string | object) {
    const methods = Array.from(allowed);
    const headers = new Headers({ Allow: methods.join(', ') });

    super(405, body, { headers });
    this.allowed = methods;
  }

}

export class InternalServerErrorException extends HttpException {

  public constructor(body?: string | object, options?: HttpExceptionOptions) {
    super(500, body, options);
  }

}

/**
 * Base class for framework faults (construction, load and protocol errors)
 */
export class TramwayError extends Error {

  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

}

/**
 * Malformed path template (unbalanced braces, bad parameter names, duplicates)
 */
export class PathTemplateError extends TramwayError {

  public readonly template: string;

  public constructor(template: string, reason: string) {
    super(`Invalid path template "${template}": ${reason}`);
    this.template = template;
  }

}

/**
 * The handler is already registered as a route
 */
export class RouteAlreadyExistsError extends TramwayError {}

/**
 * A route was attached to a second router
 */
export class InvalidRouterError extends TramwayError {}

/**
 * A middleware load hook failed while its chain was being assembled
 */
export class MiddlewareLoadError extends TramwayError {

  /**
   * Name of the middleware whose hook failed
   */
  public readonly middleware: string;

  /**
   * Route or application owning the chain
   */
  public readonly owner: string;

  public constructor(middleware: string, owner: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);

    super(`The middleware ${middleware} failed to load for ${owner}: ${reason}`, { cause });
    this.middleware = middleware;
    this.owner = owner;
  }

}

/**
 * The client went away while its request body was being read
 */
export class ClientDisconnectedError extends TramwayError {

  public constructor() {
    super('Client disconnected before the request body was read');
  }

}

/**
 * A lifespan channel received a message it cannot accept in its current state
 */
export class LifespanProtocolError extends TramwayError {}

/**
 * Coerces an unknown thrown value into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
