import type { ConfigService } from '../defaults/ConfigService';
import { MiddlewareService } from '../defaults/MiddlewareService';
import { ClientDisconnectedError, HttpException, toError } from '../errors';
import type { ServerLogger } from '../logger';
import { JSONResponse, type TramwayResponse, withoutBody } from '../responses';
import { TramwayRequest } from '../TramwayRequest';
import type { HttpScope, Receive, Scope, Send } from '../types/Channel';
import type { TramwayNext } from '../types/Handler';

export interface ExceptionMiddlewareOptions {
  logger: ServerLogger;

  /**
   * Include error messages in 500 responses
   * @default false
   */
  debug?: boolean;

  /**
   * Global error handler for errors that are not HttpExceptions
   */
  config?: ConfigService;
}

/**
 * ExceptionMiddleware - the application's fault boundary
 *
 * Always the outermost middleware. HttpExceptions become their own response; any
 * other error goes to the configured `onError` handler, or becomes a 500. Once the
 * response has started nothing can be sent anymore, and the error is rethrown to the
 * server.
 */
export class ExceptionMiddleware extends MiddlewareService {

  private readonly logger: ServerLogger;

  private readonly debug: boolean;

  private readonly config?: ConfigService;

  public constructor(options: ExceptionMiddlewareOptions) {
    super();
    this.logger = options.logger;
    this.debug = options.debug ?? false;
    this.config = options.config;
  }

  public async handle(scope: Scope, receive: Receive, send: Send, next: TramwayNext): Promise<void> {
    if (scope.type !== 'http') {
      await next(scope, receive, send);
      return;
    }

    let started = false;

    const tracked: Send = async (message) => {
      if (message.type === 'http.response.start') {
        started = true;
      }

      await send(message);
    };

    try {
      await next(scope, receive, tracked);
    } catch (error) {
      if (error instanceof ClientDisconnectedError) {
        this.logger.warn(`${scope.method} ${scope.path}: ${error.message}`);
        return;
      }

      if (started) {
        throw error;
      }

      const response = await this.toResponse(error, scope, receive, send);

      await response.send(scope.method.toUpperCase() === 'HEAD' ? withoutBody(send) : send);
    }
  }

  private async toResponse(error: unknown, scope: HttpScope, receive: Receive, send: Send): Promise<TramwayResponse> {
    if (error instanceof HttpException) {
      return error.getResponse();
    }

    const cause = toError(error);

    this.logger.error('Route handler error:', cause);

    if (this.config) {
      return this.config.onError(cause, new TramwayRequest(scope, receive, send));
    }

    return new JSONResponse({ error: this.debug ? cause.message : 'Internal Server Error' }, { status: 500 });
  }

}
