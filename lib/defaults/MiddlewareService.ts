/**
 * Tramway MiddlewareService
 *
 * Base class for class-based middleware.
 *
 * @module defaults/MiddlewareService
 *
 * @example
 * ```typescript
 * import { MiddlewareService, type Scope, type Receive, type Send, type TramwayNext } from 'tramway';
 *
 * const encoder = new TextEncoder();
 *
 * export class PoweredByMiddleware extends MiddlewareService {
 *   async handle(scope: Scope, receive: Receive, send: Send, next: TramwayNext) {
 *     await next(scope, receive, async (message) => {
 *       if (message.type === 'http.response.start') {
 *         message.headers.push([encoder.encode('x-powered-by'), encoder.encode('tramway')]);
 *       }
 *       await send(message);
 *     });
 *   }
 * }
 * ```
 */

import type { Receive, Scope, Send } from '../types/Channel';
import type { Middleware, TramwayNext } from '../types/Handler';

/**
 * Base class for Tramway middleware services
 *
 * Override `onLoad` for one-time setup; it runs before the first chain containing the
 * instance serves a request, and never again once it succeeded.
 */
export abstract class MiddlewareService implements Middleware {

  public get name(): string {
    return this.constructor.name;
  }

  /**
   * Middleware handler
   *
   * @param next - The rest of the chain
   */
  public abstract handle(scope: Scope, receive: Receive, send: Send, next: TramwayNext): Promise<void>;

  public onLoad?(): Promise<void> | void;

}
