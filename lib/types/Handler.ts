/**
 * Tramway handler type definitions
 *
 * Type aliases for route handlers, middleware and their `next` functions.
 *
 * @module types/Handler
 */

import type { TramwayRequest } from '../TramwayRequest';
import type { TramwayResponse } from '../responses';
import type { ChannelApp, Receive, Scope, Send } from './Channel';

/**
 * Values a route handler may return
 *
 * - nothing, `null`, `''` or empty bytes: 204 empty response
 * - a TramwayResponse: sent as-is
 * - a string or bytes: plain-text response
 * - a plain object or array: JSON response
 */
export type HandlerResult = TramwayResponse | string | Uint8Array | object | null | undefined | void;

/**
 * Tramway route handler function
 *
 * @example
 * ```typescript
 * const handler: TramwayHandler = async (request) => {
 *   const id = request.getParam('id');
 *   const user = await db.users.findById(id);
 *   return new JSONResponse(user);
 * };
 * ```
 *
 * @example
 * ```typescript
 * // Return JSON-serializable data
 * const handler: TramwayHandler = async () => ({ message: 'Success' });
 * ```
 */
export type TramwayHandler = (request: TramwayRequest) => HandlerResult | Promise<HandlerResult>;

/**
 * The rest of the chain, as seen from inside a middleware
 */
export type TramwayNext = ChannelApp;

/**
 * Middleware node
 *
 * `handle` receives the channel plus the rest of the chain; it may wrap `send`,
 * answer on its own, or call `next`. `onLoad` runs once per middleware instance,
 * before the first chain containing it is used.
 *
 * @example
 * ```typescript
 * const timing: Middleware = {
 *   name: 'timing',
 *   async handle(scope, receive, send, next) {
 *     const started = Date.now();
 *     await next(scope, receive, send);
 *     console.log(`took ${Date.now() - started}ms`);
 *   },
 * };
 * ```
 */
export interface Middleware {
  readonly name?: string;

  handle(scope: Scope, receive: Receive, send: Send, next: TramwayNext): Promise<void>;

  onLoad?(): Promise<void> | void;
}
