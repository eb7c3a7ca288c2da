/**
 * Tramway type definitions
 *
 * Centralized export point for channel, handler and validation types.
 *
 * @module types
 *
 * @example
 * ```typescript
 * import type { Scope, Receive, Send, TramwayHandler, Middleware } from 'tramway';
 * ```
 */

// Channel protocol types
export type * from './Channel';

// Handler types
export type { HandlerResult, Middleware, TramwayHandler, TramwayNext } from './Handler';

// Validation types
export type * from './Validation';

// Re-export Context type for convenience
export type { Context } from '../TramwayRequest';
