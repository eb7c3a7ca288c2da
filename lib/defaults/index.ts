/**
 * Tramway Defaults
 *
 * Base classes for common services.
 *
 * @module defaults
 *
 * @example
 * ```typescript
 * import { ValidationService, ConfigService, MiddlewareService, type Context } from 'tramway';
 * ```
 */

export { ValidationService } from './ValidationService';
export { ConfigService } from './ConfigService';
export { MiddlewareService } from './MiddlewareService';
