/**
 * Factory functions for creating Tramway instances
 *
 * Provides convenient factory functions for creating pre-configured
 * applications with sensible defaults.
 *
 * @module factory
 *
 * @example
 * ```typescript
 * import { createTramway } from 'tramway';
 *
 * const app = createTramway({ name: 'api', rootPath: '/api' });
 * ```
 */

import { loadConfig } from '../config';
import { createDefaultLogger } from '../logger';
import { Tramway, type TramwayOptions } from '../Tramway';

/**
 * Creates a new Tramway application with optional configuration
 *
 * @example
 * ```typescript
 * // Basic usage with defaults
 * const app = createTramway();
 *
 * // With custom logger
 * const app = createTramway({
 *   logger: customLogger,
 *   name: 'billing'
 * });
 *
 * // Build the middleware chain on the first request instead of at startup
 * const app = createTramway({
 *   buildOnStartup: false
 * });
 * ```
 */
export function createTramway(options: TramwayOptions = {}): Tramway {
  return new Tramway({
    ...options,
    logger: options.logger ?? createDefaultLogger(),
  });
}

/**
 * Creates a production application
 *
 * This factory includes:
 * - Settings read from TRAMWAY_* environment variables, under explicit options
 * - Error messages kept out of 500 responses unless debug is asked for
 *
 * @example
 * ```typescript
 * const app = createProductionApp({
 *   name: 'api',
 *   logger: productionLogger
 * });
 * ```
 */
export function createProductionApp(
  options: TramwayOptions = {},
  env: Record<string, string | undefined> = process.env,
): Tramway {
  return createTramway({
    ...loadConfig(env),
    ...options,
  });
}

/**
 * Creates a development application
 *
 * This factory includes:
 * - Console logging
 * - Error messages in 500 responses
 *
 * @example
 * ```typescript
 * const app = createDevelopmentApp({ name: 'playground' });
 * ```
 */
export function createDevelopmentApp(options: TramwayOptions = {}): Tramway {
  return createTramway({
    ...options,
    logger: options.logger ?? createDefaultLogger(),
    debug: true,
  });
}
