/**
 * Tramway ConfigService
 *
 * Base class for application-wide hooks, currently the global error handler used by
 * the fault boundary for errors that are not HttpExceptions.
 *
 * @module defaults/ConfigService
 *
 * @example
 * ```typescript
 * import { ConfigService, JSONResponse, type Context } from 'tramway';
 *
 * export class ServerConfig extends ConfigService {
 *   onError(error: Error, context: Context) {
 *     return new JSONResponse({ error: error.message, path: context.path }, { status: 500 });
 *   }
 * }
 *
 * const app = createTramway({ config: new ServerConfig() });
 * ```
 */

import type { TramwayResponse } from '../responses';
import type { Context } from '../TramwayRequest';

export abstract class ConfigService {

  /**
   * Global error handler
   *
   * @param error - The error that occurred
   * @param context - Request the error happened on
   */
  public abstract onError(error: Error, context: Context): TramwayResponse | Promise<TramwayResponse>;

}
