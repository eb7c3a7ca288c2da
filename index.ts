/**
 * Tramway - request dispatch core for channel-based servers
 *
 * This is the main entry point for the package.
 * All public APIs are exported from lib/index.ts
 *
 * @module tramway
 *
 * @example
 * ```typescript
 * import { createTramway, NodeServer } from 'tramway';
 *
 * const app = createTramway({ name: 'api' });
 *
 * app.get('/hello/{name}', (request) => `Hello ${request.getParam('name')}`);
 *
 * await new NodeServer(app, { port: 3000 }).start();
 * ```
 */

export * from './lib/index';
