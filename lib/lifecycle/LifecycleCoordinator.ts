import { z } from 'zod';
import { LifespanProtocolError, toError } from '../errors';
import type { ServerLogger } from '../logger';
import { State } from '../State';
import type { LifespanScope, Receive, Send } from '../types/Channel';
import type { LifecycleRegistry } from './LifecycleRegistry';

export type LifecycleState =
  | 'awaiting-startup'
  | 'startup-running'
  | 'startup-failed'
  | 'running'
  | 'shutdown-running'
  | 'shutdown-failed'
  | 'shutdown-complete';

/**
 * Messages a lifespan channel accepts from the server
 */
export const LifespanMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('lifespan.startup') }),
  z.object({ type: z.literal('lifespan.shutdown') }),
]);

export type LifespanMessage = z.infer<typeof LifespanMessageSchema>;

export interface LifecycleCoordinatorOptions<App> {
  app: App;

  /**
   * Application name used in failure diagnostics
   */
  appName: string;

  registry: LifecycleRegistry<App>;
  logger: ServerLogger;
}

/**
 * LifecycleCoordinator - drives the lifespan handshake of one application
 *
 * Startup handlers run in registration order against the server-owned state record.
 * The first failing handler stops the sequence: the failure is logged, reported to
 * the server, and the coordinator halts. Shutdown works the same way and ends the
 * channel.
 */
export class LifecycleCoordinator<App> {

  private readonly app: App;

  private readonly appName: string;

  private readonly registry: LifecycleRegistry<App>;

  private readonly logger: ServerLogger;

  private _state: LifecycleState = 'awaiting-startup';

  public constructor(options: LifecycleCoordinatorOptions<App>) {
    this.app = options.app;
    this.appName = options.appName;
    this.registry = options.registry;
    this.logger = options.logger;
  }

  public get state(): LifecycleState {
    return this._state;
  }

  /**
   * Serves a lifespan channel until shutdown completes or a phase fails
   *
   * @throws LifespanProtocolError on an unknown message or a repeated startup
   */
  public async run(scope: LifespanScope, receive: Receive, send: Send): Promise<void> {
    if (!scope.state) {
      scope.state = {};
    }

    const state = new State(scope.state);

    while (true) {
      const message = await this.receiveMessage(receive);

      if (message.type === 'lifespan.startup') {
        if (this._state !== 'awaiting-startup') {
          throw new LifespanProtocolError(`Startup requested while ${this._state}`);
        }

        if (!(await this.startup(state, send))) {
          return;
        }

        continue;
      }

      if (this._state !== 'awaiting-startup' && this._state !== 'running') {
        throw new LifespanProtocolError(`Shutdown requested while ${this._state}`);
      }

      await this.shutdown(state, send);
      return;
    }
  }

  private async receiveMessage(receive: Receive): Promise<LifespanMessage> {
    const message: unknown = await receive();
    const result = LifespanMessageSchema.safeParse(message);

    if (!result.success) {
      throw new LifespanProtocolError(`Unexpected message on the lifespan channel: ${JSON.stringify(message)}`);
    }

    return result.data;
  }

  private async startup(state: State, send: Send): Promise<boolean> {
    this._state = 'startup-running';

    for (const handler of this.registry.startup) {
      try {
        await handler.run(this.app, state);
      } catch (error) {
        const diagnostic =
          `An error in the 'lifespan.startup' handler ${handler.name} prevented ${this.appName} ` +
          `from starting: ${toError(error).message}`;

        this._state = 'startup-failed';
        this.logger.error(diagnostic, error);
        await send({ type: 'lifespan.startup.failed', message: diagnostic });
        return false;
      }
    }

    this._state = 'running';
    await send({ type: 'lifespan.startup.complete' });
    return true;
  }

  private async shutdown(state: State, send: Send): Promise<void> {
    this._state = 'shutdown-running';

    for (const handler of this.registry.shutdown) {
      try {
        await handler.run(this.app, state);
      } catch (error) {
        const diagnostic =
          `An error in the 'lifespan.shutdown' handler ${handler.name} prevented ${this.appName} ` +
          `from closing gracefully: ${toError(error).message}`;

        this._state = 'shutdown-failed';
        this.logger.error(diagnostic, error);
        await send({ type: 'lifespan.shutdown.failed', message: diagnostic });
        return;
      }
    }

    this._state = 'shutdown-complete';
    await send({ type: 'lifespan.shutdown.complete' });
  }

}
