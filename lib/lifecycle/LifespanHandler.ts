import type { State } from '../State';

export type LifespanPhase = 'startup' | 'shutdown';

/**
 * Callback that only sees the shared state
 */
export type PlainLifespanCallback = (state: State) => unknown;

/**
 * Callback that also receives the owning application
 */
export type InjectedLifespanCallback<App> = (app: App, state: State) => unknown;

export interface LifespanHandlerOptions {
  name?: string;
}

export interface InjectedLifespanHandlerOptions extends LifespanHandlerOptions {
  inject: true;
}

/**
 * One startup or shutdown step, whatever the shape of the callback behind it
 */
export interface LifespanHandler<App = unknown> {
  readonly phase: LifespanPhase;
  readonly name: string;
  run(app: App, state: State): Promise<void>;
}

function isInjected<App>(
  callback: PlainLifespanCallback | InjectedLifespanCallback<App>,
  options: LifespanHandlerOptions | InjectedLifespanHandlerOptions,
): callback is InjectedLifespanCallback<App> {
  return 'inject' in options && options.inject === true;
}

function define<App>(
  phase: LifespanPhase,
  callback: PlainLifespanCallback | InjectedLifespanCallback<App>,
  options: LifespanHandlerOptions | InjectedLifespanHandlerOptions,
): LifespanHandler<App> {
  const name = options.name ?? (callback.name || `anonymous ${phase} handler`);

  if (isInjected(callback, options)) {
    return {
      phase,
      name,
      run: async (app, state) => {
        await callback(app, state);
      },
    };
  }

  return {
    phase,
    name,
    run: async (_app, state) => {
      await callback(state);
    },
  };
}

function startup(callback: PlainLifespanCallback, options?: LifespanHandlerOptions): LifespanHandler;
function startup<App>(
  callback: InjectedLifespanCallback<App>,
  options: InjectedLifespanHandlerOptions,
): LifespanHandler<App>;
function startup<App>(
  callback: PlainLifespanCallback | InjectedLifespanCallback<App>,
  options: LifespanHandlerOptions | InjectedLifespanHandlerOptions = {},
): LifespanHandler<App> {
  return define('startup', callback, options);
}

function shutdown(callback: PlainLifespanCallback, options?: LifespanHandlerOptions): LifespanHandler;
function shutdown<App>(
  callback: InjectedLifespanCallback<App>,
  options: InjectedLifespanHandlerOptions,
): LifespanHandler<App>;
function shutdown<App>(
  callback: PlainLifespanCallback | InjectedLifespanCallback<App>,
  options: LifespanHandlerOptions | InjectedLifespanHandlerOptions = {},
): LifespanHandler<App> {
  return define('shutdown', callback, options);
}

/**
 * Lifespan handler builders
 *
 * @example
 * ```typescript
 * const openPool = lifespan.startup(async (state) => {
 *   state.set('pool', await createPool());
 * });
 *
 * // Injected form: the application comes first
 * const announce = lifespan.startup(
 *   (app: Tramway, state) => app.logger.info(`${app.name} ready with ${state.keys().length} resources`),
 *   { inject: true },
 * );
 *
 * const app = createTramway({ lifespans: [openPool, announce] });
 * ```
 */
export const lifespan = {
  startup,
  shutdown,
};
