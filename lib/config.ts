/**
 * Application settings
 *
 * Scalar settings are validated with zod; collaborators (logger, middleware,
 * lifespan handlers) are typed only.
 *
 * @module config
 */

import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

export const TramwayConfigSchema = z.object({

  /**
   * Name used in logs and lifespan diagnostics
   */
  name: z.string().min(1).default('Tramway'),

  /**
   * Expose error messages in 500 responses
   */
  debug: z.boolean().default(false),

  /**
   * Build the application chain during startup instead of on the first request
   */
  buildOnStartup: z.boolean().default(true),

  /**
   * Mount point applied to requests whose scope carries none
   */
  rootPath: z
    .string()
    .regex(/^(\/[^/]+)*$/, 'rootPath must be empty or start with "/" and not end with "/"')
    .optional(),
});

export type TramwayConfigInput = z.input<typeof TramwayConfigSchema>;

export type TramwayConfig = z.output<typeof TramwayConfigSchema>;

const EnvSchema = z.object({
  TRAMWAY_DEBUG: booleanFlag.optional(),
  TRAMWAY_BUILD_ON_STARTUP: booleanFlag.optional(),
  TRAMWAY_ROOT_PATH: z.string().optional(),
});

/**
 * Validates settings and fills in defaults
 *
 * @throws ZodError when a setting is invalid
 */
export function resolveConfig(input: TramwayConfigInput = {}): TramwayConfig {
  return TramwayConfigSchema.parse(input);
}

/**
 * Reads settings from environment variables
 *
 * Only variables that are set end up in the result, so it can be spread under
 * explicit options.
 *
 * @example
 * ```typescript
 * const app = createTramway({ ...loadConfig(process.env), name: 'api' });
 * ```
 *
 * @throws ZodError when a variable holds an invalid value
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): TramwayConfigInput {
  const parsed = EnvSchema.parse(env);
  const config: TramwayConfigInput = {};

  if (parsed.TRAMWAY_DEBUG !== undefined) {
    config.debug = parsed.TRAMWAY_DEBUG;
  }

  if (parsed.TRAMWAY_BUILD_ON_STARTUP !== undefined) {
    config.buildOnStartup = parsed.TRAMWAY_BUILD_ON_STARTUP;
  }

  if (parsed.TRAMWAY_ROOT_PATH !== undefined) {
    config.rootPath = parsed.TRAMWAY_ROOT_PATH;
  }

  return config;
}
