import type { z } from 'zod';
import type { TramwayResponse } from '../responses';
import type { Context } from '../TramwayRequest';

// Validation schema type
export type ValidationSchema = z.ZodTypeAny;

// Validation schema with hook
export interface ValidationSchemaWithHook {
  schema: ValidationSchema;

  /**
   * Called with a failed parse; a returned response replaces the default 400
   */
  hook?: (
    result: z.SafeParseError<unknown>,
    context: Context,
  ) => TramwayResponse | undefined | Promise<TramwayResponse | undefined>;
}

export type ValidationTarget = 'json' | 'query';
