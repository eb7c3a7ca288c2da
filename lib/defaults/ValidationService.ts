/**
 * Tramway ValidationService
 *
 * Base class for request validators. A validator is a middleware: put it in front of
 * a route and it rejects requests whose JSON body or query string does not satisfy
 * its zod schemas.
 *
 * @module defaults/ValidationService
 *
 * @example
 * ```typescript
 * import { ValidationService } from 'tramway';
 * import { z } from 'zod';
 *
 * export class CreateUserValidator extends ValidationService {
 *   json() {
 *     return z.object({
 *       name: z.string().min(3),
 *       email: z.string().email()
 *     });
 *   }
 * }
 *
 * router.post('/users', createUser, { middleware: [new CreateUserValidator()] });
 * ```
 */

import { BadRequestException } from '../errors';
import { TramwayRequest } from '../TramwayRequest';
import type { Receive, Scope, Send } from '../types/Channel';
import type { TramwayNext } from '../types/Handler';
import type { ValidationSchema, ValidationSchemaWithHook, ValidationTarget } from '../types/Validation';
import { MiddlewareService } from './MiddlewareService';

type SchemaDefinition = ValidationSchema | ValidationSchemaWithHook;

const VALIDATION_TARGETS: readonly ValidationTarget[] = ['json', 'query'];

function isValidationSchemaWithHook(value: SchemaDefinition): value is ValidationSchemaWithHook {
  return !('safeParse' in value);
}

/**
 * Base class for Tramway validation services
 *
 * Schemas are resolved once, when the middleware loads. The body a validator reads
 * is replayed to the rest of the chain.
 */
export abstract class ValidationService extends MiddlewareService {

  /**
   * Schema for the JSON request body
   */
  public json?(): SchemaDefinition | Promise<SchemaDefinition>;

  /**
   * Schema for the query string, seen as a record of its last values
   */
  public query?(): SchemaDefinition | Promise<SchemaDefinition>;

  private readonly schemas = new Map<ValidationTarget, ValidationSchemaWithHook>();

  public override async onLoad(): Promise<void> {
    for (const target of VALIDATION_TARGETS) {
      const factory = this[target];

      if (typeof factory !== 'function') {
        continue;
      }

      const schema = await factory.call(this);

      this.schemas.set(target, isValidationSchemaWithHook(schema) ? schema : { schema });
    }
  }

  public async handle(scope: Scope, receive: Receive, send: Send, next: TramwayNext): Promise<void> {
    if (scope.type !== 'http' || this.schemas.size === 0) {
      await next(scope, receive, send);
      return;
    }

    const request = new TramwayRequest(scope, receive, send);

    for (const [target, { schema, hook }] of this.schemas) {
      const data = target === 'json' ? await request.json() : Object.fromEntries(request.query);
      const result = schema.safeParse(data);

      if (result.success) {
        continue;
      }

      const replacement = hook ? await hook(result, request) : undefined;

      if (replacement) {
        await replacement.send(send);
        return;
      }

      throw new BadRequestException({
        error: 'Validation failed',
        details: result.error.flatten(),
      });
    }

    await next(scope, request.replay(), send);
  }

}
