import { z, type ZodError, type ZodType } from 'zod';
import type { Context, Env } from 'hono';
import { InputValidationException } from '../core/exceptions.js';

/**
 * Creates a JSON content type definition for OpenAPI responses.
 *
 * @example
 * ```ts
 * responses: {
 *   200: jsonContent(successSchema(CompanyFullSchema), 'Company retrieved'),
 * }
 * ```
 */
export function jsonContent<T extends ZodType>(
  schema: T,
  description: string
): {
  content: { 'application/json': { schema: T } };
  description: string;
} {
  return {
    content: {
      'application/json': { schema },
    },
    description,
  };
}

/**
 * Same as jsonContent but marks the content as required (request bodies).
 */
export function jsonContentRequired<T extends ZodType>(
  schema: T,
  description: string
): {
  content: { 'application/json': { schema: T } };
  description: string;
  required: true;
} {
  return {
    ...jsonContent(schema, description),
    required: true,
  };
}

/**
 * Schema of the error envelope.
 */
export const ErrorResponseSchema = z.object({
  success: z.literal(false),
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.unknown().optional(),
    requestId: z.string().optional(),
  }),
});

/**
 * Wraps a result schema in the success envelope.
 */
export function successSchema<T extends ZodType>(result: T) {
  return z.object({
    success: z.literal(true),
    result,
  });
}

/**
 * Validation hook installed as the OpenAPIHono `defaultHook`.
 * Answers invalid requests with 400 and the `VALIDATION_ERROR` envelope.
 */
export function validationHook<E extends Env>(
  result: { success: true } | { success: false; error: Pick<ZodError, 'issues'> },
  c: Context<E>
): Response | undefined {
  if (!result.success) {
    return c.json(InputValidationException.fromZodError(result.error).toJSON(), 400);
  }
  return undefined;
}
