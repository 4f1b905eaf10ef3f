// src/validators/parseBody.ts
import { z } from 'zod';
import { RequestValidationError } from '../services/letters/errors';

/**
 * Parse a request body against a schema.
 *
 * @throws RequestValidationError listing every issue as `path: message`
 */
export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown, traceId?: string): z.output<T> {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new RequestValidationError(
      result.error.issues.map((issue) => ({
        path: issue.path.length > 0 ? issue.path.join('.') : '(body)',
        message: issue.message,
      })),
      traceId
    );
  }
  return result.data;
}
