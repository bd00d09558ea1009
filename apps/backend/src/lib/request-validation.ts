import type { Request } from 'express';
import type { z } from 'zod';
import { ValidationError } from './errors';

const SOURCE_MESSAGES = {
  body: 'Invalid request data',
  params: 'Invalid path parameters',
  query: 'Invalid query parameters',
} as const;

/** Parses one part of a request, failing with field-level details. */
export function parseRequest<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  source: keyof typeof SOURCE_MESSAGES
): z.output<T> {
  const result = schema.safeParse(value);

  if (!result.success) {
    throw new ValidationError(
      SOURCE_MESSAGES[source],
      result.error.errors.map((e) => ({
        field: e.path.join('.'),
        message: e.message,
      }))
    );
  }

  return result.data;
}

/**
 * Fails unless the request carried a non-empty JSON body. `express.json`
 * leaves `req.body` as `{}` for other content types and for empty bodies.
 */
export function requireJsonBody(req: Request, message: string): void {
  if (!req.is('application/json') || req.headers['content-length'] === '0') {
    throw new ValidationError(message);
  }
}
