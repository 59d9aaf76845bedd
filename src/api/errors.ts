import type { Context } from 'hono';
import { ZodError } from 'zod';
import { AppError, errorMessage } from '../lib/errors.js';

/**
 * Map an error to a `{ detail }` response:
 * not found 404, auth 401, provider trouble 502, bad input 400, anything else 500.
 */
export function errorResponse(c: Context, error: unknown) {
  if (error instanceof ZodError) {
    return c.json({ detail: error.issues.map((issue) => issue.message).join('; ') }, 400);
  }

  if (error instanceof AppError) {
    switch (error.kind) {
      case 'not_found':
        return c.json({ detail: error.message }, 404);
      case 'auth':
        return c.json({ detail: error.message }, 401);
      case 'provider_rejected':
      case 'transient':
      case 'delivery':
        return c.json({ detail: error.message }, 502);
      default:
        break;
    }
  }

  console.error('[API] Unhandled error:', error);
  return c.json({ detail: errorMessage(error) }, 500);
}
