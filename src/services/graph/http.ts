// HTTP transport shared by the Graph client and the Telegram sink
import { Gaxios, type GaxiosOptions } from 'gaxios';
import { z } from 'zod';
import { AppError, TransientError, errorForStatus, errorMessage } from '../../lib/errors.js';

export interface HttpResponse<T = unknown> {
  status: number;
  data: T;
}

/**
 * Minimal request surface; a gaxios instance satisfies it, tests pass a fake.
 * Bodies come back untyped and are parsed with zod by the caller.
 */
export interface HttpTransport {
  request(options: GaxiosOptions): Promise<HttpResponse<unknown>>;
}

export function createTransport(): HttpTransport {
  return new Gaxios();
}

const HttpFailureSchema = z.object({
  code: z.union([z.string(), z.number()]).optional(),
  response: z
    .object({
      status: z.number(),
      data: z.unknown().optional(),
    })
    .optional(),
});

const GraphErrorBodySchema = z.object({
  error: z.union([
    z.object({ code: z.string().optional(), message: z.string().optional() }),
    z.string(),
  ]),
  error_description: z.string().optional(),
  description: z.string().optional(),
});

/**
 * Extract the provider's error description from a response body
 */
function describeBody(data: unknown): string | undefined {
  const parsed = GraphErrorBodySchema.safeParse(data);
  if (!parsed.success) return undefined;

  const { error, error_description, description } = parsed.data;
  if (typeof error === 'string') {
    return error_description ?? description ?? error;
  }
  return error.message ?? error.code ?? description;
}

/**
 * Translate a failed transport call into an AppError.
 * A response status decides the kind; no response at all (DNS, reset, timeout) is transient.
 */
export function toAppError(
  error: unknown,
  operation: string,
  context?: Record<string, unknown>
): AppError {
  if (error instanceof AppError) return error;

  const failure = HttpFailureSchema.safeParse(error);
  const status = failure.success ? failure.data.response?.status : undefined;

  if (status === undefined) {
    const code = failure.success && failure.data.code !== undefined ? ` (${failure.data.code})` : '';
    return new TransientError(`${operation} failed${code}: ${errorMessage(error)}`, context, {
      cause: error,
    });
  }

  const detail = describeBody(failure.success ? failure.data.response?.data : undefined);
  const message = `${operation} failed with HTTP ${status}${detail ? `: ${detail}` : ''}`;
  return errorForStatus(status, message, { ...context, status }, { cause: error });
}
