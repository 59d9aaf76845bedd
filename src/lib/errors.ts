// Error kinds shared by the provider adapters, the subscription manager and the digest pipeline

export type ErrorKind =
  | 'auth'
  | 'provider_rejected'
  | 'transient'
  | 'not_found'
  | 'delivery'
  | 'unknown';

/**
 * Base class for application errors.
 * `recoverable` tells the calling layer whether a bounded retry makes sense.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AppError';
  }
}

/** Credential invalid or expired, and refresh did not help */
export class AuthError extends AppError {
  constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'auth', false, context, options);
    this.name = 'AuthError';
  }
}

/** Subscription create/renew refused by the provider */
export class ProviderRejectedError extends AppError {
  constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'provider_rejected', true, context, options);
    this.name = 'ProviderRejectedError';
  }
}

/** Network failure, timeout, throttling or provider-side 5xx */
export class TransientError extends AppError {
  constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'transient', true, context, options);
    this.name = 'TransientError';
  }
}

/** Message or subscription no longer exists */
export class NotFoundError extends AppError {
  constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'not_found', false, context, options);
    this.name = 'NotFoundError';
  }
}

/** Notification sink failed to deliver */
export class DeliveryError extends AppError {
  constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'delivery', true, context, options);
    this.name = 'DeliveryError';
  }
}

export function errorKindOf(error: unknown): ErrorKind {
  return error instanceof AppError ? error.kind : 'unknown';
}

export function isRecoverable(error: unknown): boolean {
  return error instanceof AppError && error.recoverable;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Map an HTTP status from a provider call onto an error kind.
 * 401/403 auth, 404 not found, 408/429/5xx transient, any other 4xx rejected.
 */
export function errorForStatus(
  status: number,
  message: string,
  context?: Record<string, unknown>,
  options?: { cause?: unknown }
): AppError {
  if (status === 401 || status === 403) return new AuthError(message, context, options);
  if (status === 404) return new NotFoundError(message, context, options);
  if (status === 408 || status === 429 || status >= 500) {
    return new TransientError(message, context, options);
  }
  return new ProviderRejectedError(message, context, options);
}
