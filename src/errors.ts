import type { GatewayFailure, GatewayResult } from './gateway/result.js';

export class GatewayError extends Error {
  constructor(
    public readonly operation: string,
    cause: Error,
  ) {
    super(`${operation}: ${cause.message}`, { cause });
    this.name = 'GatewayError';
  }
}

export class RateLimitError extends Error {
  constructor(
    public readonly operation: string,
    cause: Error,
  ) {
    super(`github: hit rate limit while ${operation}`, { cause });
    this.name = 'RateLimitError';
  }
}

export class NotFoundError extends Error {
  constructor(public readonly operation: string) {
    super(`${operation}: not found`);
    this.name = 'NotFoundError';
  }
}

export class ManifestError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ManifestError';
  }
}

export function toError(failure: GatewayFailure, operation: string): Error {
  switch (failure.kind) {
    case 'not-found':
      return new NotFoundError(operation);
    case 'rate-limited':
      return new RateLimitError(operation, failure.error);
    case 'error':
      return new GatewayError(operation, failure.error);
  }
}

/**
 * Unwraps a result the caller cannot proceed without. Every non-ok outcome,
 * not-found included, ends the current run.
 */
export function expectOk<T>(result: GatewayResult<T>, operation: string): T {
  if (result.kind === 'ok') return result.value;
  throw toError(result, operation);
}
