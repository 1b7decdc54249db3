import type { RequestError } from '@octokit/request-error';

export type GatewayResult<T> =
  | { kind: 'ok'; value: T }
  | { kind: 'not-found' }
  | { kind: 'rate-limited'; error: Error }
  | { kind: 'error'; error: Error };

export type GatewayFailure = Exclude<GatewayResult<unknown>, { kind: 'ok' }>;

export const ok = <T>(value: T): GatewayResult<T> => ({ kind: 'ok', value });

const isRequestError = (err: unknown): err is RequestError =>
  err instanceof Error && 'status' in err && typeof err.status === 'number';

const isRateLimited = (err: RequestError) => {
  if (err.status === 429) return true;
  const remaining = err.response?.headers['x-ratelimit-remaining'];
  if (err.status === 403 && `${remaining}` === '0') return true;
  return /rate limit/i.test(err.message);
};

/**
 * Maps anything an Octokit call can throw onto the closed set of outcomes the
 * reconcilers branch on.
 */
export function classify(err: unknown): GatewayFailure {
  if (isRequestError(err)) {
    if (err.status === 404) return { kind: 'not-found' };
    if (isRateLimited(err)) return { kind: 'rate-limited', error: err };
    return { kind: 'error', error: err };
  }
  return { kind: 'error', error: err instanceof Error ? err : new Error(String(err)) };
}
