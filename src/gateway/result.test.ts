import { RequestError } from '@octokit/request-error';
import { describe, it, expect } from 'vitest';

import { classify } from './result.js';

const requestError = (status: number, message: string, headers: Record<string, string> = {}) =>
  new RequestError(message, status, {
    request: { method: 'GET', url: 'https://api.github.com/orgs/acme', headers: {} },
    response: { status, url: 'https://api.github.com/orgs/acme', headers, data: { message } },
  });

describe('classify', () => {
  it('maps a 404 to not-found', () => {
    expect(classify(requestError(404, 'Not Found'))).toEqual({ kind: 'not-found' });
  });

  it('maps a 429 to rate-limited', () => {
    expect(classify(requestError(429, 'Too Many Requests')).kind).toBe('rate-limited');
  });

  it('maps a 403 with no remaining quota to rate-limited', () => {
    const err = requestError(403, 'Forbidden', { 'x-ratelimit-remaining': '0' });
    expect(classify(err).kind).toBe('rate-limited');
  });

  it('maps a secondary rate limit message to rate-limited', () => {
    const err = requestError(403, 'You have exceeded a secondary rate limit');
    expect(classify(err).kind).toBe('rate-limited');
  });

  it('keeps any other 403 as an error', () => {
    const err = requestError(403, 'Resource not accessible by integration', {
      'x-ratelimit-remaining': '4999',
    });
    expect(classify(err)).toEqual({ kind: 'error', error: err });
  });

  it('wraps a thrown non-error value', () => {
    const result = classify('socket hang up');
    expect(result.kind).toBe('error');
    expect(result.kind === 'error' && result.error.message).toBe('socket hang up');
  });
});
