import {
  DeadlineExceededError,
  LlmHttpError,
  LlmUnavailableError,
  toStdError,
} from '../../../src/util/errors.js';

describe('toStdError', () => {
  it('should map provider status codes', () => {
    expect(toStdError(new LlmHttpError(401, 'denied')).code).toBe('auth_error');
    expect(toStdError(new LlmHttpError(404, 'missing')).code).toBe('not_found');
    expect(toStdError(new LlmHttpError(503, 'down')).code).toBe('server_error');
  });

  it('should carry retry-after for rate limits', () => {
    expect(toStdError(new LlmHttpError(429, 'slow down', '3'), 'segment_classifier')).toEqual({
      code: 'rate_limit',
      message: 'Rate limit exceeded',
      details: { status: 429, retryAfter: '3' },
      causeId: 'segment_classifier',
    });
  });

  it('should report other client errors with their message', () => {
    expect(toStdError(new LlmHttpError(400, 'bad request'))).toMatchObject({
      code: 'network_error',
      message: 'HTTP 400: bad request',
    });
  });

  it('should classify deadlines and aborts as timeouts', () => {
    expect(toStdError(new DeadlineExceededError(100)).code).toBe('timeout');
    const abort = new Error('aborted');
    abort.name = 'AbortError';
    expect(toStdError(abort).code).toBe('timeout');
  });

  it('should fall back to network and unknown errors', () => {
    expect(toStdError(new LlmUnavailableError())).toMatchObject({
      code: 'network_error',
      message: 'No LLM provider configured',
    });
    expect(toStdError('weird')).toMatchObject({ code: 'unknown_error', details: 'weird' });
  });
});
