export interface StandardError {
  code: string;
  message: string;
  details?: unknown;
  causeId?: string;
}

/**
 * Raised by the LLM client for a non-2xx provider response.
 */
export class LlmHttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly body: string,
    public readonly retryAfter?: string,
  ) {
    super(`HTTP ${status}: ${body.substring(0, 100)}`);
    this.name = 'LlmHttpError';
  }
}

/**
 * Raised when no LLM provider is configured.
 */
export class LlmUnavailableError extends Error {
  constructor(message = 'No LLM provider configured') {
    super(message);
    this.name = 'LlmUnavailableError';
  }
}

/**
 * Maps any thrown value to the standard error shape used in logs.
 */
export function toStdError(error: unknown, ctx?: string): StandardError {
  if (error instanceof LlmHttpError) {
    const status = error.status;

    if (status === 401 || status === 403) {
      return {
        code: 'auth_error',
        message: 'Authentication failed',
        details: { status },
        causeId: ctx,
      };
    }

    if (status === 404) {
      return {
        code: 'not_found',
        message: 'Resource not found',
        details: { status },
        causeId: ctx,
      };
    }

    if (status === 429) {
      return {
        code: 'rate_limit',
        message: 'Rate limit exceeded',
        details: { status, retryAfter: error.retryAfter },
        causeId: ctx,
      };
    }

    if (status >= 500) {
      return {
        code: 'server_error',
        message: 'Server error',
        details: { status },
        causeId: ctx,
      };
    }
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return {
        code: 'timeout',
        message: 'Request timeout',
        causeId: ctx,
      };
    }

    return {
      code: 'network_error',
      message: error.message,
      causeId: ctx,
    };
  }

  return {
    code: 'unknown_error',
    message: 'Unknown error occurred',
    details: error,
    causeId: ctx,
  };
}

/**
 * Raised when an awaited call outlives its deadline.
 */
export class DeadlineExceededError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Deadline of ${timeoutMs}ms exceeded`);
    this.name = 'TimeoutError';
  }
}
