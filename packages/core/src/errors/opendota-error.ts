/**
 * Raised for any non-200 response that has no more specific error class.
 */
export class OpenDotaApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly responseText: string = '',
  ) {
    super(message);
    this.name = 'OpenDotaApiError';
  }
}

export class OpenDotaNotFoundError extends OpenDotaApiError {
  constructor(message = 'Resource not found', responseText = '') {
    super(message, 404, responseText);
    this.name = 'OpenDotaNotFoundError';
  }
}

export class OpenDotaRateLimitError extends OpenDotaApiError {
  /**
   * Delay suggested by the `Retry-After` header, when the server sent one.
   */
  public readonly retryAfterMs: number | undefined;

  constructor(
    message = 'Rate limit exceeded',
    responseText = '',
    retryAfterMs?: number,
  ) {
    super(message, 429, responseText);
    this.name = 'OpenDotaRateLimitError';
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * The request never produced an HTTP response: DNS or connection failure,
 * reset socket, or the per-call timeout elapsed.
 */
export class OpenDotaTransportError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly timedOut: boolean,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'OpenDotaTransportError';
  }
}

export class OpenDotaConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OpenDotaConfigError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
