/**
 * Error classes for the Xioca TypeScript client
 */

export class XiocaError extends Error {
  constructor(message: string, public cause?: Error) {
    super(message);
    this.name = 'XiocaError';
  }
}

/**
 * Missing or invalid client configuration. Raised before any request is made.
 */
export class ConfigurationError extends XiocaError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'ConfigurationError';
  }
}

/**
 * Request parameters rejected locally, before any request is made.
 */
export class ValidationError extends XiocaError {
  constructor(
    message: string,
    public fieldErrors: Record<string, string[]> = {},
    cause?: Error
  ) {
    super(message, cause);
    this.name = 'ValidationError';
  }
}

export class NetworkError extends XiocaError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'NetworkError';
  }
}

export class TimeoutError extends NetworkError {
  constructor(public timeout: number, cause?: Error) {
    super(`Request timed out after ${timeout}ms`, cause);
    this.name = 'TimeoutError';
  }
}

export class APIError extends XiocaError {
  constructor(
    message: string,
    public status: number,
    public code?: string,
    public body?: unknown,
    cause?: Error
  ) {
    super(message, cause);
    this.name = 'APIError';
  }
}

export class AuthenticationError extends APIError {
  constructor(message: string = 'Authentication failed', code?: string, body?: unknown) {
    super(message, 401, code, body);
    this.name = 'AuthenticationError';
  }
}

export class PermissionDeniedError extends APIError {
  constructor(message: string = 'Permission denied', code?: string, body?: unknown) {
    super(message, 403, code, body);
    this.name = 'PermissionDeniedError';
  }
}

export class NotFoundError extends APIError {
  constructor(message: string = 'Resource or model not found', code?: string, body?: unknown) {
    super(message, 404, code, body);
    this.name = 'NotFoundError';
  }
}

export class RateLimitError extends APIError {
  constructor(
    message: string = 'Rate limit exceeded',
    public retryAfter?: number,
    code?: string,
    body?: unknown
  ) {
    super(message, 429, code, body);
    this.name = 'RateLimitError';
  }
}

/**
 * The server answered with a 2xx status but the body was not the expected
 * JSON document.
 */
export class ResponseParsingError extends XiocaError {
  constructor(
    message: string,
    public body: unknown,
    public issues: string[] = [],
    cause?: Error
  ) {
    super(message, cause);
    this.name = 'ResponseParsingError';
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Pull a message and a machine-readable code out of an error body.
 */
export function extractErrorDetails(
  body: unknown,
  fallback: string
): { message: string; code?: string } {
  if (!isRecord(body)) {
    return { message: fallback };
  }

  const error = body.error;
  if (typeof error === 'string' && error.length > 0) {
    return { message: error, code: stringField(body, 'code') ?? error };
  }
  if (isRecord(error)) {
    const message = stringField(error, 'message');
    if (message) {
      return { message, code: stringField(error, 'code') ?? stringField(error, 'type') };
    }
  }

  const message = stringField(body, 'message') ?? stringField(body, 'detail');
  if (message) {
    return { message, code: stringField(body, 'code') };
  }
  return { message: fallback, code: stringField(body, 'code') };
}

/**
 * Create an appropriate error from a non-2xx HTTP response.
 *
 * `body` is the parsed JSON payload, or `undefined` when the payload was not
 * JSON; `rawText` is used as the message in that case.
 */
export function createErrorFromResponse(
  status: number,
  body: unknown,
  rawText: string = ''
): APIError {
  const fallback = rawText.trim() || `HTTP ${status}`;
  const { message, code } = extractErrorDetails(body, fallback);

  switch (status) {
    case 401:
      return new AuthenticationError(message, code, body);
    case 403:
      return new PermissionDeniedError(message, code, body);
    case 404:
      return new NotFoundError(message, code, body);
    case 429: {
      const retryAfter = isRecord(body) && typeof body.retry_after === 'number'
        ? body.retry_after
        : undefined;
      return new RateLimitError(message, retryAfter, code, body);
    }
    default:
      return new APIError(message, status, code, body);
  }
}
