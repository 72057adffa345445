/**
 * Request construction and response handling shared by both clients
 */

import {
  createErrorFromResponse,
  NetworkError,
  ResponseParsingError,
  TimeoutError,
  XiocaError,
} from './errors';
import type { HttpMethod, PreparedRequest, RawResponse, ResolvedConfig } from './types';

export const VERSION = '0.1.0';

export function buildURL(baseURL: string, path: string): string {
  return `${baseURL.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

export function prepareRequest(
  config: ResolvedConfig,
  method: HttpMethod,
  path: string,
  body?: unknown
): PreparedRequest {
  const headers: Record<string, string> = {
    'Authorization': `Bearer ${config.apiKey}`,
    'Accept': 'application/json',
    'User-Agent': `xioca-js/${VERSION}`,
  };

  if (body !== undefined) {
    headers['Content-Type'] = 'application/json';
  }

  const request: PreparedRequest = {
    method,
    url: buildURL(config.baseURL, path),
    headers: { ...headers, ...config.defaultHeaders },
  };
  if (body !== undefined) {
    request.body = JSON.stringify(body);
  }

  if (config.debug) {
    config.logger.log(`DEBUG: ${request.method} ${request.url}`);
    if (request.body !== undefined) {
      config.logger.log('DEBUG: Request body:', JSON.stringify(body, null, 2));
    }
  }

  return request;
}

function parseJSON(text: string): { ok: true; value: unknown } | { ok: false; error: Error } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
  }
}

/**
 * Turn a received response into parsed JSON, or throw the matching error.
 */
export function handleResponse(config: ResolvedConfig, response: RawResponse): unknown {
  if (config.debug) {
    config.logger.log(`DEBUG: Response status: ${response.status}`);
  }

  const parsed = parseJSON(response.text);

  if (response.status < 200 || response.status >= 300) {
    const fallback = response.text.trim() || response.statusText;
    throw createErrorFromResponse(response.status, parsed.ok ? parsed.value : undefined, fallback);
  }

  if (!parsed.ok) {
    throw new ResponseParsingError(
      `Response body is not valid JSON: ${parsed.error.message}`,
      response.text,
      [],
      parsed.error
    );
  }
  return parsed.value;
}

/**
 * Map a failure thrown while sending a request onto the client's error types.
 * Errors the client raised itself pass through unchanged.
 */
export function toTransportError(error: unknown, timeout: number): XiocaError {
  if (error instanceof XiocaError) {
    return error;
  }

  if (error instanceof Error) {
    const type = 'type' in error ? error.type : undefined;
    if (error.name === 'AbortError' || error.name === 'TimeoutError' || type === 'request-timeout') {
      return new TimeoutError(timeout, error);
    }
    return new NetworkError(`Request failed: ${error.message}`, error);
  }

  return new NetworkError(`Request failed: ${String(error)}`);
}

export function assertOpen(closed: boolean): void {
  if (closed) {
    throw new XiocaError('Client has been closed');
  }
}
