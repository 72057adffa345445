/**
 * Client configuration and credential resolution
 */

import { ConfigurationError } from './errors';
import type { Logger, ResolvedConfig, XiocaConfig } from './types';

export const DEFAULT_BASE_URL = 'https://xioca.live/api';
export const DEFAULT_TIMEOUT = 60000;

export const API_KEY_ENV = 'XIOCA_API_KEY';
export const BASE_URL_ENV = 'XIOCA_BASE_URL';
export const DEBUG_ENV = 'XIOCA_DEBUG';

export type Env = Record<string, string | undefined>;

/**
 * Resolve the API key. An explicit key wins over the environment.
 */
export function resolveApiKey(explicit?: string, env: Env = process.env): string {
  const apiKey = explicit ?? env[API_KEY_ENV];
  if (!apiKey) {
    throw new ConfigurationError(
      `No API key provided. Pass apiKey to the client or set the ${API_KEY_ENV} environment variable.`
    );
  }
  return apiKey;
}

function resolveBaseURL(explicit: string | undefined, env: Env): string {
  const baseURL = explicit ?? env[BASE_URL_ENV] ?? DEFAULT_BASE_URL;

  let parsed: URL;
  try {
    parsed = new URL(baseURL);
  } catch (error) {
    throw new ConfigurationError(
      `Invalid baseURL: ${baseURL}`,
      error instanceof Error ? error : undefined
    );
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigurationError(`baseURL must use http or https: ${baseURL}`);
  }

  return baseURL.replace(/\/+$/, '');
}

function resolveTimeout(timeout: number | undefined): number {
  if (timeout === undefined) {
    return DEFAULT_TIMEOUT;
  }
  if (!Number.isFinite(timeout) || timeout <= 0) {
    throw new ConfigurationError(`timeout must be a positive number of milliseconds, got ${timeout}`);
  }
  return timeout;
}

function resolveDebug(debug: boolean | undefined, env: Env): boolean {
  if (debug !== undefined) {
    return debug;
  }
  const flag = env[DEBUG_ENV]?.toLowerCase();
  return flag === '1' || flag === 'true';
}

export function resolveConfig<TFetch>(
  config: XiocaConfig<TFetch> = {},
  env: Env = process.env
): ResolvedConfig {
  const logger: Logger = config.logger ?? console;

  return {
    apiKey: resolveApiKey(config.apiKey, env),
    baseURL: resolveBaseURL(config.baseURL, env),
    timeout: resolveTimeout(config.timeout),
    debug: resolveDebug(config.debug, env),
    logger,
    defaultHeaders: { ...config.defaultHeaders },
  };
}
