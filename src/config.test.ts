import { describe, it, expect, vi } from 'vitest';
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT, resolveApiKey, resolveConfig } from './config';
import { ConfigurationError } from './errors';
import { expectInstance, thrownBy } from './test-helpers';

describe('resolveApiKey', () => {
  it('prefers the explicit key over the environment', () => {
    expect(resolveApiKey('explicit-key', { XIOCA_API_KEY: 'env-key' })).toBe('explicit-key');
  });

  it('falls back to XIOCA_API_KEY', () => {
    expect(resolveApiKey(undefined, { XIOCA_API_KEY: 'env-key' })).toBe('env-key');
  });

  it('reads process.env by default', () => {
    vi.stubEnv('XIOCA_API_KEY', 'stubbed-key');
    expect(resolveApiKey()).toBe('stubbed-key');
  });

  it('throws ConfigurationError when no key is available', () => {
    const error = expectInstance(thrownBy(() => resolveApiKey(undefined, {})), ConfigurationError);
    expect(error.message).toBe(
      'No API key provided. Pass apiKey to the client or set the XIOCA_API_KEY environment variable.'
    );
  });

  it('does not fall back to the environment for an explicit empty key', () => {
    expect(() => resolveApiKey('', { XIOCA_API_KEY: 'env-key' })).toThrow(ConfigurationError);
  });
});

describe('resolveConfig', () => {
  it('applies defaults', () => {
    const config = resolveConfig({ apiKey: 'test-key' }, {});

    expect(config).toEqual({
      apiKey: 'test-key',
      baseURL: DEFAULT_BASE_URL,
      timeout: DEFAULT_TIMEOUT,
      debug: false,
      logger: console,
      defaultHeaders: {},
    });
  });

  it('strips trailing slashes from baseURL', () => {
    const config = resolveConfig({ apiKey: 'test-key', baseURL: 'https://api.example.com/v2//' }, {});
    expect(config.baseURL).toBe('https://api.example.com/v2');
  });

  it('reads the base URL from XIOCA_BASE_URL', () => {
    const config = resolveConfig(
      { apiKey: 'test-key' },
      { XIOCA_BASE_URL: 'http://localhost:8080/api' }
    );
    expect(config.baseURL).toBe('http://localhost:8080/api');
  });

  it('prefers the baseURL option over the environment', () => {
    const config = resolveConfig(
      { apiKey: 'test-key', baseURL: 'https://option.example.com' },
      { XIOCA_BASE_URL: 'http://localhost:8080/api' }
    );
    expect(config.baseURL).toBe('https://option.example.com');
  });

  it.each(['not a url', 'ftp://files.example.com'])('rejects baseURL %s', (baseURL) => {
    expect(() => resolveConfig({ apiKey: 'test-key', baseURL }, {})).toThrow(ConfigurationError);
  });

  it.each([0, -5, Number.NaN, Number.POSITIVE_INFINITY])('rejects timeout %s', (timeout) => {
    expect(() => resolveConfig({ apiKey: 'test-key', timeout }, {})).toThrow(ConfigurationError);
  });

  it.each([
    { flag: '1', expected: true },
    { flag: 'TRUE', expected: true },
    { flag: 'no', expected: false },
  ])('reads XIOCA_DEBUG=$flag as $expected', ({ flag, expected }) => {
    expect(resolveConfig({ apiKey: 'test-key' }, { XIOCA_DEBUG: flag }).debug).toBe(expected);
  });

  it('prefers the debug option over the environment', () => {
    expect(resolveConfig({ apiKey: 'test-key', debug: false }, { XIOCA_DEBUG: '1' }).debug).toBe(false);
  });

  it('copies default headers', () => {
    const defaultHeaders = { 'X-Trace': 'abc' };
    const config = resolveConfig({ apiKey: 'test-key', defaultHeaders }, {});

    defaultHeaders['X-Trace'] = 'changed';
    expect(config.defaultHeaders).toEqual({ 'X-Trace': 'abc' });
  });
});
