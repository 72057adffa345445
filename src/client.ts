/**
 * Promise-based Xioca client
 */

import crossFetch from 'cross-fetch';
import { Agent as HttpAgent } from 'node:http';
import { Agent as HttpsAgent } from 'node:https';
import { resolveConfig, type Env } from './config';
import { assertOpen, handleResponse, prepareRequest, toTransportError } from './core';
import type { AsyncRequester, HttpMethod, ResolvedConfig, XiocaConfig } from './types';
import { Chat } from './resources/chat';
import { Images } from './resources/images';

export interface FetchRequestInit {
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
  /** Keep-alive agent owned by the client; read by node-fetch */
  agent: HttpAgent;
}

export interface FetchResponse {
  status: number;
  statusText: string;
  text(): Promise<string>;
}

/**
 * The subset of the Fetch API the client relies on.
 */
export type AsyncFetch = (url: string, init: FetchRequestInit) => Promise<FetchResponse>;

export type XiocaOptions = XiocaConfig<AsyncFetch>;

const defaultFetch: AsyncFetch = (url, init) => crossFetch(url, init);

function createAgent(baseURL: string): HttpAgent {
  return new URL(baseURL).protocol === 'https:'
    ? new HttpsAgent({ keepAlive: true })
    : new HttpAgent({ keepAlive: true });
}

/**
 * Main Xioca client for making API requests.
 *
 * @example
 * ```typescript
 * const client = new Xioca({ apiKey: 'test-key' });
 *
 * const completion = await client.chat.create({
 *   model: 'deepseek-v3',
 *   messages: [{ role: 'user', content: 'Hello!' }],
 * });
 *
 * console.log(completion.choices[0]?.message.content);
 * await client.close();
 * ```
 */
export class Xioca implements AsyncRequester {
  readonly baseURL: string;
  readonly timeout: number;

  // Resources
  readonly chat: Chat;
  readonly images: Images;

  private readonly config: ResolvedConfig;
  private readonly fetchFn: AsyncFetch;
  private readonly agent: HttpAgent;
  private _closed = false;

  /**
   * Create a new client. Throws ConfigurationError when no API key can be
   * resolved.
   */
  constructor(options: XiocaOptions = {}, env?: Env) {
    this.config = resolveConfig(options, env);
    this.baseURL = this.config.baseURL;
    this.timeout = this.config.timeout;
    this.fetchFn = options.fetch ?? defaultFetch;
    this.agent = createAgent(this.config.baseURL);

    this.chat = new Chat(this);
    this.images = new Images(this);
  }

  /**
   * Run `fn` with a fresh client and close it afterwards, whether `fn`
   * resolves or rejects.
   */
  static async scoped<T>(options: XiocaOptions, fn: (client: Xioca) => Promise<T>): Promise<T> {
    const client = new Xioca(options);
    try {
      return await fn(client);
    } finally {
      await client.close();
    }
  }

  get closed(): boolean {
    return this._closed;
  }

  /**
   * Make an HTTP request to the Xioca API and return the parsed JSON body.
   */
  async request(method: HttpMethod, path: string, body?: unknown): Promise<unknown> {
    assertOpen(this._closed);
    const request = prepareRequest(this.config, method, path, body);

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeout);

    let status: number;
    let statusText: string;
    let text: string;
    try {
      const response = await this.fetchFn(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
        agent: this.agent,
      });
      status = response.status;
      statusText = response.statusText;
      text = await response.text();
    } catch (error) {
      throw toTransportError(error, this.config.timeout);
    } finally {
      clearTimeout(timeoutId);
    }

    return handleResponse(this.config, { status, statusText, text });
  }

  /**
   * Destroy the client's connection pool. Later calls fail without reaching
   * the network. Closing twice is a no-op.
   */
  async close(): Promise<void> {
    if (this._closed) {
      return;
    }
    this._closed = true;
    this.agent.destroy();
  }
}
