/**
 * Blocking Xioca client
 */

import syncFetch from 'sync-fetch';
import { resolveConfig, type Env } from './config';
import { assertOpen, handleResponse, prepareRequest, toTransportError } from './core';
import type { HttpMethod, ResolvedConfig, SyncRequester, XiocaConfig } from './types';
import { SyncChat } from './resources/chat';
import { SyncImages } from './resources/images';

export interface SyncFetchRequestInit {
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
  timeout: number;
}

export interface SyncFetchResponse {
  status: number;
  statusText: string;
  text(): string;
}

/**
 * A fetch-like function that returns once the whole response has arrived.
 */
export type SyncFetch = (url: string, init: SyncFetchRequestInit) => SyncFetchResponse;

export type XiocaSyncOptions = XiocaConfig<SyncFetch>;

const defaultSyncFetch: SyncFetch = (url, init) => syncFetch(url, init);

/**
 * Xioca client whose calls block the calling thread until the response
 * arrives. Same surface as {@link Xioca}, without promises.
 *
 * Not meant to be shared between worker threads.
 */
export class XiocaSync implements SyncRequester {
  readonly baseURL: string;
  readonly timeout: number;

  // Resources
  readonly chat: SyncChat;
  readonly images: SyncImages;

  private readonly config: ResolvedConfig;
  private readonly fetchFn: SyncFetch;
  private _closed = false;

  constructor(options: XiocaSyncOptions = {}, env?: Env) {
    this.config = resolveConfig(options, env);
    this.baseURL = this.config.baseURL;
    this.timeout = this.config.timeout;
    this.fetchFn = options.fetch ?? defaultSyncFetch;

    this.chat = new SyncChat(this);
    this.images = new SyncImages(this);
  }

  /**
   * Run `fn` with a fresh client and close it afterwards, whether `fn`
   * returns or throws.
   */
  static scoped<T>(options: XiocaSyncOptions, fn: (client: XiocaSync) => T): T {
    const client = new XiocaSync(options);
    try {
      return fn(client);
    } finally {
      client.close();
    }
  }

  get closed(): boolean {
    return this._closed;
  }

  request(method: HttpMethod, path: string, body?: unknown): unknown {
    assertOpen(this._closed);
    const request = prepareRequest(this.config, method, path, body);

    let status: number;
    let statusText: string;
    let text: string;
    try {
      const response = this.fetchFn(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        timeout: this.config.timeout,
      });
      status = response.status;
      statusText = response.statusText;
      text = response.text();
    } catch (error) {
      throw toTransportError(error, this.config.timeout);
    }

    return handleResponse(this.config, { status, statusText, text });
  }

  /**
   * Mark the client closed. Each blocking request runs its connection inside
   * a short-lived sync-fetch worker process, so no sockets outlive a call.
   */
  close(): void {
    this._closed = true;
  }
}
