/**
 * Type definitions for the Xioca TypeScript client
 */

import type { IMAGE_MODELS, ROLES, TEXT_MODELS } from './helpers';

export type TextModel = (typeof TEXT_MODELS)[number];
export type ImageModel = (typeof IMAGE_MODELS)[number];
export type Role = (typeof ROLES)[number];

export type HttpMethod = 'GET' | 'POST';

/**
 * Minimal logger used for debug output. `console` satisfies it.
 */
export interface Logger {
  log(message: string, ...args: unknown[]): void;
}

export interface XiocaConfig<TFetch> {
  /** API key; falls back to the XIOCA_API_KEY environment variable */
  apiKey?: string;
  /** Base URL for the API (default: https://xioca.live/api) */
  baseURL?: string;
  /** Request timeout in milliseconds (default: 60000) */
  timeout?: number;
  /** Log every request and response status */
  debug?: boolean;
  /** Destination for debug output (default: console) */
  logger?: Logger;
  /** Extra headers sent with every request */
  defaultHeaders?: Record<string, string>;
  /** Custom fetch implementation */
  fetch?: TFetch;
}

export interface ResolvedConfig {
  apiKey: string;
  baseURL: string;
  timeout: number;
  debug: boolean;
  logger: Logger;
  defaultHeaders: Record<string, string>;
}

export interface PreparedRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

/**
 * The parts of an HTTP response the client reads, once the body is in memory.
 */
export interface RawResponse {
  status: number;
  statusText: string;
  text: string;
}

// Chat types
export interface ChatMessageParam {
  role: Role;
  content: string;
  image_url?: string;
}

export interface ChatCompletionCreateParams {
  model: TextModel;
  messages: ChatMessageParam[];
  /** Let the model consult live web results */
  online?: boolean;
  /** Sampling temperature between 0 and 2 */
  temperature?: number;
}

export interface ChatMessage {
  readonly role: Role;
  readonly content?: string | null;
  readonly image_url?: string | null;
}

export interface Choice {
  readonly index: number;
  readonly message: ChatMessage;
  readonly finish_reason?: string | null;
}

export interface Usage {
  readonly prompt_tokens: number;
  readonly completion_tokens: number;
  readonly total_tokens: number;
}

export interface ChatCompletion {
  readonly id: string;
  readonly object: string;
  readonly created: number;
  readonly model: string;
  readonly choices: readonly Choice[];
  readonly usage?: Usage | null;
}

// Image types
export interface ImageGenerateParams {
  model: ImageModel;
  prompt: string;
}

export interface ImageResult {
  readonly url: string;
  /** Text of the reply message, if any */
  readonly content: string | null;
  readonly id: string;
  readonly model: string;
  readonly created: number;
  readonly usage: Usage | null;
}

/**
 * Anything that can send a prepared request and hand back parsed JSON.
 * Implemented by both client facades.
 */
export interface AsyncRequester {
  request(method: HttpMethod, path: string, body?: unknown): Promise<unknown>;
}

export interface SyncRequester {
  request(method: HttpMethod, path: string, body?: unknown): unknown;
}
