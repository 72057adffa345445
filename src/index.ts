/**
 * Xioca TypeScript client
 *
 * Client library for the Xioca generative AI API: chat completions and image
 * generation, with a promise-based client and a blocking one.
 *
 * @example
 * ```typescript
 * import { Xioca, Models, createSystemMessage, createUserMessage } from 'xioca-api';
 *
 * const client = new Xioca({ apiKey: 'your-api-key' });
 *
 * const response = await client.chat.create({
 *   model: Models.DEEPSEEK_V3,
 *   messages: [
 *     createSystemMessage('You are a helpful assistant.'),
 *     createUserMessage('Hello, world!')
 *   ],
 *   temperature: 0.7
 * });
 *
 * console.log(response.choices[0]?.message.content);
 * ```
 */

import { Xioca } from './client';

export { Xioca } from './client';
export { XiocaSync } from './sync-client';
export {
  XiocaError,
  ConfigurationError,
  ValidationError,
  NetworkError,
  TimeoutError,
  APIError,
  AuthenticationError,
  PermissionDeniedError,
  NotFoundError,
  RateLimitError,
  ResponseParsingError,
  createErrorFromResponse,
} from './errors';

export type { AsyncFetch, FetchRequestInit, FetchResponse, XiocaOptions } from './client';
export type {
  SyncFetch,
  SyncFetchRequestInit,
  SyncFetchResponse,
  XiocaSyncOptions,
} from './sync-client';

export type {
  // Core types
  XiocaConfig,
  Logger,
  HttpMethod,

  // Chat types
  TextModel,
  Role,
  ChatMessageParam,
  ChatCompletionCreateParams,
  ChatMessage,
  Choice,
  Usage,
  ChatCompletion,

  // Image types
  ImageModel,
  ImageGenerateParams,
  ImageResult,
} from './types';

export {
  API_KEY_ENV,
  BASE_URL_ENV,
  DEBUG_ENV,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT,
  resolveApiKey,
} from './config';

export {
  // Model constants
  Models,
  TEXT_MODELS,
  IMAGE_MODELS,
  isTextModel,
  isImageModel,

  // Helper functions
  createUserMessage,
  createSystemMessage,
  createAssistantMessage,
  formatTokenUsage,

  // Role constants
  Roles,

  // Finish reason constants
  FinishReasons
} from './helpers';

// Default export
export default Xioca;
