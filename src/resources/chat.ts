/**
 * Chat completion resource
 */

import { chatCompletionCreateParamsSchema, chatCompletionSchema, parseResponse, validateParams } from '../schemas';
import type {
  AsyncRequester,
  ChatCompletion,
  ChatCompletionCreateParams,
  SyncRequester,
} from '../types';

export const CHAT_COMPLETIONS_PATH = '/ai';

/**
 * Validate chat completion parameters and build the request body. Optional
 * fields the caller left out stay out of the body.
 */
export function buildChatCompletionBody(params: ChatCompletionCreateParams): Record<string, unknown> {
  const { model, messages, online, temperature } = validateParams(chatCompletionCreateParamsSchema, params);

  const body: Record<string, unknown> = {
    model,
    messages: messages.map((message) =>
      message.image_url === undefined
        ? { role: message.role, content: message.content }
        : { role: message.role, content: message.content, image_url: message.image_url }
    ),
  };
  if (online !== undefined) {
    body.online = online;
  }
  if (temperature !== undefined) {
    body.temperature = temperature;
  }
  return body;
}

export function parseChatCompletion(data: unknown): ChatCompletion {
  return parseResponse(chatCompletionSchema, data, 'chat completion');
}

export class Chat {
  constructor(private client: AsyncRequester) {}

  /**
   * Create a chat completion
   */
  async create(params: ChatCompletionCreateParams): Promise<ChatCompletion> {
    const body = buildChatCompletionBody(params);
    const data = await this.client.request('POST', CHAT_COMPLETIONS_PATH, body);
    return parseChatCompletion(data);
  }
}

export class SyncChat {
  constructor(private client: SyncRequester) {}

  /**
   * Create a chat completion, blocking until the reply arrives
   */
  create(params: ChatCompletionCreateParams): ChatCompletion {
    const body = buildChatCompletionBody(params);
    const data = this.client.request('POST', CHAT_COMPLETIONS_PATH, body);
    return parseChatCompletion(data);
  }
}
