/**
 * Image generation resource
 */

import { z } from 'zod';
import { ResponseParsingError } from '../errors';
import { deepFreeze } from '../helpers';
import { imageGenerateParamsSchema, validateParams } from '../schemas';
import type { AsyncRequester, ImageGenerateParams, ImageResult, SyncRequester } from '../types';
import { CHAT_COMPLETIONS_PATH, parseChatCompletion } from './chat';

export const IMAGE_GENERATIONS_PATH = CHAT_COMPLETIONS_PATH;

const imageURLSchema = z.string().url().refine((url) => /^https?:\/\//i.test(url));

/**
 * Validate image parameters and build the request body. The prompt is sent
 * as a single user message.
 */
export function buildImageGenerationBody(params: ImageGenerateParams): Record<string, unknown> {
  const { model, prompt } = validateParams(imageGenerateParamsSchema, params);
  return {
    model,
    messages: [{ role: 'user', content: prompt }],
  };
}

// Stops at whitespace, quotes, and the brackets around markdown links
const URL_IN_TEXT = /https?:\/\/[^\s<>"'()[\]]+/gi;

function findURLInText(text: string): string | undefined {
  for (const match of text.matchAll(URL_IN_TEXT)) {
    const candidate = match[0].replace(/[.,;:!?]+$/, '');
    if (imageURLSchema.safeParse(candidate).success) {
      return candidate;
    }
  }
  return undefined;
}

/**
 * Extract the image URL from a reply. The URL comes from the first choice's
 * `image_url`, or else from the first http(s) URL in its `content`, which
 * may be plain text or a markdown image. The message text is kept as
 * `content`.
 */
export function parseImageResult(data: unknown): ImageResult {
  const completion = parseChatCompletion(data);
  const message = completion.choices[0]?.message;
  const content = message?.content ?? null;

  const imageURL = message?.image_url;
  const url = imageURL != null && imageURLSchema.safeParse(imageURL).success
    ? imageURL
    : content !== null ? findURLInText(content) : undefined;
  if (url === undefined) {
    throw new ResponseParsingError(
      'Unexpected image response: no image URL in the first choice',
      data,
      ['choices.0.message.image_url: expected an http(s) URL']
    );
  }

  return deepFreeze({
    url,
    content,
    id: completion.id,
    model: completion.model,
    created: completion.created,
    usage: completion.usage ?? null,
  });
}

export class Images {
  constructor(private client: AsyncRequester) {}

  /**
   * Generate an image from a text prompt
   */
  async generate(params: ImageGenerateParams): Promise<ImageResult> {
    const body = buildImageGenerationBody(params);
    const data = await this.client.request('POST', IMAGE_GENERATIONS_PATH, body);
    return parseImageResult(data);
  }
}

export class SyncImages {
  constructor(private client: SyncRequester) {}

  /**
   * Generate an image from a text prompt, blocking until the reply arrives
   */
  generate(params: ImageGenerateParams): ImageResult {
    const body = buildImageGenerationBody(params);
    const data = this.client.request('POST', IMAGE_GENERATIONS_PATH, body);
    return parseImageResult(data);
  }
}
