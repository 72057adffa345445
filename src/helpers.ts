/**
 * Helper functions and constants for the Xioca TypeScript client
 */

import type { ChatMessageParam, ImageModel, TextModel, Usage } from './types';

// Model constants
export const Models = {
  // Text models
  DEEPSEEK_V3: 'deepseek-v3',
  DEEPSEEK_R1: 'deepseek-r1',
  QWEN3: 'qwen3',
  DEEPCODER: 'deepcoder',
  LLAMA_3_3: 'llama-3.3',

  // Image models
  FLUX: 'flux',
} as const;

export const TEXT_MODELS = [
  Models.DEEPSEEK_V3,
  Models.DEEPSEEK_R1,
  Models.QWEN3,
  Models.DEEPCODER,
  Models.LLAMA_3_3,
] as const;

export const IMAGE_MODELS = [Models.FLUX] as const;

// Role constants
export const Roles = {
  SYSTEM: 'system',
  USER: 'user',
  ASSISTANT: 'assistant',
} as const;

export const ROLES = [Roles.SYSTEM, Roles.USER, Roles.ASSISTANT] as const;

// Finish reason constants
export const FinishReasons = {
  STOP: 'stop',
  LENGTH: 'length',
  CONTENT_FILTER: 'content_filter',
} as const;

export const TEMPERATURE_RANGE = { min: 0, max: 2 } as const;

export function isTextModel(model: string): model is TextModel {
  return TEXT_MODELS.some((candidate) => candidate === model);
}

export function isImageModel(model: string): model is ImageModel {
  return IMAGE_MODELS.some((candidate) => candidate === model);
}

// Message creation helpers
export function createSystemMessage(content: string): ChatMessageParam {
  return {
    role: 'system',
    content,
  };
}

export function createUserMessage(content: string, imageUrl?: string): ChatMessageParam {
  return imageUrl === undefined
    ? { role: 'user', content }
    : { role: 'user', content, image_url: imageUrl };
}

export function createAssistantMessage(content: string): ChatMessageParam {
  return {
    role: 'assistant',
    content,
  };
}

export function formatTokenUsage(usage: Usage): string {
  return `${usage.prompt_tokens} prompt + ${usage.completion_tokens} completion = ${usage.total_tokens} tokens`;
}

/**
 * Recursively freeze a parsed response so callers cannot mutate it.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
