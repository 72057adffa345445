/**
 * Shared fixtures for the test suites
 */

import { expect } from 'vitest';
import type { FetchResponse } from './client';
import type { SyncFetchResponse } from './sync-client';

export const chatCompletionFixture = {
  id: 'chatcmpl-123',
  object: 'chat.completion',
  created: 1700000000,
  model: 'deepseek-v3',
  choices: [
    {
      index: 0,
      message: { role: 'assistant', content: 'Paris is the capital of France.' },
      finish_reason: 'stop',
    },
  ],
  usage: { prompt_tokens: 12, completion_tokens: 7, total_tokens: 19 },
};

export const imageCompletionFixture = {
  id: 'img-456',
  object: 'chat.completion',
  created: 1700000100,
  model: 'flux',
  choices: [
    {
      index: 0,
      message: { role: 'assistant', content: null, image_url: 'https://cdn.example.com/images/fox.png' },
      finish_reason: 'stop',
    },
  ],
};

interface MockResponseOptions {
  status?: number;
  statusText?: string;
}

function bodyText(data: unknown): string {
  return typeof data === 'string' ? data : JSON.stringify(data);
}

export function createMockResponse(data: unknown, options: MockResponseOptions = {}): FetchResponse {
  const { status = 200, statusText = 'OK' } = options;
  const text = bodyText(data);
  return {
    status,
    statusText,
    text: () => Promise.resolve(text),
  };
}

export function createSyncMockResponse(data: unknown, options: MockResponseOptions = {}): SyncFetchResponse {
  const { status = 200, statusText = 'OK' } = options;
  const text = bodyText(data);
  return {
    status,
    statusText,
    text: () => text,
  };
}

/**
 * Parameters as they arrive from untyped callers, e.g. read from a JSON file.
 */
export function untyped<T>(value: Record<string, unknown>): T {
  return JSON.parse(JSON.stringify(value));
}

export function expectInstance<T>(value: unknown, ctor: new (...args: never[]) => T): T {
  expect(value).toBeInstanceOf(ctor);
  if (!(value instanceof ctor)) {
    throw new Error(`Expected an instance of ${ctor.name}`);
  }
  return value;
}

export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected promise to reject');
}

export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}
