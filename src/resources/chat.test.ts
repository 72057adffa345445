import { describe, it, expect, vi } from 'vitest';
import { ResponseParsingError, ValidationError } from '../errors';
import { TEXT_MODELS } from '../helpers';
import {
  chatCompletionFixture,
  expectInstance,
  thrownBy,
  untyped,
} from '../test-helpers';
import type { AsyncRequester, ChatCompletionCreateParams } from '../types';
import { buildChatCompletionBody, Chat, CHAT_COMPLETIONS_PATH, parseChatCompletion } from './chat';

const messages = [{ role: 'user' as const, content: 'Hello' }];

describe('buildChatCompletionBody', () => {
  it.each(TEXT_MODELS)('accepts the %s model', (model) => {
    expect(buildChatCompletionBody({ model, messages })).toEqual({ model, messages });
  });

  it('leaves out optional fields the caller did not supply', () => {
    const body = buildChatCompletionBody({ model: 'qwen3', messages });
    expect(Object.keys(body)).toEqual(['model', 'messages']);
  });

  it('includes online and temperature when supplied', () => {
    const body = buildChatCompletionBody({
      model: 'deepseek-r1',
      messages,
      online: false,
      temperature: 0,
    });
    expect(body).toEqual({ model: 'deepseek-r1', messages, online: false, temperature: 0 });
  });

  it.each([0, 1.3, 2])('accepts temperature %s', (temperature) => {
    expect(buildChatCompletionBody({ model: 'qwen3', messages, temperature }).temperature).toBe(temperature);
  });

  it.each([2.1, -0.1])('rejects temperature %s', (temperature) => {
    const error = expectInstance(
      thrownBy(() => buildChatCompletionBody({ model: 'qwen3', messages, temperature })),
      ValidationError
    );
    expect(error.fieldErrors).toEqual({ temperature: ['temperature must be between 0 and 2'] });
    expect(error.message).toBe('temperature: temperature must be between 0 and 2');
  });

  it('rejects a NaN temperature', () => {
    const error = expectInstance(
      thrownBy(() => buildChatCompletionBody({ model: 'qwen3', messages, temperature: Number.NaN })),
      ValidationError
    );
    expect(Object.keys(error.fieldErrors)).toEqual(['temperature']);
  });

  it('rejects an unsupported model', () => {
    const params = untyped<ChatCompletionCreateParams>({ model: 'gpt-4', messages });
    const error = expectInstance(thrownBy(() => buildChatCompletionBody(params)), ValidationError);
    expect(error.fieldErrors).toEqual({
      model: ['model must be one of: deepseek-v3, deepseek-r1, qwen3, deepcoder, llama-3.3'],
    });
  });

  it('rejects an image model', () => {
    const params = untyped<ChatCompletionCreateParams>({ model: 'flux', messages });
    expect(() => buildChatCompletionBody(params)).toThrow(ValidationError);
  });

  it('rejects an empty message list', () => {
    const error = expectInstance(
      thrownBy(() => buildChatCompletionBody({ model: 'qwen3', messages: [] })),
      ValidationError
    );
    expect(error.fieldErrors).toEqual({ messages: ['messages cannot be empty'] });
  });

  it('rejects an unknown role', () => {
    const params = untyped<ChatCompletionCreateParams>({
      model: 'qwen3',
      messages: [{ role: 'tool', content: 'result' }],
    });
    const error = expectInstance(thrownBy(() => buildChatCompletionBody(params)), ValidationError);
    expect(error.fieldErrors).toEqual({
      'messages.0.role': ['role must be one of: system, user, assistant'],
    });
  });

  it('keeps image URLs on messages and drops unknown fields', () => {
    const params = untyped<ChatCompletionCreateParams>({
      model: 'deepseek-v3',
      messages: [
        { role: 'user', content: 'What is in this picture?', image_url: 'https://example.com/cat.png', name: 'ann' },
      ],
    });

    expect(buildChatCompletionBody(params).messages).toEqual([
      { role: 'user', content: 'What is in this picture?', image_url: 'https://example.com/cat.png' },
    ]);
  });
});

describe('parseChatCompletion', () => {
  it('returns the completion with its choices in order', () => {
    const twoChoices = {
      ...chatCompletionFixture,
      choices: [
        { index: 0, message: { role: 'assistant', content: 'first' }, finish_reason: 'stop' },
        { index: 1, message: { role: 'assistant', content: 'second' }, finish_reason: 'length' },
      ],
    };

    const completion = parseChatCompletion(twoChoices);

    expect(completion.choices.map((choice) => choice.message.content)).toEqual(['first', 'second']);
    expect(completion.usage).toEqual({ prompt_tokens: 12, completion_tokens: 7, total_tokens: 19 });
  });

  it('freezes the parsed completion', () => {
    const completion = parseChatCompletion(chatCompletionFixture);

    expect(Object.isFrozen(completion)).toBe(true);
    expect(Object.isFrozen(completion.choices)).toBe(true);
    expect(Object.isFrozen(completion.choices[0]?.message)).toBe(true);
  });

  it('accepts a missing or null usage', () => {
    const { usage: _usage, ...withoutUsage } = chatCompletionFixture;
    expect(parseChatCompletion(withoutUsage).usage).toBeUndefined();
    expect(parseChatCompletion({ ...withoutUsage, usage: null }).usage).toBeNull();
  });

  it('reports a missing choices key', () => {
    const { choices: _choices, ...withoutChoices } = chatCompletionFixture;
    const error = expectInstance(thrownBy(() => parseChatCompletion(withoutChoices)), ResponseParsingError);

    expect(error.issues).toEqual(['choices: Required']);
    expect(error.message).toBe('Unexpected chat completion response: choices: Required');
    expect(error.body).toEqual(withoutChoices);
  });

  it('reports a choice without a message', () => {
    const error = expectInstance(
      thrownBy(() => parseChatCompletion({ ...chatCompletionFixture, choices: [{ index: 0 }] })),
      ResponseParsingError
    );
    expect(error.issues).toEqual(['choices.0.message: Required']);
  });
});

describe('Chat', () => {
  it('posts the body to the completions endpoint', async () => {
    const requester = { request: vi.fn<AsyncRequester['request']>().mockResolvedValue(chatCompletionFixture) };
    const chat = new Chat(requester);

    const completion = await chat.create({ model: 'deepseek-v3', messages, temperature: 0.5 });

    expect(requester.request).toHaveBeenCalledWith('POST', CHAT_COMPLETIONS_PATH, {
      model: 'deepseek-v3',
      messages,
      temperature: 0.5,
    });
    expect(completion).toEqual(chatCompletionFixture);
  });

  it('rejects invalid parameters without calling the transport', async () => {
    const requester = { request: vi.fn<AsyncRequester['request']>() };
    const chat = new Chat(requester);

    await expect(chat.create({ model: 'qwen3', messages, temperature: 3 })).rejects.toThrow(ValidationError);
    expect(requester.request).not.toHaveBeenCalled();
  });
});
