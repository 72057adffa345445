/**
 * Runtime schemas for request parameters and API responses
 */

import { z } from 'zod';
import { ResponseParsingError, ValidationError } from './errors';
import { deepFreeze, IMAGE_MODELS, ROLES, TEMPERATURE_RANGE, TEXT_MODELS } from './helpers';
import type {
  ChatCompletion,
  ChatCompletionCreateParams,
  ImageGenerateParams,
} from './types';

const temperatureMessage = `temperature must be between ${TEMPERATURE_RANGE.min} and ${TEMPERATURE_RANGE.max}`;

export const chatMessageParamSchema = z.object({
  role: z.enum(ROLES, {
    errorMap: () => ({ message: `role must be one of: ${ROLES.join(', ')}` }),
  }),
  content: z.string({ required_error: 'content is required' }),
  image_url: z.string().url('image_url must be a valid URL').optional(),
});

export const chatCompletionCreateParamsSchema = z.object({
  model: z.enum(TEXT_MODELS, {
    errorMap: () => ({ message: `model must be one of: ${TEXT_MODELS.join(', ')}` }),
  }),
  messages: z
    .array(chatMessageParamSchema, { required_error: 'messages is required' })
    .min(1, 'messages cannot be empty'),
  online: z.boolean().optional(),
  temperature: z
    .number()
    .min(TEMPERATURE_RANGE.min, temperatureMessage)
    .max(TEMPERATURE_RANGE.max, temperatureMessage)
    .optional(),
}) satisfies z.ZodType<ChatCompletionCreateParams>;

export const imageGenerateParamsSchema = z.object({
  model: z.enum(IMAGE_MODELS, {
    errorMap: () => ({ message: `model must be one of: ${IMAGE_MODELS.join(', ')}` }),
  }),
  prompt: z
    .string({ required_error: 'prompt is required' })
    .refine((prompt) => prompt.trim().length > 0, 'prompt cannot be empty'),
}) satisfies z.ZodType<ImageGenerateParams>;

const usageSchema = z.object({
  prompt_tokens: z.number(),
  completion_tokens: z.number(),
  total_tokens: z.number(),
});

const chatMessageSchema = z.object({
  role: z.enum(ROLES),
  content: z.string().nullish(),
  image_url: z.string().nullish(),
});

const choiceSchema = z.object({
  index: z.number().int(),
  message: chatMessageSchema,
  finish_reason: z.string().nullish(),
});

export const chatCompletionSchema = z.object({
  id: z.string(),
  object: z.string(),
  created: z.number(),
  model: z.string(),
  choices: z.array(choiceSchema),
  usage: usageSchema.nullish(),
}) satisfies z.ZodType<ChatCompletion>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/**
 * Validate caller-supplied parameters, raising ValidationError on failure.
 */
export function validateParams<T extends z.ZodTypeAny>(schema: T, params: unknown): z.output<T> {
  const result = schema.safeParse(params);
  if (result.success) {
    return result.data;
  }

  const fieldErrors: Record<string, string[]> = {};
  for (const issue of result.error.issues) {
    const key = issue.path.length > 0 ? issue.path.join('.') : '_';
    (fieldErrors[key] ??= []).push(issue.message);
  }
  throw new ValidationError(formatIssues(result.error).join('; '), fieldErrors);
}

/**
 * Validate a successful response body, raising ResponseParsingError on
 * failure. The returned value is deeply frozen.
 */
export function parseResponse<T extends z.ZodTypeAny>(
  schema: T,
  body: unknown,
  what: string
): z.output<T> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ResponseParsingError(`Unexpected ${what} response: ${issues.join('; ')}`, body, issues);
  }
  return deepFreeze(result.data);
}
