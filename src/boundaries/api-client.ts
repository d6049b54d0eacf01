import { z } from 'zod';
import {
  OPENAI_RESPONSE_SCHEMA,
  ANTHROPIC_MESSAGE_SCHEMA,
  type OpenAIResponse,
  type AnthropicMessage
} from '../schemas/api-schemas';
import { APIResponseError, ValidationError, handleUnknownError } from '../errors/index';
import { formatZodIssues } from '../schemas/issues';

function validate<T>(schema: z.ZodType<T>, raw: unknown, label: string): T {
  try {
    return schema.parse(raw);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new APIResponseError(`Invalid ${label} response structure: ${formatZodIssues(e)}`, raw, e);
    }
    const err = handleUnknownError(e, `${label} response validation`);
    throw new ValidationError(`${label} response validation failed: ${err.message}`, e);
  }
}

export function validateApiResponse(raw: unknown): OpenAIResponse {
  return validate(OPENAI_RESPONSE_SCHEMA, raw, 'OpenAI');
}

export function validateAnthropicResponse(raw: unknown): AnthropicMessage {
  return validate(ANTHROPIC_MESSAGE_SCHEMA, raw, 'Anthropic');
}
