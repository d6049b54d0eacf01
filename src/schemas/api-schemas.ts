import { z } from 'zod';

// OpenAI (and Azure OpenAI) chat completion response schemas
export const OPENAI_CHOICE_SCHEMA = z.object({
  message: z.object({
    content: z.string().nullable(),
  }),
  finish_reason: z.string().nullable(),
});

export const OPENAI_USAGE_SCHEMA = z.object({
  prompt_tokens: z.number(),
  completion_tokens: z.number(),
  total_tokens: z.number(),
});

export const OPENAI_RESPONSE_SCHEMA = z.object({
  choices: z.array(OPENAI_CHOICE_SCHEMA).min(1),
  usage: OPENAI_USAGE_SCHEMA.optional(),
});

// Anthropic message response schemas
export const ANTHROPIC_USAGE_SCHEMA = z.object({
  input_tokens: z.number(),
  output_tokens: z.number(),
});

export const ANTHROPIC_TEXT_BLOCK_SCHEMA = z.object({
  type: z.literal('text'),
  text: z.string(),
});

// Any non-text block (tool_use, thinking, ...) is accepted and ignored
export const ANTHROPIC_OTHER_BLOCK_SCHEMA = z.object({
  type: z.string(),
}).passthrough();

export const ANTHROPIC_CONTENT_BLOCK_SCHEMA = z.union([
  ANTHROPIC_TEXT_BLOCK_SCHEMA,
  ANTHROPIC_OTHER_BLOCK_SCHEMA,
]);

export const ANTHROPIC_MESSAGE_SCHEMA = z.object({
  id: z.string(),
  type: z.literal('message'),
  role: z.literal('assistant'),
  content: z.array(ANTHROPIC_CONTENT_BLOCK_SCHEMA),
  model: z.string(),
  stop_reason: z.string().nullable(),
  usage: ANTHROPIC_USAGE_SCHEMA,
});

// Inferred types
export type OpenAIChoice = z.infer<typeof OPENAI_CHOICE_SCHEMA>;
export type OpenAIUsage = z.infer<typeof OPENAI_USAGE_SCHEMA>;
export type OpenAIResponse = z.infer<typeof OPENAI_RESPONSE_SCHEMA>;

export type AnthropicUsage = z.infer<typeof ANTHROPIC_USAGE_SCHEMA>;
export type AnthropicTextBlock = z.infer<typeof ANTHROPIC_TEXT_BLOCK_SCHEMA>;
export type AnthropicContentBlock = z.infer<typeof ANTHROPIC_CONTENT_BLOCK_SCHEMA>;
export type AnthropicMessage = z.infer<typeof ANTHROPIC_MESSAGE_SCHEMA>;

export function isTextBlock(block: AnthropicContentBlock): block is AnthropicTextBlock {
  return block.type === 'text' && 'text' in block && typeof block.text === 'string';
}
