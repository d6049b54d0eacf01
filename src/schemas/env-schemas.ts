import { z } from 'zod';
import { ProviderType } from '../providers/provider-factory';
import { GeminiDefaultConfig } from '../providers/gemini-provider';
import { OPENAI_DEFAULT_CONFIG } from '../providers/openai-provider';
import { ANTHROPIC_DEFAULT_CONFIG } from '../providers/anthropic-provider';
import { AZURE_OPENAI_DEFAULT_CONFIG } from '../providers/azure-openai-provider';

// Optional per-million prices, shared by every provider
const PRICING_SCHEMA = z.object({
  INPUT_PRICE_PER_MILLION: z.coerce.number().nonnegative().optional(),
  OUTPUT_PRICE_PER_MILLION: z.coerce.number().nonnegative().optional(),
});

// Azure OpenAI configuration schema
const AZURE_OPENAI_CONFIG_SCHEMA = z.object({
  AZURE_OPENAI_API_KEY: z.string().min(1),
  AZURE_OPENAI_ENDPOINT: z.string().url(),
  AZURE_OPENAI_DEPLOYMENT_NAME: z.string().min(1),
  AZURE_OPENAI_API_VERSION: z.string().default(AZURE_OPENAI_DEFAULT_CONFIG.apiVersion),
  AZURE_OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2).optional(),
  AZURE_OPENAI_MAX_TOKENS: z.coerce.number().int().positive().optional(),
});

// Anthropic configuration schema
const ANTHROPIC_CONFIG_SCHEMA = z.object({
  ANTHROPIC_API_KEY: z.string().min(1),
  ANTHROPIC_MODEL: z.string().default(ANTHROPIC_DEFAULT_CONFIG.model),
  ANTHROPIC_MAX_TOKENS: z.coerce.number().int().positive().default(ANTHROPIC_DEFAULT_CONFIG.maxTokens),
  ANTHROPIC_TEMPERATURE: z.coerce.number().min(0).max(1).optional(),
});

// OpenAI configuration schema
const OPENAI_CONFIG_SCHEMA = z.object({
  OPENAI_API_KEY: z.string().min(1),
  OPENAI_MODEL: z.string().default(OPENAI_DEFAULT_CONFIG.model),
  OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2).optional(),
  OPENAI_MAX_TOKENS: z.coerce.number().int().positive().default(OPENAI_DEFAULT_CONFIG.maxTokens),
});

// Gemini configuration schema
const GEMINI_CONFIG_SCHEMA = z.object({
  GEMINI_API_KEY: z.string().min(1),
  GEMINI_MODEL: z.string().default(GeminiDefaultConfig.model),
  GEMINI_TEMPERATURE: z.coerce.number().min(0).max(1).optional(),
  GEMINI_MAX_TOKENS: z.coerce.number().int().positive().optional(),
});

// Discriminated union based on provider type
export const ENV_SCHEMA = z.discriminatedUnion('LLM_PROVIDER', [
  z.object({ LLM_PROVIDER: z.literal(ProviderType.None) }).merge(PRICING_SCHEMA),
  z.object({ LLM_PROVIDER: z.literal(ProviderType.AzureOpenAI) }).merge(AZURE_OPENAI_CONFIG_SCHEMA).merge(PRICING_SCHEMA),
  z.object({ LLM_PROVIDER: z.literal(ProviderType.Anthropic) }).merge(ANTHROPIC_CONFIG_SCHEMA).merge(PRICING_SCHEMA),
  z.object({ LLM_PROVIDER: z.literal(ProviderType.OpenAI) }).merge(OPENAI_CONFIG_SCHEMA).merge(PRICING_SCHEMA),
  z.object({ LLM_PROVIDER: z.literal(ProviderType.Gemini) }).merge(GEMINI_CONFIG_SCHEMA).merge(PRICING_SCHEMA),
]);

// No LLM_PROVIDER (or an empty one) means no backend: run simulated
export const ENV_SCHEMA_WITH_DEFAULTS = z.preprocess(
  (data: unknown) => {
    if (typeof data !== 'object' || data === null) return data;
    const provider: unknown = 'LLM_PROVIDER' in data ? data.LLM_PROVIDER : undefined;
    if (provider === undefined || provider === '') {
      return { ...data, LLM_PROVIDER: ProviderType.None };
    }
    return data;
  },
  ENV_SCHEMA
);

// Inferred types
export type EnvConfig = z.infer<typeof ENV_SCHEMA>;
