import { z } from 'zod';
import { ENV_SCHEMA_WITH_DEFAULTS, type EnvConfig } from '../schemas/env-schemas';
import { ValidationError, handleUnknownError } from '../errors/index';
import type { PricingConfig } from '../types/token-usage';

const PROVIDER_VARIABLES: Record<string, { label: string; prefix: string; required: string[] }> = {
  'azure-openai': {
    label: 'Azure OpenAI',
    prefix: 'AZURE_OPENAI_',
    required: ['AZURE_OPENAI_API_KEY', 'AZURE_OPENAI_ENDPOINT', 'AZURE_OPENAI_DEPLOYMENT_NAME'],
  },
  anthropic: { label: 'Anthropic', prefix: 'ANTHROPIC_', required: ['ANTHROPIC_API_KEY'] },
  openai: { label: 'OpenAI', prefix: 'OPENAI_', required: ['OPENAI_API_KEY'] },
  gemini: { label: 'Gemini', prefix: 'GEMINI_', required: ['GEMINI_API_KEY'] },
};

export function parseEnvironment(env: unknown = process.env): EnvConfig {
  try {
    return ENV_SCHEMA_WITH_DEFAULTS.parse(env);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      // Zod error - provide specific error messages for missing provider-specific variables
      const errorMessage = formatProviderValidationError(e, env);
      throw new ValidationError(`Invalid environment variables: ${errorMessage}`, e);
    }
    const err = handleUnknownError(e, 'Environment validation');
    throw new ValidationError(`Environment validation failed: ${err.message}`, e);
  }
}

export function pricingFromEnv(config: EnvConfig): PricingConfig {
  return {
    ...(config.INPUT_PRICE_PER_MILLION !== undefined && { inputPricePerMillion: config.INPUT_PRICE_PER_MILLION }),
    ...(config.OUTPUT_PRICE_PER_MILLION !== undefined && { outputPricePerMillion: config.OUTPUT_PRICE_PER_MILLION }),
  };
}

function readProvider(env: unknown): string | undefined {
  if (typeof env !== 'object' || env === null || !('LLM_PROVIDER' in env)) return undefined;
  return typeof env.LLM_PROVIDER === 'string' ? env.LLM_PROVIDER : undefined;
}

function formatProviderValidationError(zodError: z.ZodError, env: unknown): string {
  const issues = zodError.issues;
  const providerType = readProvider(env);

  // Unknown provider name
  const discriminatorIssue = issues.find(issue =>
    issue.code === 'invalid_union_discriminator' ||
    (issue.path.length === 1 && issue.path[0] === 'LLM_PROVIDER')
  );

  if (discriminatorIssue) {
    return `LLM_PROVIDER must be one of 'none', 'openai', 'azure-openai', 'anthropic' or 'gemini'. Received: ${providerType ?? 'undefined'}`;
  }

  const missingFields = issues
    .filter(issue => issue.code === 'invalid_type' && issue.received === 'undefined')
    .map(issue => issue.path.join('.'));

  const provider = providerType !== undefined ? PROVIDER_VARIABLES[providerType] : undefined;
  if (provider && missingFields.length > 0) {
    const providerFields = missingFields.filter(field => field.startsWith(provider.prefix));
    if (providerFields.length > 0) {
      return `Missing required ${provider.label} environment variables: ${providerFields.join(', ')}. ` +
        `When using LLM_PROVIDER=${providerType ?? ''}, ensure ${provider.required.join(', ')} ${provider.required.length > 1 ? 'are' : 'is'} set.`;
    }
  }

  // Values that are present but invalid (bad URL, number out of range)
  const validationIssues = issues.filter(issue =>
    issue.code === 'invalid_string' ||
    issue.code === 'too_small' ||
    issue.code === 'too_big' ||
    issue.code === 'invalid_type'
  );

  if (validationIssues.length > 0) {
    const fieldErrors = validationIssues.map(issue => {
      const field = issue.path.join('.');
      return `${field}: ${issue.message}`;
    });

    return `Invalid environment variable values: ${fieldErrors.join(', ')}`;
  }

  return zodError.message;
}
