import type { LLMProvider } from './llm-provider';
import { AzureOpenAIProvider, type AzureOpenAIConfig } from './azure-openai-provider';
import { AnthropicProvider, type AnthropicConfig } from './anthropic-provider';
import { OpenAIProvider, type OpenAIConfig } from './openai-provider';
import { GeminiProvider, type GeminiConfig } from './gemini-provider';
import { SimulatedProvider } from './simulated-provider';
import type { RequestBuilder } from './request-builder';
import type { DebugOptions } from './prompt-preview';
import type { EnvConfig } from '../schemas/env-schemas';

export type ProviderOptions = DebugOptions;

export enum ProviderType {
  None = 'none',
  AzureOpenAI = 'azure-openai',
  Anthropic = 'anthropic',
  OpenAI = 'openai',
  Gemini = 'gemini',
}

/**
 * Creates the LLM provider selected by the environment. With no provider
 * configured the simulated backend is returned, so the pipeline still runs.
 */
export function createProvider(
  envConfig: EnvConfig,
  options: ProviderOptions = {},
  builder?: RequestBuilder
): LLMProvider {
  const debugOptions: DebugOptions = {
    debug: options.debug,
    showPrompt: options.showPrompt,
    showPromptTrunc: options.showPromptTrunc,
    debugJson: options.debugJson,
  };

  switch (envConfig.LLM_PROVIDER) {
    case ProviderType.None:
      return new SimulatedProvider();

    case ProviderType.AzureOpenAI: {
      const azureConfig: AzureOpenAIConfig = {
        apiKey: envConfig.AZURE_OPENAI_API_KEY,
        endpoint: envConfig.AZURE_OPENAI_ENDPOINT,
        deploymentName: envConfig.AZURE_OPENAI_DEPLOYMENT_NAME,
        apiVersion: envConfig.AZURE_OPENAI_API_VERSION,
        temperature: envConfig.AZURE_OPENAI_TEMPERATURE,
        maxTokens: envConfig.AZURE_OPENAI_MAX_TOKENS,
        ...debugOptions,
      };
      return new AzureOpenAIProvider(azureConfig, builder);
    }

    case ProviderType.Anthropic: {
      const anthropicConfig: AnthropicConfig = {
        apiKey: envConfig.ANTHROPIC_API_KEY,
        model: envConfig.ANTHROPIC_MODEL,
        maxTokens: envConfig.ANTHROPIC_MAX_TOKENS,
        temperature: envConfig.ANTHROPIC_TEMPERATURE,
        ...debugOptions,
      };
      return new AnthropicProvider(anthropicConfig, builder);
    }

    case ProviderType.OpenAI: {
      const openaiConfig: OpenAIConfig = {
        apiKey: envConfig.OPENAI_API_KEY,
        model: envConfig.OPENAI_MODEL,
        temperature: envConfig.OPENAI_TEMPERATURE,
        maxTokens: envConfig.OPENAI_MAX_TOKENS,
        ...debugOptions,
      };
      return new OpenAIProvider(openaiConfig, builder);
    }

    case ProviderType.Gemini: {
      const geminiConfig: GeminiConfig = {
        apiKey: envConfig.GEMINI_API_KEY,
        model: envConfig.GEMINI_MODEL,
        temperature: envConfig.GEMINI_TEMPERATURE,
        maxTokens: envConfig.GEMINI_MAX_TOKENS,
        ...debugOptions,
      };
      return new GeminiProvider(geminiConfig, builder);
    }
  }
}
