import { describe, it, expect } from 'vitest';
import { createProvider, ProviderType } from '../src/providers/provider-factory';
import { AzureOpenAIProvider } from '../src/providers/azure-openai-provider';
import { AnthropicProvider } from '../src/providers/anthropic-provider';
import { OpenAIProvider } from '../src/providers/openai-provider';
import { GeminiProvider } from '../src/providers/gemini-provider';
import { SimulatedProvider } from '../src/providers/simulated-provider';
import { DefaultRequestBuilder } from '../src/providers/request-builder';
import type { EnvConfig } from '../src/schemas/env-schemas';

describe('Provider Factory', () => {
  describe('Provider Instantiation', () => {
    it('creates the simulated provider when none is configured', () => {
      const provider = createProvider({ LLM_PROVIDER: ProviderType.None });
      expect(provider).toBeInstanceOf(SimulatedProvider);
      expect(provider.name).toBe('simulated');
    });

    it('creates Azure OpenAI provider when configured', () => {
      const envConfig: EnvConfig = {
        LLM_PROVIDER: ProviderType.AzureOpenAI,
        AZURE_OPENAI_API_KEY: 'test-key',
        AZURE_OPENAI_ENDPOINT: 'https://test.openai.azure.com',
        AZURE_OPENAI_DEPLOYMENT_NAME: 'test-deployment',
        AZURE_OPENAI_API_VERSION: '2024-10-21',
      };

      const provider = createProvider(envConfig, { debug: true });
      expect(provider).toBeInstanceOf(AzureOpenAIProvider);
      expect(provider.name).toBe('Azure OpenAI');
    });

    it('creates Anthropic provider when configured', () => {
      const envConfig: EnvConfig = {
        LLM_PROVIDER: ProviderType.Anthropic,
        ANTHROPIC_API_KEY: 'test-secret',
        ANTHROPIC_MODEL: 'claude-3-5-haiku-latest',
        ANTHROPIC_MAX_TOKENS: 4096,
      };

      const provider = createProvider(envConfig, { debug: true });
      expect(provider).toBeInstanceOf(AnthropicProvider);
      expect(provider.name).toBe('Anthropic');
    });

    it('creates OpenAI provider when configured', () => {
      const envConfig: EnvConfig = {
        LLM_PROVIDER: ProviderType.OpenAI,
        OPENAI_API_KEY: 'test-secret',
        OPENAI_MODEL: 'gpt-4o-mini',
        OPENAI_MAX_TOKENS: 1000,
      };

      const provider = createProvider(envConfig);
      expect(provider).toBeInstanceOf(OpenAIProvider);
      expect(provider.name).toBe('OpenAI');
    });

    it('creates Gemini provider when configured', () => {
      const envConfig: EnvConfig = {
        LLM_PROVIDER: ProviderType.Gemini,
        GEMINI_API_KEY: 'test-secret',
        GEMINI_MODEL: 'gemini-2.5-flash',
      };

      const provider = createProvider(envConfig);
      expect(provider).toBeInstanceOf(GeminiProvider);
      expect(provider.name).toBe('Gemini');
    });

    it('creates provider with custom request builder', () => {
      const envConfig: EnvConfig = {
        LLM_PROVIDER: ProviderType.AzureOpenAI,
        AZURE_OPENAI_API_KEY: 'test-key',
        AZURE_OPENAI_ENDPOINT: 'https://test.openai.azure.com',
        AZURE_OPENAI_DEPLOYMENT_NAME: 'test-deployment',
        AZURE_OPENAI_API_VERSION: '2024-10-21',
      };

      const customBuilder = new DefaultRequestBuilder('Custom directive');
      const provider = createProvider(envConfig, {}, customBuilder);
      expect(provider).toBeInstanceOf(AzureOpenAIProvider);
    });
  });

  describe('Interface', () => {
    it('gives every provider a generate method', () => {
      const configs: EnvConfig[] = [
        { LLM_PROVIDER: ProviderType.None },
        { LLM_PROVIDER: ProviderType.OpenAI, OPENAI_API_KEY: 'test-secret', OPENAI_MODEL: 'gpt-4o-mini', OPENAI_MAX_TOKENS: 1000 },
        { LLM_PROVIDER: ProviderType.Anthropic, ANTHROPIC_API_KEY: 'test-secret', ANTHROPIC_MODEL: 'claude-3-5-haiku-latest', ANTHROPIC_MAX_TOKENS: 1024 },
      ];

      for (const config of configs) {
        const provider = createProvider(config);
        expect(typeof provider.generate).toBe('function');
      }
    });
  });
});
