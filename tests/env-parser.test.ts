import { describe, it, expect } from 'vitest';
import { parseEnvironment, pricingFromEnv } from '../src/boundaries/env-parser';
import { ProviderType } from '../src/providers/provider-factory';
import { ValidationError } from '../src/errors/index';

describe('Environment Parser', () => {
  describe('No provider', () => {
    it('falls back to the simulated backend when LLM_PROVIDER is unset', () => {
      const result = parseEnvironment({});
      expect(result.LLM_PROVIDER).toBe(ProviderType.None);
    });

    it('treats an empty LLM_PROVIDER as unset', () => {
      const result = parseEnvironment({ LLM_PROVIDER: '' });
      expect(result.LLM_PROVIDER).toBe(ProviderType.None);
    });

    it('ignores provider variables when no provider is selected', () => {
      const result = parseEnvironment({ OPENAI_API_KEY: 'test-secret' });
      expect(result).toEqual({ LLM_PROVIDER: ProviderType.None });
    });
  });

  describe('Azure OpenAI Configuration', () => {
    it('parses valid Azure OpenAI environment variables', () => {
      const env = {
        LLM_PROVIDER: 'azure-openai',
        AZURE_OPENAI_API_KEY: 'test-key',
        AZURE_OPENAI_ENDPOINT: 'https://test.openai.azure.com',
        AZURE_OPENAI_DEPLOYMENT_NAME: 'test-deployment',
        AZURE_OPENAI_API_VERSION: '2024-02-15-preview',
        AZURE_OPENAI_TEMPERATURE: '0.7',
        AZURE_OPENAI_MAX_TOKENS: '800',
      };

      const result = parseEnvironment(env);

      expect(result.LLM_PROVIDER).toBe(ProviderType.AzureOpenAI);
      if (result.LLM_PROVIDER === ProviderType.AzureOpenAI) {
        expect(result.AZURE_OPENAI_API_KEY).toBe('test-key');
        expect(result.AZURE_OPENAI_ENDPOINT).toBe('https://test.openai.azure.com');
        expect(result.AZURE_OPENAI_DEPLOYMENT_NAME).toBe('test-deployment');
        expect(result.AZURE_OPENAI_API_VERSION).toBe('2024-02-15-preview');
        expect(result.AZURE_OPENAI_TEMPERATURE).toBe(0.7);
        expect(result.AZURE_OPENAI_MAX_TOKENS).toBe(800);
      }
    });

    it('uses default values for optional Azure OpenAI fields', () => {
      const env = {
        LLM_PROVIDER: 'azure-openai',
        AZURE_OPENAI_API_KEY: 'test-key',
        AZURE_OPENAI_ENDPOINT: 'https://test.openai.azure.com',
        AZURE_OPENAI_DEPLOYMENT_NAME: 'test-deployment',
      };

      const result = parseEnvironment(env);

      expect(result.LLM_PROVIDER).toBe(ProviderType.AzureOpenAI);
      if (result.LLM_PROVIDER === ProviderType.AzureOpenAI) {
        expect(result.AZURE_OPENAI_API_VERSION).toBe('2024-10-21');
        expect(result.AZURE_OPENAI_TEMPERATURE).toBeUndefined();
        expect(result.AZURE_OPENAI_MAX_TOKENS).toBeUndefined();
      }
    });
  });

  describe('Anthropic Configuration', () => {
    it('parses valid Anthropic environment variables', () => {
      const env = {
        LLM_PROVIDER: 'anthropic',
        ANTHROPIC_API_KEY: 'test-secret',
        ANTHROPIC_MODEL: 'claude-3-haiku-20240307',
        ANTHROPIC_MAX_TOKENS: '2048',
        ANTHROPIC_TEMPERATURE: '0.5',
      };

      const result = parseEnvironment(env);

      expect(result.LLM_PROVIDER).toBe(ProviderType.Anthropic);
      if (result.LLM_PROVIDER === ProviderType.Anthropic) {
        expect(result.ANTHROPIC_API_KEY).toBe('test-secret');
        expect(result.ANTHROPIC_MODEL).toBe('claude-3-haiku-20240307');
        expect(result.ANTHROPIC_MAX_TOKENS).toBe(2048);
        expect(result.ANTHROPIC_TEMPERATURE).toBe(0.5);
      }
    });

    it('uses default values for optional Anthropic fields', () => {
      const result = parseEnvironment({ LLM_PROVIDER: 'anthropic', ANTHROPIC_API_KEY: 'test-secret' });

      expect(result.LLM_PROVIDER).toBe(ProviderType.Anthropic);
      if (result.LLM_PROVIDER === ProviderType.Anthropic) {
        expect(result.ANTHROPIC_MODEL).toBe('claude-3-5-haiku-latest');
        expect(result.ANTHROPIC_MAX_TOKENS).toBe(1024);
        expect(result.ANTHROPIC_TEMPERATURE).toBeUndefined();
      }
    });
  });

  describe('OpenAI Configuration', () => {
    it('parses valid OpenAI environment variables', () => {
      const env = {
        LLM_PROVIDER: 'openai',
        OPENAI_API_KEY: 'test-secret',
        OPENAI_MODEL: 'gpt-4o',
        OPENAI_TEMPERATURE: '0.8',
        OPENAI_MAX_TOKENS: '1500',
      };

      const result = parseEnvironment(env);

      expect(result.LLM_PROVIDER).toBe(ProviderType.OpenAI);
      if (result.LLM_PROVIDER === ProviderType.OpenAI) {
        expect(result.OPENAI_API_KEY).toBe('test-secret');
        expect(result.OPENAI_MODEL).toBe('gpt-4o');
        expect(result.OPENAI_TEMPERATURE).toBe(0.8);
        expect(result.OPENAI_MAX_TOKENS).toBe(1500);
      }
    });

    it('uses default values for optional OpenAI fields', () => {
      const result = parseEnvironment({ LLM_PROVIDER: 'openai', OPENAI_API_KEY: 'test-secret' });

      if (result.LLM_PROVIDER === ProviderType.OpenAI) {
        expect(result.OPENAI_MODEL).toBe('gpt-4o-mini');
        expect(result.OPENAI_MAX_TOKENS).toBe(1000);
        expect(result.OPENAI_TEMPERATURE).toBeUndefined();
      }
    });

    it('validates OpenAI API key format', () => {
      const invalidEnv = {
        LLM_PROVIDER: 'openai',
        OPENAI_API_KEY: '', // Empty string should fail
      };

      expect(() => parseEnvironment(invalidEnv)).toThrow(ValidationError);
      expect(() => parseEnvironment(invalidEnv)).toThrow(/Invalid environment variable values.*OPENAI_API_KEY.*String must contain at least 1 character/);
    });
  });

  describe('Gemini Configuration', () => {
    it('parses Gemini variables with the default model', () => {
      const result = parseEnvironment({ LLM_PROVIDER: 'gemini', GEMINI_API_KEY: 'test-secret', GEMINI_TEMPERATURE: '0.4' });

      expect(result.LLM_PROVIDER).toBe(ProviderType.Gemini);
      if (result.LLM_PROVIDER === ProviderType.Gemini) {
        expect(result.GEMINI_MODEL).toBe('gemini-2.5-flash');
        expect(result.GEMINI_TEMPERATURE).toBe(0.4);
        expect(result.GEMINI_MAX_TOKENS).toBeUndefined();
      }
    });

    it('parses an optional Gemini output token limit', () => {
      const result = parseEnvironment({ LLM_PROVIDER: 'gemini', GEMINI_API_KEY: 'test-secret', GEMINI_MAX_TOKENS: '512' });

      if (result.LLM_PROVIDER !== ProviderType.Gemini) {
        throw new Error('expected the Gemini configuration');
      }
      expect(result.GEMINI_MAX_TOKENS).toBe(512);
    });

    it('rejects a non-positive Gemini output token limit', () => {
      expect(() =>
        parseEnvironment({ LLM_PROVIDER: 'gemini', GEMINI_API_KEY: 'test-secret', GEMINI_MAX_TOKENS: '0' })
      ).toThrow(ValidationError);
    });
  });

  describe('Pricing', () => {
    it('reads optional per-million prices for any provider', () => {
      const result = parseEnvironment({
        LLM_PROVIDER: 'openai',
        OPENAI_API_KEY: 'test-secret',
        INPUT_PRICE_PER_MILLION: '2.5',
        OUTPUT_PRICE_PER_MILLION: '10',
      });

      expect(pricingFromEnv(result)).toEqual({ inputPricePerMillion: 2.5, outputPricePerMillion: 10 });
    });

    it('leaves unset prices out', () => {
      expect(pricingFromEnv(parseEnvironment({ INPUT_PRICE_PER_MILLION: '1' }))).toEqual({ inputPricePerMillion: 1 });
    });

    it('rejects negative prices', () => {
      expect(() => parseEnvironment({ INPUT_PRICE_PER_MILLION: '-1' })).toThrow(
        /Invalid environment variable values: INPUT_PRICE_PER_MILLION/
      );
    });
  });

  describe('Provider Selection Validation', () => {
    it('throws validation error for invalid provider type', () => {
      const env = {
        LLM_PROVIDER: 'invalid-provider',
        AZURE_OPENAI_API_KEY: 'test-key',
      };

      expect(() => parseEnvironment(env)).toThrow(ValidationError);
      expect(() => parseEnvironment(env)).toThrow(
        "LLM_PROVIDER must be one of 'none', 'openai', 'azure-openai', 'anthropic' or 'gemini'. Received: invalid-provider"
      );
    });

    it('provides specific error message for missing Azure OpenAI variables', () => {
      const env = {
        LLM_PROVIDER: 'azure-openai',
        AZURE_OPENAI_API_KEY: 'test-key',
        // Missing AZURE_OPENAI_ENDPOINT and AZURE_OPENAI_DEPLOYMENT_NAME
      };

      expect(() => parseEnvironment(env)).toThrow(ValidationError);
      expect(() => parseEnvironment(env)).toThrow(
        'Invalid environment variables: Missing required Azure OpenAI environment variables: ' +
          'AZURE_OPENAI_ENDPOINT, AZURE_OPENAI_DEPLOYMENT_NAME. When using LLM_PROVIDER=azure-openai, ' +
          'ensure AZURE_OPENAI_API_KEY, AZURE_OPENAI_ENDPOINT, AZURE_OPENAI_DEPLOYMENT_NAME are set.'
      );
    });

    it('provides specific error message for missing Anthropic variables', () => {
      expect(() => parseEnvironment({ LLM_PROVIDER: 'anthropic' })).toThrow(
        'Missing required Anthropic environment variables: ANTHROPIC_API_KEY. When using LLM_PROVIDER=anthropic, ensure ANTHROPIC_API_KEY is set.'
      );
    });

    it('provides specific error message for missing OpenAI variables', () => {
      expect(() => parseEnvironment({ LLM_PROVIDER: 'openai' })).toThrow(
        /Missing required OpenAI environment variables.*OPENAI_API_KEY/
      );
    });

    it('provides specific error message for missing Gemini variables', () => {
      expect(() => parseEnvironment({ LLM_PROVIDER: 'gemini' })).toThrow(
        /Missing required Gemini environment variables.*GEMINI_API_KEY/
      );
    });

    it('validates temperature ranges correctly for each provider', () => {
      // Anthropic allows 0-1 range
      expect(() =>
        parseEnvironment({ LLM_PROVIDER: 'anthropic', ANTHROPIC_API_KEY: 'test-secret', ANTHROPIC_TEMPERATURE: '0.8' })
      ).not.toThrow();
      expect(() =>
        parseEnvironment({ LLM_PROVIDER: 'anthropic', ANTHROPIC_API_KEY: 'test-secret', ANTHROPIC_TEMPERATURE: '1.5' })
      ).toThrow(ValidationError);

      // OpenAI allows 0-2 range
      expect(() =>
        parseEnvironment({ LLM_PROVIDER: 'openai', OPENAI_API_KEY: 'test-secret', OPENAI_TEMPERATURE: '1.8' })
      ).not.toThrow();
      expect(() =>
        parseEnvironment({ LLM_PROVIDER: 'openai', OPENAI_API_KEY: 'test-secret', OPENAI_TEMPERATURE: '2.5' })
      ).toThrow(ValidationError);
    });

    it('provides specific error message for invalid field values', () => {
      const env = {
        LLM_PROVIDER: 'azure-openai',
        AZURE_OPENAI_API_KEY: 'test-key',
        AZURE_OPENAI_ENDPOINT: 'not-a-url',
        AZURE_OPENAI_DEPLOYMENT_NAME: 'test-deployment',
      };

      expect(() => parseEnvironment(env)).toThrow(
        'Invalid environment variables: Invalid environment variable values: AZURE_OPENAI_ENDPOINT: Invalid url'
      );
    });
  });
});
