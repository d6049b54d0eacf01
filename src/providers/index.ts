export type { LLMProvider, LLMResult, GenerateOptions } from './llm-provider';
export { AzureOpenAIProvider, type AzureOpenAIConfig } from './azure-openai-provider';
export { AnthropicProvider, type AnthropicConfig } from './anthropic-provider';
export { OpenAIProvider, type OpenAIConfig } from './openai-provider';
export { GeminiProvider, type GeminiConfig } from './gemini-provider';
export { SimulatedProvider, SIMULATED_SUMMARY } from './simulated-provider';
export { createProvider, ProviderType, type ProviderOptions } from './provider-factory';
export { DefaultRequestBuilder, type RequestBuilder } from './request-builder';
