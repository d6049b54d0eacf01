import { AzureOpenAI } from 'openai';
import { OpenAIProvider } from './openai-provider';
import type { RequestBuilder } from './request-builder';
import type { DebugOptions } from './prompt-preview';

export interface AzureOpenAIConfig extends DebugOptions {
  apiKey: string;
  endpoint: string;
  deploymentName: string;
  apiVersion?: string | undefined;
  temperature?: number | undefined;
  maxTokens?: number | undefined;
}

export const AZURE_OPENAI_DEFAULT_CONFIG = {
  apiVersion: '2024-10-21',
};

export class AzureOpenAIProvider extends OpenAIProvider {
  constructor(config: AzureOpenAIConfig, builder?: RequestBuilder) {
    const client = new AzureOpenAI({
      apiKey: config.apiKey,
      endpoint: config.endpoint,
      deployment: config.deploymentName,
      apiVersion: config.apiVersion ?? AZURE_OPENAI_DEFAULT_CONFIG.apiVersion,
      maxRetries: 2,
    });
    super(
      {
        apiKey: config.apiKey,
        // Azure routes by deployment; the model field carries the deployment name
        model: config.deploymentName,
        temperature: config.temperature,
        maxTokens: config.maxTokens,
        debug: config.debug,
        showPrompt: config.showPrompt,
        showPromptTrunc: config.showPromptTrunc,
        debugJson: config.debugJson,
      },
      builder,
      client,
      'Azure OpenAI'
    );
  }
}
