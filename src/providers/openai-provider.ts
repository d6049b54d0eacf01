import OpenAI from 'openai';
import type { GenerateOptions, LLMProvider, LLMResult } from './llm-provider';
import { DefaultRequestBuilder, type RequestBuilder } from './request-builder';
import { logRequest, logResponse, type DebugOptions } from './prompt-preview';
import { validateApiResponse } from '../boundaries/api-client';
import { BackendError, handleUnknownError } from '../errors/index';

export interface OpenAIConfig extends DebugOptions {
  apiKey: string;
  model?: string | undefined;
  temperature?: number | undefined;
  maxTokens?: number | undefined;
}

export const OPENAI_DEFAULT_CONFIG = {
  model: 'gpt-4o-mini',
  temperature: 0.3,
  maxTokens: 1000,
};

/**
 * Chat Completions backend. Azure OpenAI reuses this class with its own
 * client, since the request and response shapes are identical.
 */
export class OpenAIProvider implements LLMProvider {
  readonly name: string;
  protected client: OpenAI;
  protected model: string;
  protected config: OpenAIConfig;
  private builder: RequestBuilder;

  constructor(config: OpenAIConfig, builder?: RequestBuilder, client?: OpenAI, name: string = 'OpenAI') {
    this.name = name;
    this.client = client ?? new OpenAI({
      apiKey: config.apiKey,
      maxRetries: 2,
    });
    this.config = {
      ...config,
      temperature: config.temperature ?? OPENAI_DEFAULT_CONFIG.temperature,
      maxTokens: config.maxTokens ?? OPENAI_DEFAULT_CONFIG.maxTokens,
    };
    this.model = config.model ?? OPENAI_DEFAULT_CONFIG.model;
    this.builder = builder ?? new DefaultRequestBuilder();
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<LLMResult> {
    const fullPrompt = this.builder.buildPrompt(prompt);

    const params: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: [{ role: 'user', content: fullPrompt }],
    };
    if (this.config.temperature !== undefined) {
      params.temperature = this.config.temperature;
    }
    if (this.config.maxTokens !== undefined) {
      params.max_tokens = this.config.maxTokens;
    }

    logRequest(this.name, { model: this.model, temperature: this.config.temperature }, fullPrompt, this.config);

    let rawResponse: unknown;
    try {
      rawResponse = await this.client.chat.completions.create(params, {
        ...(options.signal !== undefined && { signal: options.signal }),
      });
    } catch (e: unknown) {
      // Aborts are classified by the caller, which owns the signal
      if (options.signal?.aborted || e instanceof OpenAI.APIUserAbortError) {
        throw e;
      }
      if (e instanceof OpenAI.RateLimitError) {
        throw new BackendError(`${this.name} rate limit exceeded: ${e.message}`, this.name, e);
      }
      if (e instanceof OpenAI.AuthenticationError) {
        throw new BackendError(`${this.name} authentication failed: ${e.message}`, this.name, e);
      }
      if (e instanceof OpenAI.APIError) {
        throw new BackendError(`${this.name} API error (${e.status ?? 'no status'}): ${e.message}`, this.name, e);
      }

      const err = handleUnknownError(e, `${this.name} API call`);
      throw new BackendError(`${this.name} API call failed: ${err.message}`, this.name, e);
    }

    let response;
    try {
      response = validateApiResponse(rawResponse);
    } catch (e: unknown) {
      const err = handleUnknownError(e, `${this.name} response validation`);
      throw new BackendError(err.message, this.name, e);
    }

    const firstChoice = response.choices[0];
    logResponse({ usage: response.usage, finish_reason: firstChoice?.finish_reason }, rawResponse, this.config);

    const text = firstChoice?.message.content?.trim();
    if (!text) {
      throw new BackendError(`Empty response from ${this.name} API (no content).`, this.name);
    }

    return {
      text,
      ...(response.usage !== undefined && {
        usage: {
          inputTokens: response.usage.prompt_tokens,
          outputTokens: response.usage.completion_tokens,
        },
      }),
    };
  }
}
