import Anthropic from '@anthropic-ai/sdk';
import type { GenerateOptions, LLMProvider, LLMResult } from './llm-provider';
import { DefaultRequestBuilder, type RequestBuilder } from './request-builder';
import { logRequest, logResponse, type DebugOptions } from './prompt-preview';
import { validateAnthropicResponse } from '../boundaries/api-client';
import { isTextBlock } from '../schemas/api-schemas';
import { BackendError, handleUnknownError } from '../errors/index';

export interface AnthropicConfig extends DebugOptions {
  apiKey: string;
  model?: string | undefined;
  maxTokens?: number | undefined;
  temperature?: number | undefined;
}

export const ANTHROPIC_DEFAULT_CONFIG = {
  model: 'claude-3-5-haiku-latest',
  maxTokens: 1024,
  temperature: 0.2,
};

export class AnthropicProvider implements LLMProvider {
  readonly name = 'Anthropic';
  private client: Anthropic;
  private model: string;
  private maxTokens: number;
  private config: AnthropicConfig;
  private builder: RequestBuilder;

  constructor(config: AnthropicConfig, builder?: RequestBuilder, client?: Anthropic) {
    this.client = client ?? new Anthropic({
      apiKey: config.apiKey,
      maxRetries: 2,
    });
    this.config = {
      ...config,
      temperature: config.temperature ?? ANTHROPIC_DEFAULT_CONFIG.temperature,
    };
    this.model = config.model ?? ANTHROPIC_DEFAULT_CONFIG.model;
    this.maxTokens = config.maxTokens ?? ANTHROPIC_DEFAULT_CONFIG.maxTokens;
    this.builder = builder ?? new DefaultRequestBuilder();
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<LLMResult> {
    const fullPrompt = this.builder.buildPrompt(prompt);

    const params: Anthropic.Messages.MessageCreateParamsNonStreaming = {
      model: this.model,
      max_tokens: this.maxTokens,
      messages: [{ role: 'user', content: fullPrompt }],
      ...(this.config.temperature !== undefined && { temperature: this.config.temperature }),
    };

    logRequest(
      this.name,
      { model: this.model, maxTokens: this.maxTokens, temperature: this.config.temperature },
      fullPrompt,
      this.config
    );

    let rawResponse: unknown;
    try {
      rawResponse = await this.client.messages.create(params, {
        ...(options.signal !== undefined && { signal: options.signal }),
      });
    } catch (e: unknown) {
      if (options.signal?.aborted || e instanceof Anthropic.APIUserAbortError) {
        throw e;
      }
      // Subclasses first: every SDK error extends APIError
      if (e instanceof Anthropic.RateLimitError) {
        throw new BackendError(`Anthropic rate limit exceeded: ${e.message}`, this.name, e);
      }
      if (e instanceof Anthropic.AuthenticationError) {
        throw new BackendError(`Anthropic authentication failed: ${e.message}`, this.name, e);
      }
      if (e instanceof Anthropic.BadRequestError) {
        throw new BackendError(`Anthropic bad request: ${e.message}`, this.name, e);
      }
      if (e instanceof Anthropic.APIError) {
        throw new BackendError(`Anthropic API error (${e.status ?? 'no status'}): ${e.message}`, this.name, e);
      }

      const err = handleUnknownError(e, 'Anthropic API call');
      throw new BackendError(`Anthropic API call failed: ${err.message}`, this.name, e);
    }

    let response;
    try {
      response = validateAnthropicResponse(rawResponse);
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'Anthropic response validation');
      throw new BackendError(err.message, this.name, e);
    }

    logResponse(
      {
        usage: {
          input_tokens: response.usage.input_tokens,
          output_tokens: response.usage.output_tokens,
        },
        stop_reason: response.stop_reason,
      },
      rawResponse,
      this.config
    );

    const text = response.content
      .filter(isTextBlock)
      .map((block) => block.text)
      .join('')
      .trim();
    if (!text) {
      throw new BackendError('Empty response from Anthropic API (no text blocks).', this.name);
    }

    return {
      text,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
    };
  }
}
