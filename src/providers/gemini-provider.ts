import { GoogleGenerativeAI, type GenerativeModel } from '@google/generative-ai';
import type { GenerateOptions, LLMProvider, LLMResult } from './llm-provider';
import { DefaultRequestBuilder, type RequestBuilder } from './request-builder';
import { logRequest, logResponse, type DebugOptions } from './prompt-preview';
import { BackendError, handleUnknownError } from '../errors/index';

export interface GeminiConfig extends DebugOptions {
    apiKey: string;
    model?: string | undefined;
    temperature?: number | undefined;
    maxTokens?: number | undefined;
}

export const GeminiDefaultConfig = {
    model: 'gemini-2.5-flash',
    temperature: 0.2,
};

export class GeminiProvider implements LLMProvider {
    readonly name = 'Gemini';
    private model: GenerativeModel;
    private modelName: string;
    private config: GeminiConfig;
    private builder: RequestBuilder;

    constructor(config: GeminiConfig, builder?: RequestBuilder, model?: GenerativeModel) {
        this.config = {
            ...config,
            temperature: config.temperature ?? GeminiDefaultConfig.temperature,
        };
        this.modelName = config.model ?? GeminiDefaultConfig.model;
        this.model = model ?? new GoogleGenerativeAI(config.apiKey).getGenerativeModel({
            model: this.modelName,
            generationConfig: {
                ...(this.config.temperature !== undefined && { temperature: this.config.temperature }),
                ...(this.config.maxTokens !== undefined && { maxOutputTokens: this.config.maxTokens }),
            },
        });
        this.builder = builder ?? new DefaultRequestBuilder();
    }

    async generate(prompt: string, options: GenerateOptions = {}): Promise<LLMResult> {
        const fullPrompt = this.builder.buildPrompt(prompt);

        logRequest(this.name, { model: this.modelName, temperature: this.config.temperature }, fullPrompt, this.config);

        let text: string;
        let usage: LLMResult['usage'];
        try {
            const result = await this.model.generateContent(fullPrompt, {
                ...(options.signal !== undefined && { signal: options.signal }),
            });
            const response = result.response;
            text = response.text().trim();

            const metadata = response.usageMetadata;
            if (metadata) {
                usage = {
                    inputTokens: metadata.promptTokenCount,
                    outputTokens: metadata.candidatesTokenCount,
                };
            }
            logResponse({ usage: metadata }, response, this.config);
        } catch (e: unknown) {
            if (options.signal?.aborted) {
                throw e;
            }
            const err = handleUnknownError(e, 'Gemini API call');
            throw new BackendError(`Gemini API call failed: ${err.message}`, this.name, e);
        }

        if (!text) {
            throw new BackendError('Empty response from Gemini API.', this.name);
        }

        return { text, ...(usage !== undefined && { usage }) };
    }
}
