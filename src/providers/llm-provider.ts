import type { TokenUsage } from '../types/token-usage';

export interface GenerateOptions {
  signal?: AbortSignal;
}

export interface LLMResult {
  text: string;
  usage?: TokenUsage;
  simulated?: boolean; // Set only by the simulated (no backend) provider
}

/**
 * A text generation backend: one prompt in, one completion out.
 * Implementations pass `signal` through to their SDK and rethrow the SDK's
 * abort error unchanged when it fires.
 */
export interface LLMProvider {
  readonly name: string;
  generate(prompt: string, options?: GenerateOptions): Promise<LLMResult>;
}
