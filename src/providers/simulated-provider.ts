import type { GenerateOptions, LLMProvider, LLMResult } from './llm-provider';

export const SIMULATED_SUMMARY = '[Simulated AI summary]';

/**
 * Stands in for a generation backend when none is configured. Always
 * answers with the fixed sentinel, so offline runs are deterministic.
 */
export class SimulatedProvider implements LLMProvider {
  readonly name = 'simulated';

  generate(_prompt: string, _options?: GenerateOptions): Promise<LLMResult> {
    return Promise.resolve({ text: SIMULATED_SUMMARY, simulated: true });
  }
}
