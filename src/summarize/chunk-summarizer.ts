import type { LLMProvider } from '../providers/llm-provider';
import { hasTemplateVariable, renderTemplate, type TemplateVariables } from '../prompts/template-renderer';
import {
  BackendError,
  BackendTimeoutError,
  ChunkwiseError,
  PipelineCancelledError,
  handleUnknownError,
} from '../errors/index';
import { debug } from '../output/logger';
import { raceWithSignal, withDeadline } from './abort';
import type { ChunkSummaryResult, SummarizeOptions } from './types';

export const DEFAULT_TIMEOUT_MS = 120_000;

export interface ChunkSummarizerOptions {
  timeoutMs?: number;
}

/**
 * One backend call for one piece of text.
 */
export class ChunkSummarizer {
  readonly timeoutMs: number;

  constructor(
    private readonly provider: LLMProvider,
    options: ChunkSummarizerOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Renders `template` with `variables` and `content = text`. A template
   * without a content placeholder gets the text after a blank line.
   */
  buildPrompt(text: string, template: string, variables: TemplateVariables = {}): string {
    const prompt = renderTemplate(template, { ...variables, content: text });
    if (text && !hasTemplateVariable(template, 'content')) {
      return `${prompt}\n\n${text}`;
    }
    return prompt;
  }

  async summarize(
    text: string,
    template: string,
    variables: TemplateVariables = {},
    options: SummarizeOptions = {}
  ): Promise<ChunkSummaryResult> {
    const callerSignal = options.signal;
    if (callerSignal?.aborted) {
      throw new PipelineCancelledError();
    }

    const prompt = this.buildPrompt(text, template, variables);
    const { signal, timeout } = withDeadline(this.timeoutMs, callerSignal);

    debug(`Calling ${this.provider.name} with a ${prompt.length} char prompt`);

    try {
      const result = await raceWithSignal(this.provider.generate(prompt, { signal }), signal);
      return {
        text: result.text,
        simulated: result.simulated === true,
        ...(result.usage !== undefined && { usage: result.usage }),
      };
    } catch (e: unknown) {
      if (callerSignal?.aborted) {
        throw new PipelineCancelledError();
      }
      if (timeout.aborted) {
        throw new BackendTimeoutError(this.provider.name, this.timeoutMs, e);
      }
      if (e instanceof ChunkwiseError) {
        throw e;
      }
      const err = handleUnknownError(e, `${this.provider.name} call`);
      throw new BackendError(`${this.provider.name} call failed: ${err.message}`, this.provider.name, e);
    }
  }
}
