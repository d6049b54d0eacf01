import { z } from 'zod';
import type { LLMProvider } from '../providers/llm-provider';
import { FilePromptLoader, type PromptTemplateProvider } from '../prompts/prompt-loader';
import type { TemplateVariables } from '../prompts/template-renderer';
import { createChunker, type RecursiveChunker } from '../chunking/chunker';
import { estimateTokens } from '../chunking/token-estimator';
import {
  DEFAULT_FINAL_PROMPT,
  PIPELINE_OPTIONS_SCHEMA,
  type PipelineConfig,
  type PipelineOptions,
} from '../schemas/pipeline-schemas';
import { formatZodIssues } from '../schemas/issues';
import {
  BackendError,
  ChunkwiseError,
  PipelineCancelledError,
  ReductionError,
  ValidationError,
  handleUnknownError,
} from '../errors/index';
import { addUsage, emptyUsageStats, type TokenUsageStats } from '../types/token-usage';
import { debug, warn } from '../output/logger';
import { ChunkSummarizer } from './chunk-summarizer';
import { runWithConcurrency } from './concurrency';
import {
  PipelineState,
  type ChunkSummary,
  type ChunkSummaryResult,
  type PipelinePath,
  type PipelineResult,
  type StateChangeListener,
  type SummarizeOptions,
} from './types';

export interface ReduceCoordinatorDeps {
  provider: LLMProvider;
  prompts?: PromptTemplateProvider;
  onStateChange?: StateChangeListener;
}

function parsePipelineOptions(options: PipelineOptions): PipelineConfig {
  try {
    return PIPELINE_OPTIONS_SCHEMA.parse(options);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ValidationError(`Invalid pipeline options: ${formatZodIssues(e)}`, e);
    }
    const err = handleUnknownError(e, 'Pipeline option validation');
    throw new ValidationError(`Pipeline option validation failed: ${err.message}`, e);
  }
}

/**
 * Positional hints for the chunk prompt. Single-chunk runs get no context.
 */
export function chunkContextVariables(index: number, total: number): TemplateVariables {
  let context = '';
  if (total > 1) {
    context = `This is part ${index + 1} of ${total}. `;
    if (index === 0) {
      context += 'This is the beginning of the document. ';
    } else if (index === total - 1) {
      context += 'This is the end of the document. ';
    } else {
      context += 'This is a middle section of the document. ';
    }
  }
  return {
    chunk_context: context,
    chunk_num: String(index + 1),
    total_chunks: String(total),
  };
}

/**
 * Joins ordered chunk summaries into one block of text, each under a
 * `--- CHUNK i/N SUMMARY ---` marker.
 */
export function consolidateSummaries(summaries: readonly ChunkSummary[]): string {
  return summaries
    .map((s, i) => `--- CHUNK ${i + 1}/${summaries.length} SUMMARY ---\n${s.text}`)
    .join('\n\n');
}

/**
 * Bookkeeping for one `run()`: state, call count, usage and whether the
 * backend turned out to be simulated. Nothing here outlives the run.
 */
class PipelineRun {
  state = PipelineState.Idle;
  calls = 0;
  usage: TokenUsageStats = emptyUsageStats();
  simulatedText: string | undefined;
  chunkCount = 0;
  reduceRounds = 0;

  constructor(private readonly listener?: StateChangeListener) {}

  transition(to: PipelineState, detail?: string): void {
    const from = this.state;
    this.state = to;
    debug(`Pipeline ${from} -> ${to}${detail ? ` (${detail})` : ''}`);
    this.listener?.({ from, to, ...(detail !== undefined && { detail }) });
  }

  async call(
    summarizer: ChunkSummarizer,
    text: string,
    template: string,
    variables: TemplateVariables,
    signal: AbortSignal | undefined
  ): Promise<ChunkSummaryResult> {
    this.calls++;
    const result = await summarizer.summarize(text, template, variables, signal ? { signal } : {});
    this.usage = addUsage(this.usage, result.usage);
    if (result.simulated && this.simulatedText === undefined) {
      debug('Backend is simulated; no further calls will be made');
      this.simulatedText = result.text;
    }
    return result;
  }

  result(summary: string, path: PipelinePath): PipelineResult {
    return {
      summary,
      path,
      chunkCount: this.chunkCount,
      reduceRounds: this.reduceRounds,
      calls: this.calls,
      usage: this.usage,
    };
  }
}

/**
 * Summarizes a whole document: one call when it fits the chunk budget,
 * otherwise map over chunks, reduce the joined summaries until they fit,
 * then one final call.
 */
export class ReduceCoordinator {
  readonly config: PipelineConfig;

  private readonly provider: LLMProvider;
  private readonly prompts: PromptTemplateProvider;
  private readonly summarizer: ChunkSummarizer;
  private readonly onStateChange: StateChangeListener | undefined;

  constructor(deps: ReduceCoordinatorDeps, options: PipelineOptions = {}) {
    this.config = parsePipelineOptions(options);
    this.provider = deps.provider;
    this.prompts = deps.prompts ?? new FilePromptLoader();
    this.onStateChange = deps.onStateChange;
    this.summarizer = new ChunkSummarizer(deps.provider, { timeoutMs: this.config.timeoutMs });
  }

  async summarize(
    text: string,
    promptName: string = DEFAULT_FINAL_PROMPT,
    variables: TemplateVariables = {},
    options: SummarizeOptions = {}
  ): Promise<string> {
    const result = await this.run(text, promptName, variables, options);
    return result.summary;
  }

  async run(
    text: string,
    promptName: string = DEFAULT_FINAL_PROMPT,
    variables: TemplateVariables = {},
    options: SummarizeOptions = {}
  ): Promise<PipelineResult> {
    const run = new PipelineRun(this.onStateChange);
    const { signal } = options;

    try {
      return await this.execute(run, text, promptName, variables, signal);
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'Summarization');
      run.transition(PipelineState.Failed, err.message);
      if (e instanceof ChunkwiseError) {
        throw e;
      }
      if (signal?.aborted) {
        throw new PipelineCancelledError();
      }
      throw err;
    }
  }

  private async execute(
    run: PipelineRun,
    text: string,
    promptName: string,
    variables: TemplateVariables,
    signal: AbortSignal | undefined
  ): Promise<PipelineResult> {
    const { chunkSize } = this.config;

    run.transition(PipelineState.Estimating);
    if (signal?.aborted) {
      throw new PipelineCancelledError();
    }

    if (!text) {
      warn('Empty text provided, nothing to summarize');
      run.transition(PipelineState.Done, 'empty input');
      return run.result('', 'empty');
    }

    const estimate = estimateTokens(text);
    if (estimate <= chunkSize) {
      run.transition(PipelineState.DirectSummarize, `~${estimate} tokens`);
      const template = await this.prompts.loadTemplate(promptName);
      run.chunkCount = 1;
      const result = await run.call(this.summarizer, text, template, variables, signal);
      run.transition(PipelineState.Done);
      return run.result(result.text, result.simulated ? 'simulated' : 'direct');
    }

    run.transition(PipelineState.Chunking, `~${estimate} tokens over a budget of ${chunkSize}`);
    const chunker = createChunker(
      this.config.preset,
      { chunkSize, chunkOverlap: this.config.chunkOverlap },
      text
    );
    const chunks = chunker.splitText(text);
    run.chunkCount = chunks.length;
    debug(`Split document into ${chunks.length} chunks with the ${chunker.name} chunker`);

    const chunkTemplate = await this.prompts.loadTemplate(this.config.chunkPromptName);

    run.transition(PipelineState.MapSummarizing, `${chunks.length} chunks`);
    const summaries = await this.mapChunks(run, chunks, chunkTemplate, variables, signal);
    if (run.simulatedText !== undefined) {
      run.transition(PipelineState.Done, 'simulated backend');
      return run.result(run.simulatedText, 'simulated');
    }

    let combined = consolidateSummaries(summaries);
    while (estimateTokens(combined) > chunkSize) {
      if (run.reduceRounds >= this.config.maxReduceRounds) {
        throw new ReductionError(
          `Combined summaries still exceed ${chunkSize} tokens after ${run.reduceRounds} reduce rounds`,
          run.reduceRounds
        );
      }
      run.reduceRounds++;
      combined = await this.reduce(run, chunker, combined, chunkTemplate, variables, signal);
      if (run.simulatedText !== undefined) {
        run.transition(PipelineState.Done, 'simulated backend');
        return run.result(run.simulatedText, 'simulated');
      }
    }

    run.transition(PipelineState.FinalSummarizing, `~${estimateTokens(combined)} tokens`);
    const finalTemplate = await this.prompts.loadTemplate(promptName);
    const final = await run.call(this.summarizer, combined, finalTemplate, variables, signal);

    run.transition(PipelineState.Done);
    return run.result(final.text, final.simulated ? 'simulated' : 'chunked');
  }

  private async reduce(
    run: PipelineRun,
    chunker: RecursiveChunker,
    combined: string,
    template: string,
    variables: TemplateVariables,
    signal: AbortSignal | undefined
  ): Promise<string> {
    const pieces = chunker.splitText(combined);
    run.transition(
      PipelineState.ReduceMerging,
      `round ${run.reduceRounds}, ${pieces.length} pieces`
    );
    const summaries = await this.mapChunks(run, pieces, template, variables, signal);
    return consolidateSummaries(summaries);
  }

  /**
   * Summarizes `chunks` in order. The first chunk goes alone so that a
   * simulated backend is seen before any fan-out; the rest run under the
   * concurrency limit. A blank summary fails the run, naming its chunk.
   */
  private async mapChunks(
    run: PipelineRun,
    chunks: readonly string[],
    template: string,
    variables: TemplateVariables,
    signal: AbortSignal | undefined
  ): Promise<ChunkSummary[]> {
    const total = chunks.length;

    const summarizeChunk = async (
      chunk: string,
      index: number,
      callSignal: AbortSignal | undefined
    ): Promise<ChunkSummary> => {
      if (run.simulatedText !== undefined) {
        return { index, text: run.simulatedText };
      }
      // Positional keys are reserved and override caller variables
      const chunkVariables = { ...variables, ...chunkContextVariables(index, total) };
      const result = await run.call(this.summarizer, chunk, template, chunkVariables, callSignal);
      if (result.text.trim().length === 0) {
        throw new BackendError(`Chunk ${index + 1} of ${total} returned an empty summary`, this.provider.name);
      }
      debug(`Summarized chunk ${index + 1}/${total} (${result.text.length} chars)`);
      return { index, text: result.text };
    };

    const [first, ...rest] = chunks;
    if (first === undefined) {
      return [];
    }

    const head = await summarizeChunk(first, 0, signal);
    if (run.simulatedText !== undefined) {
      return [head];
    }

    const tail = await runWithConcurrency(
      rest,
      this.config.concurrency,
      (chunk, i, workerSignal) => summarizeChunk(chunk, i + 1, workerSignal),
      signal
    );
    return [head, ...tail];
  }
}
