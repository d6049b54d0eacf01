import type { TokenUsage, TokenUsageStats } from '../types/token-usage';

export enum PipelineState {
  Idle = 'idle',
  Estimating = 'estimating',
  DirectSummarize = 'direct-summarize',
  Chunking = 'chunking',
  MapSummarizing = 'map-summarizing',
  ReduceMerging = 'reduce-merging',
  FinalSummarizing = 'final-summarizing',
  Done = 'done',
  Failed = 'failed',
}

export type PipelinePath = 'empty' | 'direct' | 'chunked' | 'simulated';

export interface StateChange {
  from: PipelineState;
  to: PipelineState;
  detail?: string;
}

export type StateChangeListener = (change: StateChange) => void;

export interface SummarizeOptions {
  signal?: AbortSignal;
}

export interface ChunkSummaryResult {
  text: string;
  simulated: boolean;
  usage?: TokenUsage;
}

/**
 * Output for one chunk. `index` is the chunk's position in the input and is
 * what restores order after concurrent completion.
 */
export interface ChunkSummary {
  index: number;
  text: string;
}

export interface PipelineResult {
  summary: string;
  path: PipelinePath;
  chunkCount: number;
  reduceRounds: number;
  calls: number;
  usage: TokenUsageStats;
}
