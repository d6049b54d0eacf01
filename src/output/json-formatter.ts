import { VERSION } from '../version';
import type { PipelineResult } from '../summarize/types';
import type { TokenUsageStats } from '../types/token-usage';

export interface SummaryJson {
  file: string;
  summary: string;
  path: PipelineResult['path'];
  chunks: number;
  reduceRounds: number;
  calls: number;
  usage: TokenUsageStats;
  metadata: {
    version: string;
    provider: string;
    timestamp: string;
  };
}

export function toSummaryJson(file: string, provider: string, result: PipelineResult, now: Date = new Date()): SummaryJson {
  return {
    file,
    summary: result.summary,
    path: result.path,
    chunks: result.chunkCount,
    reduceRounds: result.reduceRounds,
    calls: result.calls,
    usage: result.usage,
    metadata: {
      version: VERSION,
      provider,
      timestamp: now.toISOString(),
    },
  };
}

export function formatSummaryJson(file: string, provider: string, result: PipelineResult, now?: Date): string {
  return JSON.stringify(toSummaryJson(file, provider, result, now), null, 2);
}
