import { z } from 'zod';
import { CHUNK_BUDGET_SCHEMA, OVERLAP_ISSUE, overlapWithinChunk } from './chunking-schemas';
import { CHUNK_SUMMARY_PROMPT, FINAL_SUMMARY_PROMPT } from '../prompts/default-templates';

export const CHUNK_PRESETS = ['auto', 'prose', 'markdown', 'code'] as const;

export const DEFAULT_CHUNK_PROMPT = CHUNK_SUMMARY_PROMPT;
export const DEFAULT_FINAL_PROMPT = FINAL_SUMMARY_PROMPT;

export const PIPELINE_OPTIONS_SCHEMA = CHUNK_BUDGET_SCHEMA.extend({
  concurrency: z.number().int().min(1).max(32).default(4),
  timeoutMs: z.number().int().positive().default(120_000),
  maxReduceRounds: z.number().int().min(1).default(8),
  chunkPromptName: z.string().min(1).default(DEFAULT_CHUNK_PROMPT),
  preset: z.enum(CHUNK_PRESETS).default('auto'),
}).refine(overlapWithinChunk, OVERLAP_ISSUE);

// Inferred types
export type PipelineOptions = z.input<typeof PIPELINE_OPTIONS_SCHEMA>;
export type PipelineConfig = z.infer<typeof PIPELINE_OPTIONS_SCHEMA>;
export type ChunkPreset = (typeof CHUNK_PRESETS)[number];
