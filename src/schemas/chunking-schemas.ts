import { z } from 'zod';
import { DEFAULT_SEPARATORS, DEFAULT_SPECIAL_PATTERNS } from '../chunking/separators';

export const DEFAULT_CHUNK_SIZE = 3000;
export const DEFAULT_CHUNK_OVERLAP = 500;

export const OVERLAP_ISSUE = {
  message: 'Chunk overlap must be smaller than chunk size',
  path: ['chunkOverlap'],
};

export function overlapWithinChunk(opts: { chunkSize: number; chunkOverlap: number }): boolean {
  return opts.chunkOverlap < opts.chunkSize;
}

export const SPECIAL_PATTERN_SCHEMA = z.object({
  name: z.string().min(1),
  matcher: z.instanceof(RegExp).refine((re) => re.global, {
    message: 'Special pattern matchers must use the global (g) flag',
  }),
  priority: z.number().int(),
});

export const CHUNK_BUDGET_SCHEMA = z.object({
  chunkSize: z.number().int().positive().default(DEFAULT_CHUNK_SIZE),
  chunkOverlap: z.number().int().nonnegative().default(DEFAULT_CHUNK_OVERLAP),
});

export const CHUNKER_OPTIONS_SCHEMA = CHUNK_BUDGET_SCHEMA.extend({
  separators: z.array(z.string()).min(1).default([...DEFAULT_SEPARATORS]),
  keepSeparator: z.boolean().default(true),
  specialPatterns: z.array(SPECIAL_PATTERN_SCHEMA).default([...DEFAULT_SPECIAL_PATTERNS]),
}).refine(overlapWithinChunk, OVERLAP_ISSUE);

// Inferred types
export type ChunkerConfig = z.infer<typeof CHUNKER_OPTIONS_SCHEMA>;
