import { z } from 'zod';
import { CHUNK_PRESETS, DEFAULT_FINAL_PROMPT } from './pipeline-schemas';

export const OUTPUT_FORMATS = ['text', 'json'] as const;

// CLI options schema for command line argument validation
export const CLI_OPTIONS_SCHEMA = z.object({
  verbose: z.boolean().default(false),
  showPrompt: z.boolean().default(false),
  showPromptTrunc: z.boolean().default(false),
  debugJson: z.boolean().default(false),
  output: z.enum(OUTPUT_FORMATS).default('text'),
  prompt: z.string().min(1).default(DEFAULT_FINAL_PROMPT),
  chunkPrompt: z.string().min(1).optional(),
  promptsDir: z.string().min(1).optional(),
  var: z.array(z.string()).default([]),
  // Commander hands numbers over as strings
  chunkSize: z.coerce.number().int().positive().optional(),
  chunkOverlap: z.coerce.number().int().nonnegative().optional(),
  concurrency: z.coerce.number().int().min(1).max(32).optional(),
  timeout: z.coerce.number().int().positive().optional(),
  maxReduceRounds: z.coerce.number().int().min(1).optional(),
  preset: z.enum(CHUNK_PRESETS).default('auto'),
  directive: z.string().optional(),
});

// `key=value`, key made of word characters
export const TEMPLATE_VARIABLE_SCHEMA = z
  .string()
  .regex(/^\s*[\w.-]+\s*=/, { message: "Expected 'key=value'" });

// Inferred types
export type CliOptions = z.infer<typeof CLI_OPTIONS_SCHEMA>;
