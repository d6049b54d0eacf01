import { z } from 'zod';
import { CLI_OPTIONS_SCHEMA, TEMPLATE_VARIABLE_SCHEMA, type CliOptions } from '../schemas/cli-schemas';
import type { PipelineOptions } from '../schemas/pipeline-schemas';
import { formatZodIssues } from '../schemas/issues';
import { ValidationError, handleUnknownError } from '../errors/index';

export function parseCliOptions(raw: unknown): CliOptions {
  try {
    return CLI_OPTIONS_SCHEMA.parse(raw);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ValidationError(`Invalid CLI options: ${formatZodIssues(e)}`, e);
    }
    const err = handleUnknownError(e, 'CLI option parsing');
    throw new ValidationError(`CLI option parsing failed: ${err.message}`, e);
  }
}

/**
 * Turns repeated `--var key=value` flags into template variables. Only the
 * first `=` separates key from value; later flags override earlier ones.
 */
export function parseTemplateVariables(pairs: readonly string[]): Record<string, string> {
  const variables: Record<string, string> = {};
  for (const pair of pairs) {
    const checked = TEMPLATE_VARIABLE_SCHEMA.safeParse(pair);
    if (!checked.success) {
      throw new ValidationError(`Invalid --var '${pair}': expected key=value`, checked.error);
    }
    const eq = pair.indexOf('=');
    variables[pair.slice(0, eq).trim()] = pair.slice(eq + 1);
  }
  return variables;
}

export function toPipelineOptions(cli: CliOptions): PipelineOptions {
  return {
    chunkSize: cli.chunkSize,
    chunkOverlap: cli.chunkOverlap,
    concurrency: cli.concurrency,
    timeoutMs: cli.timeout,
    maxReduceRounds: cli.maxReduceRounds,
    chunkPromptName: cli.chunkPrompt,
    preset: cli.preset,
  };
}
