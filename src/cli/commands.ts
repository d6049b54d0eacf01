import type { Command } from 'commander';
import { readFile } from 'fs/promises';
import * as path from 'path';
import { createProvider, DefaultRequestBuilder, SimulatedProvider } from '../providers/index';
import { FilePromptLoader } from '../prompts/prompt-loader';
import { ReduceCoordinator } from '../summarize/reduce-coordinator';
import {
  parseCliOptions,
  parseEnvironment,
  parseTemplateVariables,
  pricingFromEnv,
  toPipelineOptions,
} from '../boundaries/index';
import { ConfigError, handleUnknownError } from '../errors/index';
import { withCost } from '../types/token-usage';
import { printFailure, printRunStats, printSummary, printTokenUsage } from '../output/reporter';
import { formatSummaryJson } from '../output/json-formatter';
import { debug, setSilentMode, setVerboseMode, warn } from '../output/logger';
import { DEFAULT_FINAL_PROMPT } from '../schemas/pipeline-schemas';
import { OutputFormat } from './types';

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

async function readInput(file: string): Promise<string> {
  try {
    return await readFile(file, 'utf-8');
  } catch (e: unknown) {
    const err = handleUnknownError(e, `Reading ${file}`);
    throw new ConfigError(`Cannot read input file ${file}: ${err.message}`);
  }
}

/*
 * Registers `summarize <file>`: reads already extracted text and prints one
 * summary of it.
 */
export function registerSummarizeCommand(program: Command): void {
  program
    .command('summarize')
    .description('Summarize an extracted text file, chunking and reducing it when it is too long for one call')
    .argument('<file>', 'text or markdown file to summarize')
    .option('-p, --prompt <name>', 'final prompt template name', DEFAULT_FINAL_PROMPT)
    .option('--chunk-prompt <name>', 'prompt template name for each chunk')
    .option('--prompts-dir <dir>', 'directory of <name>.md prompt templates')
    .option('--var <key=value>', 'template variable (repeatable)', collect, [])
    .option('--chunk-size <tokens>', 'maximum estimated tokens per chunk')
    .option('--chunk-overlap <tokens>', 'estimated tokens repeated from the previous chunk')
    .option('--concurrency <n>', 'chunk calls in flight at once')
    .option('--timeout <ms>', 'per-call timeout in milliseconds')
    .option('--max-reduce-rounds <n>', 'reduce rounds allowed before giving up')
    .option('--preset <name>', 'separator preset: auto, prose, markdown or code', 'auto')
    .option('--directive <text>', 'instruction appended to every prompt')
    .option('--output <format>', 'output format: text (default) or json', 'text')
    .option('-v, --verbose', 'Enable verbose logging')
    .option('--show-prompt', 'Print full prompts (with --verbose)')
    .option('--show-prompt-trunc', 'Print truncated prompt previews (500 chars, with --verbose)')
    .option('--debug-json', 'Print full JSON responses from the API (with --verbose)')
    .action(async (file: string, rawOptions: unknown) => {
      let cliOptions;
      let variables;
      try {
        cliOptions = parseCliOptions(rawOptions);
        variables = parseTemplateVariables(cliOptions.var);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Parsing CLI options');
        console.error(`Error: ${err.message}`);
        process.exit(1);
      }

      const outputFormat = cliOptions.output === 'json' ? OutputFormat.Json : OutputFormat.Text;
      setVerboseMode(cliOptions.verbose);
      // stdout carries only the JSON document
      setSilentMode(outputFormat === OutputFormat.Json);

      let env;
      try {
        env = parseEnvironment();
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Validating environment variables');
        console.error(`Error: ${err.message}`);
        console.error('Please set these in your .env file or environment.');
        process.exit(1);
      }

      const provider = createProvider(
        env,
        {
          debug: cliOptions.verbose,
          showPrompt: cliOptions.showPrompt,
          showPromptTrunc: cliOptions.showPromptTrunc,
          debugJson: cliOptions.debugJson,
        },
        new DefaultRequestBuilder(cliOptions.directive)
      );
      if (provider instanceof SimulatedProvider) {
        warn('No LLM_PROVIDER configured; running with the simulated backend');
      }
      if (cliOptions.directive) {
        debug(`Directive active: ${cliOptions.directive.length} char(s)`);
      }

      const controller = new AbortController();
      const onInterrupt = () => controller.abort();
      process.once('SIGINT', onInterrupt);

      try {
        const text = await readInput(file);
        const coordinator = new ReduceCoordinator(
          { provider, prompts: new FilePromptLoader(cliOptions.promptsDir) },
          toPipelineOptions(cliOptions)
        );
        const result = await coordinator.run(text, cliOptions.prompt, variables, { signal: controller.signal });
        const usage = withCost(result.usage, pricingFromEnv(env));

        if (outputFormat === OutputFormat.Json) {
          const relFile = path.relative(process.cwd(), file) || file;
          console.log(formatSummaryJson(relFile, provider.name, { ...result, usage }));
        } else {
          printSummary(result.summary);
          if (cliOptions.verbose) {
            printRunStats(result);
            printTokenUsage(usage);
          }
        }
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Summarizing');
        printFailure(`Summarization failed: ${err.message}`);
        process.exit(1);
      } finally {
        process.removeListener('SIGINT', onInterrupt);
      }

      process.exit(0);
    });
}
