import chalk from 'chalk';
import type { PipelineResult } from '../summarize/types';
import type { TokenUsageStats } from '../types/token-usage';

function describePath(result: PipelineResult): string {
  switch (result.path) {
    case 'empty':
      return chalk.yellow('empty input');
    case 'direct':
      return chalk.green('single call');
    case 'chunked':
      return chalk.cyan('map-reduce');
    case 'simulated':
      return chalk.magenta('simulated');
  }
}

export function printSummary(summary: string) {
  console.log(summary);
}

export function printRunStats(result: PipelineResult) {
  console.log(chalk.bold('\nRun:'));
  console.log(`  - Path: ${describePath(result)}`);
  console.log(`  - Chunks: ${result.chunkCount}`);
  if (result.reduceRounds > 0) {
    console.log(`  - Reduce rounds: ${result.reduceRounds}`);
  }
  console.log(`  - Backend calls: ${result.calls}`);
}

export function printTokenUsage(stats: TokenUsageStats) {
  console.log(chalk.bold('\nToken Usage:'));
  console.log(`  - Input tokens: ${stats.totalInputTokens.toLocaleString()}`);
  console.log(`  - Output tokens: ${stats.totalOutputTokens.toLocaleString()}`);
  if (stats.totalCost !== undefined) {
    console.log(`  - Total cost: $${stats.totalCost.toFixed(4)}`);
  }
}

export function printFailure(message: string) {
  console.error(`${chalk.red('✖')} ${message}`);
}
