// src/cli/commands/batch.ts
import { Command } from 'commander';
import { BatchRunner } from '../../core/batch/runner.js';
import { errorMessage } from '../../core/errors.js';
import { addScrapeOptions, buildOverrides, parseNonNegativeInt, type ScrapeCommandOptions } from './scrape.js';

export interface BatchCommandOptions extends ScrapeCommandOptions {
  file?: string;
  stdin?: boolean;
  concurrency: number;
  continueOnError?: boolean;
}

export async function handleBatch(options: BatchCommandOptions, runner: BatchRunner = new BatchRunner()): Promise<void> {
  if (!options.file && !options.stdin) {
    console.error('Error: --file or --stdin is required');
    process.exit(1);
  }

  try {
    const summary = await runner.run({
      source: options.file ? 'file' : 'stdin',
      filePath: options.file,
      continueOnError: options.continueOnError ?? false,
      concurrency: Math.max(1, options.concurrency),
      config: buildOverrides(options),
    });

    if (summary.failed > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    console.error('Error:', errorMessage(error));
    process.exit(1);
  }
}

export function registerBatchCommand(program: Command): void {
  addScrapeOptions(
    program
      .command('batch')
      .description('Scrape many URLs and print one JSON result per line')
      .option('--file <path>', 'Read URLs from file')
      .option('--stdin', 'Read URLs from stdin')
      .option('--concurrency <n>', 'Number of pages scraped at once', parseNonNegativeInt, 2)
      .option('--continue-on-error', 'Keep going after a URL is rejected')
  ).action(async (options: BatchCommandOptions) => {
    await handleBatch(options);
  });
}
