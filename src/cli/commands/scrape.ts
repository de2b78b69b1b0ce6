// src/cli/commands/scrape.ts
import { Command, InvalidArgumentError } from 'commander';
import type { ScrapeConfigOverrides } from '../../core/config/scrape-config.js';
import { PageSiftError, errorMessage } from '../../core/errors.js';
import { formatJsonOutput } from '../../core/export/json.js';
import { ScrapeCoordinator } from '../../core/orchestrator.js';
import type { BudgetCounters } from '../../core/types/index.js';

export interface ScrapeCommandOptions {
  compact?: boolean;
  timeout?: number;
  maxTabs?: number;
  maxLoadMore?: number;
  maxScrolls?: number;
  maxPages?: number;
  /** false when --no-render is passed */
  render?: boolean;
  forceRender?: boolean;
  debug?: boolean;
}

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

export function addScrapeOptions(command: Command): Command {
  return command
    .option('--compact', 'Print JSON on a single line', false)
    .option('--timeout <ms>', 'Fetch and page-load timeout in milliseconds', parseNonNegativeInt)
    .option('--max-tabs <n>', 'Maximum tabs to click', parseNonNegativeInt)
    .option('--max-load-more <n>', 'Maximum "load more" clicks', parseNonNegativeInt)
    .option('--max-scrolls <n>', 'Maximum infinite-scroll steps', parseNonNegativeInt)
    .option('--max-pages <n>', 'Maximum pagination depth', parseNonNegativeInt)
    .option('--no-render', 'Never start a browser; static HTML only')
    .option('--force-render', 'Always render with a browser', false)
    .option('--debug', 'Verbose logging and saved rendered HTML', false);
}

export function buildOverrides(options: ScrapeCommandOptions): ScrapeConfigOverrides {
  if (options.render === false && options.forceRender) {
    throw new Error('--no-render and --force-render cannot be combined');
  }

  const ceilings: Partial<BudgetCounters> = {};
  if (options.maxTabs !== undefined) ceilings.tabsClicked = options.maxTabs;
  if (options.maxLoadMore !== undefined) ceilings.loadMoreClicks = options.maxLoadMore;
  if (options.maxScrolls !== undefined) ceilings.scrolls = options.maxScrolls;
  if (options.maxPages !== undefined) ceilings.paginationDepth = options.maxPages;

  const overrides: ScrapeConfigOverrides = {
    ceilings,
    renderMode: options.forceRender ? 'always' : options.render === false ? 'never' : 'auto',
    debug: options.debug ?? false,
  };

  if (options.timeout !== undefined) {
    overrides.fetchTimeout = options.timeout;
    overrides.pageLoadTimeout = options.timeout;
  }

  return overrides;
}

export async function handleScrape(url: string, options: ScrapeCommandOptions): Promise<void> {
  try {
    const coordinator = new ScrapeCoordinator(buildOverrides(options));
    const result = await coordinator.scrape(url);
    console.log(formatJsonOutput(result, options.compact ?? false));

    if (result.sections.length === 0 && result.errors.length > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    console.error('Error:', errorMessage(error));
    if (error instanceof PageSiftError && error.suggestion) {
      console.error('Hint:', error.suggestion);
    }
    process.exit(1);
  }
}

/**
 * Registers `pagesift <url>` on the root program and the explicit `pagesift scrape <url>`.
 */
export function registerScrapeCommand(program: Command): void {
  addScrapeOptions(program.argument('[url]', 'URL to scrape')).action(
    async (url: string | undefined, options: ScrapeCommandOptions) => {
      if (!url) {
        program.help({ error: true });
      }
      await handleScrape(url, options);
    }
  );

  addScrapeOptions(program.command('scrape <url>').description('Scrape a single URL and print the result as JSON')).action(
    async (url: string, options: ScrapeCommandOptions) => {
      await handleScrape(url, options);
    }
  );
}
