// src/core/batch/runner.ts
import { readFile } from 'node:fs/promises';
import { resolveConfig, type ScrapeConfigOverrides } from '../config/scrape-config.js';
import { InvalidRequestError, errorMessage } from '../errors.js';
import { formatJsonOutput } from '../export/json.js';
import { ScrapeCoordinator, type ScrapeOptions } from '../orchestrator.js';
import { BrowserManager } from '../render/browser.js';
import type { ScrapeResult } from '../types/index.js';

// Helper function to read from stdin (extracted for testability)
async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

export interface Scraper {
  scrape(url: string, options?: ScrapeOptions): Promise<ScrapeResult>;
}

export interface BatchOptions {
  source: 'file' | 'stdin';
  filePath?: string;
  continueOnError: boolean;
  concurrency: number;
  config?: ScrapeConfigOverrides;
}

export interface BatchSummary {
  total: number;
  success: number;
  empty: number;
  failed: number;
  duration: number;
  failures: Array<{ url: string; error: string }>;
}

/**
 * Scrapes a list of URLs with bounded concurrency. All requests share one browser
 * process, each in its own context.
 */
export class BatchRunner {
  constructor(private scraper?: Scraper) {}

  async run(options: BatchOptions): Promise<BatchSummary> {
    const urls = await this.parseUrls(options.source, options.filePath);

    if (urls.length === 0) {
      return { total: 0, success: 0, empty: 0, failed: 0, duration: 0, failures: [] };
    }

    const startTime = Date.now();
    const failures: Array<{ url: string; error: string }> = [];
    let successCount = 0;
    let emptyCount = 0;
    let firstError: unknown;

    const controller = new AbortController();
    let browserManager: BrowserManager | undefined;
    let scraper = this.scraper;
    if (!scraper) {
      const config = resolveConfig(options.config);
      browserManager = new BrowserManager({
        channel: config.browser,
        headless: config.headless,
        userAgent: config.userAgent,
      });
      scraper = new ScrapeCoordinator(config, { sessions: browserManager });
    }
    const activeScraper = scraper;

    const pending = urls[Symbol.iterator]();
    const worker = async (): Promise<void> => {
      for (const url of pending) {
        if (controller.signal.aborted) return;

        try {
          const result = await activeScraper.scrape(url, { signal: controller.signal });
          console.log(formatJsonOutput(result, true));
          if (result.sections.length > 0) {
            successCount++;
            console.error(`✓ ${url} (${result.sections.length} sections)`);
          } else {
            emptyCount++;
            console.error(`∅ ${url} (no sections, ${result.errors.length} errors)`);
          }
        } catch (error) {
          if (controller.signal.aborted) return;

          const errorMsg = errorMessage(error);
          failures.push({ url, error: errorMsg });
          console.error(`✗ ${url} (${errorMsg})`);

          if (!options.continueOnError) {
            firstError = error;
            controller.abort();
            return;
          }
        }
      }
    };

    const workerCount = Math.max(1, Math.min(options.concurrency, urls.length));

    try {
      await Promise.all(Array.from({ length: workerCount }, () => worker()));
    } finally {
      if (browserManager) {
        await browserManager.close();
      }
    }

    if (firstError !== undefined) {
      throw firstError;
    }

    const summary: BatchSummary = {
      total: urls.length,
      success: successCount,
      empty: emptyCount,
      failed: failures.length,
      duration: Date.now() - startTime,
      failures,
    };

    this.printSummary(summary);
    return summary;
  }

  async parseUrls(source: 'file' | 'stdin', filePath?: string): Promise<string[]> {
    let content: string;

    if (source === 'file') {
      if (!filePath) {
        throw new InvalidRequestError('File path is required when source is "file"');
      }
      content = await readFile(filePath, 'utf-8');
    } else {
      content = await readStdin();
    }

    return content
      .split('\n')
      .map(line => line.trim())
      .filter(line => line.length > 0 && !line.startsWith('#'));
  }

  private printSummary(summary: BatchSummary): void {
    console.error('\n' + '━'.repeat(50));
    console.error(
      `Summary: ${summary.success} scraped, ${summary.empty} empty, ${summary.failed} failed, ${(summary.duration / 1000).toFixed(1)}s`
    );

    if (summary.failures.length > 0) {
      console.error('\nFailed URLs:');
      summary.failures.forEach(({ url, error }) => {
        console.error(`  - ${url}: ${error}`);
      });
    }
  }
}
