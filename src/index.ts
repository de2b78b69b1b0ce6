// src/index.ts
import type { ScrapeConfigOverrides } from './core/config/scrape-config.js';
import { ScrapeCoordinator, type ScrapeOptions } from './core/orchestrator.js';
import type { ScrapeResult } from './core/types/index.js';

export { ScrapeCoordinator } from './core/orchestrator.js';
export type { CoordinatorDeps, ScrapeOptions } from './core/orchestrator.js';
export { DEFAULT_SCRAPE_CONFIG, resolveConfig } from './core/config/scrape-config.js';
export type { BrowserChannel, RenderMode, ScrapeConfig, ScrapeConfigOverrides } from './core/config/scrape-config.js';
export { StaticFetcher } from './core/fetch/fetcher.js';
export type { HtmlFetcher } from './core/fetch/fetcher.js';
export { evaluateSufficiency, JS_INDICATORS } from './core/fetch/sufficiency.js';
export { BrowserManager } from './core/render/browser.js';
export { InteractiveRenderer } from './core/render/renderer.js';
export type { BrowsingSession, ControlHandle, PageRenderer, RenderOutcome, SessionFactory } from './core/render/types.js';
export { InteractionDriver } from './core/interact/driver.js';
export { InteractionBudget } from './core/interact/budget.js';
export { segmentDocument } from './core/extract/segmenter.js';
export { classifyBoundary } from './core/extract/classifier.js';
export { CLASSIFICATION_RULES } from './core/extract/rules.js';
export { sanitizeBoundary } from './core/extract/sanitizer.js';
export { createPageDocument } from './core/extract/document.js';
export { formatJsonOutput } from './core/export/json.js';
export {
  ClassificationError,
  ErrorCode,
  FetchError,
  InteractionError,
  InvalidRequestError,
  PageSiftError,
  RenderError,
  SanitizationError,
  SegmentationError,
} from './core/errors.js';
export type * from './core/types/index.js';

export interface ScrapeCallOptions extends ScrapeOptions {
  config?: ScrapeConfigOverrides;
}

/**
 * Scrapes one URL with a dedicated browser when rendering is needed.
 * Rejects only with InvalidRequestError (or the abort reason when `signal` fires).
 */
export async function scrape(url: string, options: ScrapeCallOptions = {}): Promise<ScrapeResult> {
  const { config, ...scrapeOptions } = options;
  return new ScrapeCoordinator(config).scrape(url, scrapeOptions);
}

export function healthCheck(): { status: 'ok' } {
  return { status: 'ok' };
}
