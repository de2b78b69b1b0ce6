// src/core/orchestrator.ts
import { resolveConfig, type ScrapeConfig, type ScrapeConfigOverrides } from './config/scrape-config.js';
import {
  ClassificationError,
  SanitizationError,
  SegmentationError,
  errorMessage,
  toScrapeError,
} from './errors.js';
import { classifyBoundary, type Classification } from './extract/classifier.js';
import { extractContent } from './extract/content.js';
import { emptyMetadata, extractMetadata } from './extract/metadata.js';
import { sanitizeBoundary } from './extract/sanitizer.js';
import { segmentDocument, type SectionBoundary } from './extract/segmenter.js';
import { StaticFetcher, type HtmlFetcher } from './fetch/fetcher.js';
import { evaluateSufficiency } from './fetch/sufficiency.js';
import { BrowserManager } from './render/browser.js';
import { InteractiveRenderer } from './render/renderer.js';
import type { PageRenderer, RenderOutcome, SessionFactory } from './render/types.js';
import { parseScrapeRequest } from './render/utils.js';
import type { PageDocument, ScrapeError, ScrapeResult, Section, SectionContent } from './types/index.js';

export interface ScrapeOptions {
  signal?: AbortSignal;
}

export interface CoordinatorDeps {
  fetcher?: HtmlFetcher;
  /** Replaces the default browser-backed renderer entirely */
  renderer?: PageRenderer;
  /** Shared session source; the coordinator does not close it */
  sessions?: SessionFactory;
}

/**
 * Runs fetch → evaluate → (render) → segment → classify → sanitize for one URL.
 * Only an invalid URL rejects; every other failure becomes an entry in `errors`.
 */
export class ScrapeCoordinator {
  readonly config: ScrapeConfig;
  private fetcher: HtmlFetcher;

  constructor(config: ScrapeConfigOverrides = {}, private deps: CoordinatorDeps = {}) {
    this.config = resolveConfig(config);
    this.fetcher =
      deps.fetcher ?? new StaticFetcher({ timeout: this.config.fetchTimeout, userAgent: this.config.userAgent });
  }

  async scrape(url: string, options: ScrapeOptions = {}): Promise<ScrapeResult> {
    const request = parseScrapeRequest(url);
    const target = request.url.toString();
    const { signal } = options;
    const errors: ScrapeError[] = [];

    const result: ScrapeResult = {
      url: target,
      scrapedAt: new Date().toISOString(),
      sourceMode: null,
      metadata: emptyMetadata(),
      sections: [],
      interactions: [],
      budget: { tabsClicked: 0, loadMoreClicks: 0, scrolls: 0, paginationDepth: 0 },
      errors,
    };

    // Step 1: static pass
    let staticDoc: PageDocument | undefined;
    if (this.config.renderMode !== 'always') {
      try {
        console.error(`[INFO] Fetching ${target}`);
        staticDoc = await this.fetcher.fetch(target, signal);
      } catch (error) {
        if (signal?.aborted) throw error;
        console.error(`[WARN] Static fetch failed: ${errorMessage(error)}`);
        errors.push(toScrapeError('fetch', error));
      }
    }

    // Step 2: decide whether a browser pass is needed
    let pages: PageDocument[] = staticDoc ? [staticDoc] : [];
    if (this.needsRender(staticDoc)) {
      const outcome = await this.tryRender(target, errors, signal);
      if (outcome) {
        pages = outcome.snapshots;
        result.interactions = outcome.interactions;
        result.budget = outcome.budget;
        errors.push(...outcome.errors);
      } else if (staticDoc) {
        console.error('[INFO] Falling back to static content');
      }
    }

    if (pages.length === 0) {
      console.error(`[WARN] No content could be retrieved for ${target}`);
      return result;
    }

    // Step 3: extract
    result.sourceMode = pages[0].sourceMode;
    try {
      result.metadata = extractMetadata(pages[0]);
    } catch (error) {
      errors.push(toScrapeError('segment', new SegmentationError(`Failed to read page metadata: ${errorMessage(error)}`)));
    }
    result.sections = this.extractSections(pages, errors);

    console.error(`[INFO] Scraped ${target}: ${result.sections.length} sections, ${errors.length} errors`);
    return result;
  }

  private needsRender(staticDoc?: PageDocument): boolean {
    switch (this.config.renderMode) {
      case 'never':
        return false;
      case 'always':
        return true;
      case 'auto':
        break;
    }

    if (!staticDoc) {
      return true;
    }

    const decision = evaluateSufficiency(staticDoc);
    if (decision.sufficient) {
      console.error(`[INFO] Static content sufficient (${decision.textLength} chars)`);
      return false;
    }

    const detail = decision.indicators.length > 0 ? `: ${decision.indicators.join(', ')}` : '';
    console.error(`[INFO] Static content insufficient (${decision.reason}${detail}), rendering with browser`);
    return true;
  }

  private async tryRender(url: string, errors: ScrapeError[], signal?: AbortSignal): Promise<RenderOutcome | undefined> {
    try {
      return await this.render(url, signal);
    } catch (error) {
      if (signal?.aborted) throw error;
      console.error(`[WARN] Rendering failed: ${errorMessage(error)}`);
      errors.push(toScrapeError('render', error));
      return undefined;
    }
  }

  private async render(url: string, signal?: AbortSignal): Promise<RenderOutcome> {
    if (this.deps.renderer) {
      return this.deps.renderer.render(url, signal);
    }

    if (this.deps.sessions) {
      return new InteractiveRenderer(this.deps.sessions, this.config).render(url, signal);
    }

    const browserManager = new BrowserManager({
      channel: this.config.browser,
      headless: this.config.headless,
      userAgent: this.config.userAgent,
    });

    try {
      return await new InteractiveRenderer(browserManager, this.config).render(url, signal);
    } finally {
      try {
        await browserManager.close();
      } catch (error) {
        console.error(`[WARN] Failed to close browser: ${errorMessage(error)}`);
      }
    }
  }

  private extractSections(pages: PageDocument[], errors: ScrapeError[]): Section[] {
    const sections: Section[] = [];

    for (const page of pages) {
      let boundaries: SectionBoundary[];
      try {
        boundaries = segmentDocument(page);
      } catch (error) {
        errors.push(
          toScrapeError('segment', new SegmentationError(`Failed to segment ${page.url}: ${errorMessage(error)}`))
        );
        continue;
      }

      for (const boundary of boundaries) {
        const section = this.buildSection(boundary, sections.length, errors);
        if (section) {
          sections.push(section);
        }
      }
    }

    return sections;
  }

  private buildSection(boundary: SectionBoundary, ordinal: number, errors: ScrapeError[]): Section | null {
    const where = `<${boundary.tagName}> #${boundary.index} on ${boundary.sourceUrl}`;

    let classification: Classification;
    try {
      classification = classifyBoundary(boundary);
    } catch (error) {
      errors.push(toScrapeError('classify', new ClassificationError(`Failed to classify ${where}: ${errorMessage(error)}`)));
      return null;
    }

    let sanitized: ReturnType<typeof sanitizeBoundary>;
    let content: SectionContent;
    try {
      sanitized = sanitizeBoundary(boundary);
      content = extractContent(boundary);
    } catch (error) {
      errors.push(toScrapeError('sanitize', new SanitizationError(`Failed to sanitize ${where}: ${errorMessage(error)}`)));
      return null;
    }

    return {
      id: `${classification.type}-${ordinal}`,
      type: classification.type,
      label: classification.label,
      sourceUrl: boundary.sourceUrl,
      rawHtml: sanitized.rawHtml,
      text: sanitized.text,
      truncated: sanitized.truncated,
      content,
    };
  }
}
