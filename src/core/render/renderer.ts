// src/core/render/renderer.ts
import { promises as fs } from 'fs';
import { join } from 'path';
import type { ScrapeConfig } from '../config/scrape-config.js';
import { ErrorCode, PageSiftError, RenderError, errorMessage, toScrapeError } from '../errors.js';
import { createPageDocument } from '../extract/document.js';
import { InteractionDriver, type DriverResult } from '../interact/driver.js';
import type { PageDocument } from '../types/index.js';
import type { BrowsingSession, PageRenderer, RenderOutcome, SessionFactory } from './types.js';

export type RendererConfig = Pick<
  ScrapeConfig,
  | 'pageLoadTimeout'
  | 'initialSettleMs'
  | 'interactionSettleMs'
  | 'idleTimeout'
  | 'clickTimeout'
  | 'ceilings'
  | 'debug'
>;

/**
 * Loads a page in a fresh browsing session, lets it settle, runs the interaction
 * driver and captures the rendered DOM of every page visited.
 */
export class InteractiveRenderer implements PageRenderer {
  constructor(
    private sessions: SessionFactory,
    private config: RendererConfig
  ) {}

  async render(url: string, signal?: AbortSignal): Promise<RenderOutcome> {
    signal?.throwIfAborted();

    const session = await this.openSession();

    try {
      await this.load(session, url, signal);

      const snapshots: PageDocument[] = [];
      const driver = new InteractionDriver(session, {
        ceilings: this.config.ceilings,
        interactionSettleMs: this.config.interactionSettleMs,
        idleTimeout: this.config.idleTimeout,
        initialSettleMs: this.config.initialSettleMs,
        pageLoadTimeout: this.config.pageLoadTimeout,
        clickTimeout: this.config.clickTimeout,
        debug: this.config.debug,
        signal,
        onLeavePage: async () => {
          snapshots.push(await this.capture(session));
        },
      });

      let driven: DriverResult;
      try {
        driven = await driver.run();
      } catch (error) {
        if (signal?.aborted) throw error;
        console.error(`[WARN] Interaction driver stopped early: ${errorMessage(error)}`);
        driven = driver.result();
        driven.errors.push(toScrapeError('interact', error));
      }

      signal?.throwIfAborted();
      const document = await this.capture(session);
      const last = snapshots[snapshots.length - 1];
      if (last && last.url === document.url) {
        snapshots[snapshots.length - 1] = document;
      } else {
        snapshots.push(document);
      }

      if (this.config.debug) {
        await this.saveDebugHtml(document);
      }

      return { document, snapshots, ...driven };
    } finally {
      await this.closeSession(session);
    }
  }

  private async openSession(): Promise<BrowsingSession> {
    try {
      return await this.sessions.open();
    } catch (error) {
      if (error instanceof RenderError) throw error;
      throw new RenderError(ErrorCode.BROWSER_LAUNCH_FAILED, `Failed to open browsing session: ${errorMessage(error)}`);
    }
  }

  /**
   * Navigation must succeed; the idle wait and settle delay that follow are best-effort.
   */
  private async load(session: BrowsingSession, url: string, signal?: AbortSignal): Promise<void> {
    try {
      console.error(`[INFO] Rendering ${url}`);
      await session.navigate(url, 'domcontentloaded', this.config.pageLoadTimeout);
    } catch (error) {
      if (signal?.aborted) throw error;
      throw new RenderError(ErrorCode.NAVIGATION_FAILED, `Failed to load ${url}: ${errorMessage(error)}`, { url });
    }
    signal?.throwIfAborted();

    try {
      await session.waitForIdle(this.config.pageLoadTimeout);
    } catch (error) {
      if (signal?.aborted) throw error;
      this.debug(`Network idle not reached within ${this.config.pageLoadTimeout}ms: ${errorMessage(error)}`);
    }
    signal?.throwIfAborted();

    await session.wait(this.config.initialSettleMs);
    signal?.throwIfAborted();
  }

  private async capture(session: BrowsingSession): Promise<PageDocument> {
    try {
      const html = await session.currentHtml();
      return createPageDocument(session.currentUrl(), html, 'rendered');
    } catch (error) {
      if (error instanceof PageSiftError) throw error;
      throw new RenderError(ErrorCode.NAVIGATION_FAILED, `Failed to capture rendered HTML: ${errorMessage(error)}`);
    }
  }

  private async closeSession(session: BrowsingSession): Promise<void> {
    try {
      await session.close();
    } catch (error) {
      console.error(`[WARN] Failed to close browsing session: ${errorMessage(error)}`);
    }
  }

  private async saveDebugHtml(document: PageDocument): Promise<void> {
    const debugDir = join(process.cwd(), 'debug');
    const host = safeHost(document.url);
    const debugHtmlPath = join(debugDir, `debug-${host}-${Date.now()}.html`);

    try {
      await fs.mkdir(debugDir, { recursive: true });
      await fs.writeFile(debugHtmlPath, document.html);
      console.error(`[DEBUG] Rendered HTML saved to ${debugHtmlPath}`);
    } catch (error) {
      console.error(`[WARN] Failed to save debug HTML: ${errorMessage(error)}`);
    }
  }

  private debug(message: string): void {
    if (this.config.debug) {
      console.error(`[DEBUG] ${message}`);
    }
  }
}

function safeHost(url: string): string {
  try {
    return new URL(url).hostname.replace(/[^a-z0-9.-]/gi, '_') || 'page';
  } catch {
    return 'page';
  }
}
