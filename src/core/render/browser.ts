// src/core/render/browser.ts
import { chromium, type Browser, type BrowserContext } from 'playwright';
import { DEFAULT_USER_AGENT, DEFAULT_VIEWPORT } from '../config/constants.js';
import type { BrowserChannel } from '../config/scrape-config.js';
import { ErrorCode, RenderError, errorMessage } from '../errors.js';
import { PlaywrightSession } from './session.js';
import type { BrowsingSession, SessionFactory } from './types.js';

export interface BrowserOptions {
  channel?: BrowserChannel;
  headless?: boolean;
  userAgent?: string;
}

const BROWSER_NAMES: Record<BrowserChannel, string> = {
  chromium: 'Chromium',
  chrome: 'Google Chrome',
  msedge: 'Microsoft Edge',
};

/**
 * Owns one browser process. Every session gets its own BrowserContext, so cookies,
 * storage and pages never leak between concurrent scrapes.
 */
export class BrowserManager implements SessionFactory {
  private browser?: Browser;
  private launching?: Promise<Browser>;

  constructor(private options: BrowserOptions = {}) {}

  async launch(): Promise<Browser> {
    if (this.browser) {
      return this.browser;
    }

    if (!this.launching) {
      this.launching = this.launchBrowser().finally(() => {
        this.launching = undefined;
      });
    }

    return this.launching;
  }

  async open(): Promise<BrowsingSession> {
    const browser = await this.launch();

    let context: BrowserContext;
    try {
      context = await browser.newContext({
        userAgent: this.options.userAgent ?? DEFAULT_USER_AGENT,
        viewport: { ...DEFAULT_VIEWPORT },
      });
    } catch (error) {
      throw new RenderError(
        ErrorCode.BROWSER_LAUNCH_FAILED,
        `Failed to open browser context: ${errorMessage(error)}`
      );
    }

    try {
      const page = await context.newPage();
      return new PlaywrightSession(context, page);
    } catch (error) {
      await context.close();
      throw new RenderError(ErrorCode.BROWSER_LAUNCH_FAILED, `Failed to open page: ${errorMessage(error)}`);
    }
  }

  async close(): Promise<void> {
    if (this.browser) {
      const browser = this.browser;
      this.browser = undefined;
      await browser.close();
    }
  }

  isLaunched(): boolean {
    return this.browser !== undefined;
  }

  private async launchBrowser(): Promise<Browser> {
    const channel = this.options.channel ?? 'chromium';
    const headless = this.options.headless ?? true;
    const name = BROWSER_NAMES[channel];

    try {
      console.error(`[INFO] Launching ${name} (headless: ${headless})`);
      this.browser = await chromium.launch({
        channel: channel === 'chromium' ? undefined : channel,
        headless,
        args: [
          '--disable-blink-features=AutomationControlled',
          '--no-first-run',
          '--no-default-browser-check',
        ],
      });
      return this.browser;
    } catch (error) {
      throw new RenderError(
        ErrorCode.BROWSER_LAUNCH_FAILED,
        `Failed to launch ${name}: ${errorMessage(error)}`,
        { channel }
      );
    }
  }
}
