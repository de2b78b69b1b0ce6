// src/core/render/session.ts
import type { BrowserContext, Locator, Page } from 'playwright';
import { InteractionError } from '../errors.js';
import type { BrowsingSession, ControlHandle, WaitUntil } from './types.js';

// Cap on candidates inspected per selector
const MAX_CONTROL_CANDIDATES = 50;

interface ElementInfo {
  tag: string;
  position: number;
  text: string;
  href: string | null;
}

/**
 * Runs inside the page, so it must not reference anything outside its own body.
 */
function describeElement(element: Element): ElementInfo {
  const resolvedHref = 'href' in element && typeof element.href === 'string' ? element.href : '';
  return {
    tag: element.tagName.toLowerCase(),
    position: Array.from(document.getElementsByTagName('*')).indexOf(element),
    text: (element.textContent || element.getAttribute('aria-label') || '')
      .replace(/\s+/g, ' ')
      .trim()
      .slice(0, 60),
    href: resolvedHref || element.getAttribute('href'),
  };
}

/**
 * One isolated browser context with a single page.
 */
export class PlaywrightSession implements BrowsingSession {
  private locators = new Map<string, Locator>();

  constructor(
    private context: BrowserContext,
    private page: Page
  ) {}

  async navigate(url: string, waitUntil: WaitUntil, timeoutMs: number): Promise<void> {
    this.locators.clear();
    await this.page.goto(url, { waitUntil, timeout: timeoutMs });
  }

  currentUrl(): string {
    return this.page.url();
  }

  async queryControls(selector: string, options: { includeHidden?: boolean } = {}): Promise<ControlHandle[]> {
    const matches = this.page.locator(selector);
    const count = Math.min(await matches.count(), MAX_CONTROL_CANDIDATES);
    const controls: ControlHandle[] = [];

    for (let i = 0; i < count; i++) {
      const item = matches.nth(i);
      if (!options.includeHidden && !(await item.isVisible())) {
        continue;
      }

      const info = await item.evaluate(describeElement);
      const key = `${info.tag}@${info.position}:${info.text}`;
      this.locators.set(key, item);
      controls.push({
        key,
        description: info.text ? `${selector} "${info.text}"` : selector,
        href: info.href ?? undefined,
      });
    }

    return controls;
  }

  async click(control: ControlHandle, timeoutMs: number): Promise<void> {
    const locator = this.locators.get(control.key);
    if (!locator) {
      throw new InteractionError(`Control is no longer available: ${control.description}`);
    }
    await locator.click({ timeout: timeoutMs });
  }

  async scrollToBottom(): Promise<void> {
    await this.page.evaluate(() => {
      window.scrollTo(0, document.body ? document.body.scrollHeight : 0);
    });
  }

  async documentHeight(): Promise<number> {
    return this.page.evaluate(() =>
      Math.max(document.body ? document.body.scrollHeight : 0, document.documentElement.scrollHeight)
    );
  }

  async waitForIdle(timeoutMs: number): Promise<void> {
    await this.page.waitForLoadState('networkidle', { timeout: timeoutMs });
  }

  async wait(ms: number): Promise<void> {
    await this.page.waitForTimeout(ms);
  }

  async currentHtml(): Promise<string> {
    return this.page.content();
  }

  async close(): Promise<void> {
    this.locators.clear();
    await this.context.close();
  }
}
