// src/core/interact/driver.ts
import { InteractionError, errorMessage, toScrapeError } from '../errors.js';
import { resolveUrl } from '../extract/metadata.js';
import type { BrowsingSession, ControlHandle } from '../render/types.js';
import type {
  BudgetCategory,
  BudgetCounters,
  InteractionEvent,
  InteractionKind,
  ScrapeError,
} from '../types/index.js';
import { InteractionBudget } from './budget.js';
import {
  CONSENT_CONTROLS,
  LOAD_MORE_CONTROLS,
  NEXT_PAGE_CONTROLS,
  OVERLAY_CLOSE_CONTROLS,
  TAB_CONTROLS,
  type ControlRule,
} from './selectors.js';

export type DriverPhase = 'dismiss' | 'tabs' | 'loadMore' | 'scroll' | 'paginate' | 'done';

export const PHASE_ORDER: readonly DriverPhase[] = ['dismiss', 'tabs', 'loadMore', 'scroll', 'paginate', 'done'];

export function nextPhase(phase: DriverPhase): DriverPhase {
  const index = PHASE_ORDER.indexOf(phase);
  return PHASE_ORDER[Math.min(index + 1, PHASE_ORDER.length - 1)];
}

export function heightChanged(before: number, after: number): boolean {
  return after !== before;
}

export function isUnclicked(candidate: ControlHandle, clicked: ReadonlySet<string>): boolean {
  return !clicked.has(candidate.key);
}

/** `target` is the resolved href, or null for a control that can only be clicked */
export function hasNextLink(target: string | null, visited: ReadonlySet<string>): boolean {
  return target === null || !visited.has(target);
}

export interface DriverOptions {
  ceilings: BudgetCounters;
  interactionSettleMs: number;
  idleTimeout: number;
  initialSettleMs: number;
  pageLoadTimeout: number;
  clickTimeout: number;
  debug?: boolean;
  signal?: AbortSignal;
  /** Runs right before the session leaves the current page for the next one */
  onLeavePage?: () => Promise<void>;
}

export interface DriverResult {
  interactions: InteractionEvent[];
  budget: BudgetCounters;
  errors: ScrapeError[];
}

type ClickPhaseConfig = {
  kind: Extract<InteractionKind, 'tab' | 'loadMore'>;
  category: Extract<BudgetCategory, 'tabsClicked' | 'loadMoreClicks'>;
  rules: readonly ControlRule[];
};

const NON_NAVIGABLE_HREF = /^(#|javascript:)/i;

/**
 * Drives one render session through dismiss → tabs → load more → scroll → paginate.
 * Every phase runs to its own stop condition; counters never pass their ceilings.
 */
export class InteractionDriver {
  readonly budget: InteractionBudget;
  private phase: DriverPhase = 'dismiss';
  private events: InteractionEvent[] = [];
  private errors: ScrapeError[] = [];
  private visitedUrls = new Set<string>();

  constructor(
    private session: BrowsingSession,
    private options: DriverOptions
  ) {
    this.budget = new InteractionBudget(options.ceilings);
  }

  async run(): Promise<DriverResult> {
    this.visitedUrls.add(this.session.currentUrl());

    while (this.phase !== 'done') {
      this.options.signal?.throwIfAborted();
      this.debug(`Entering phase: ${this.phase}`);
      await this.runPhase(this.phase);
      this.phase = nextPhase(this.phase);
    }

    return this.result();
  }

  result(): DriverResult {
    return {
      interactions: [...this.events],
      budget: this.budget.snapshot(),
      errors: [...this.errors],
    };
  }

  private async runPhase(phase: DriverPhase): Promise<void> {
    switch (phase) {
      case 'dismiss':
        return this.dismissOverlays();
      case 'tabs':
        return this.revealTabs();
      case 'loadMore':
        return this.revealLoadMore();
      case 'scroll':
        return this.probeInfiniteScroll();
      case 'paginate':
        return this.walkPagination();
      case 'done':
        return;
    }
  }

  /**
   * Clicks the first consent control and the first overlay close control found.
   * Failures here are cosmetic and never reported as errors.
   */
  async dismissOverlays(): Promise<void> {
    for (const rules of [CONSENT_CONTROLS, OVERLAY_CLOSE_CONTROLS]) {
      const control = await this.findControl(rules, () => true);
      if (!control) continue;

      try {
        await this.session.click(control, this.options.clickTimeout);
        this.record('dismiss', control.description);
        await this.settle();
      } catch (error) {
        this.rethrowIfAborted(error);
        this.debug(`Dismiss failed for ${control.description}: ${errorMessage(error)}`);
      }
    }
  }

  async revealTabs(): Promise<void> {
    await this.clickThrough({ kind: 'tab', category: 'tabsClicked', rules: TAB_CONTROLS });
  }

  async revealLoadMore(): Promise<void> {
    await this.clickThrough({ kind: 'loadMore', category: 'loadMoreClicks', rules: LOAD_MORE_CONTROLS });
  }

  /**
   * Scrolls to the bottom until the document stops growing. A scroll that leaves the
   * height unchanged ends the phase and is not counted.
   */
  async probeInfiniteScroll(): Promise<void> {
    while (this.budget.canSpend('scrolls')) {
      let before: number;
      let after: number;

      try {
        before = await this.session.documentHeight();
        await this.session.scrollToBottom();
        await this.settle();
        after = await this.session.documentHeight();
      } catch (error) {
        this.rethrowIfAborted(error);
        this.fail(`Scroll failed: ${errorMessage(error)}`);
        return;
      }

      if (!heightChanged(before, after)) {
        this.debug(`Document height unchanged at ${after}, stopping scroll`);
        return;
      }

      this.budget.spend('scrolls');
      this.record('scroll', `document height ${before} -> ${after}`);
    }
  }

  /**
   * Follows "next page" controls. A control with an href is navigated to directly;
   * one without is clicked. Landing on a page already seen ends the walk.
   */
  async walkPagination(): Promise<void> {
    this.visitedUrls.add(this.session.currentUrl());

    while (this.budget.canSpend('paginationDepth')) {
      const control = await this.findControl(NEXT_PAGE_CONTROLS, candidate =>
        hasNextLink(this.navigableHref(candidate), this.visitedUrls)
      );
      if (!control) return;

      const target = this.navigableHref(control);

      try {
        await this.options.onLeavePage?.();
        if (target) {
          await this.session.navigate(target, 'domcontentloaded', this.options.pageLoadTimeout);
        } else {
          await this.session.click(control, this.options.clickTimeout);
        }
        await this.waitForPageStability();
      } catch (error) {
        this.rethrowIfAborted(error);
        this.fail(`Failed to follow ${control.description}: ${errorMessage(error)}`);
        return;
      }

      const resultingUrl = this.session.currentUrl();
      if (this.visitedUrls.has(resultingUrl)) {
        this.debug(`Pagination returned to ${resultingUrl}, stopping`);
        return;
      }

      this.visitedUrls.add(resultingUrl);
      this.budget.spend('paginationDepth');
      this.record('paginate', control.description, resultingUrl);
    }
  }

  private async clickThrough({ kind, category, rules }: ClickPhaseConfig): Promise<void> {
    const attempted = new Set<string>();
    let failures = 0;

    while (this.budget.canSpend(category)) {
      const control = await this.findControl(rules, candidate => isUnclicked(candidate, attempted));
      if (!control) return;

      attempted.add(control.key);

      try {
        await this.session.click(control, this.options.clickTimeout);
      } catch (error) {
        this.rethrowIfAborted(error);
        this.fail(`Failed to click ${kind} control ${control.description}: ${errorMessage(error)}`);
        failures += 1;
        if (failures >= this.budget.ceiling(category)) return;
        continue;
      }

      this.budget.spend(category);
      this.record(kind, control.description);

      try {
        await this.settle();
      } catch (error) {
        this.rethrowIfAborted(error);
        this.fail(`Page did not settle after ${kind} click on ${control.description}: ${errorMessage(error)}`);
        return;
      }
    }
  }

  private async findControl(
    rules: readonly ControlRule[],
    accept: (control: ControlHandle) => boolean
  ): Promise<ControlHandle | undefined> {
    for (const rule of rules) {
      this.options.signal?.throwIfAborted();

      let controls: ControlHandle[];
      try {
        controls = await this.session.queryControls(rule.selector, { includeHidden: rule.includeHidden });
      } catch (error) {
        this.rethrowIfAborted(error);
        this.debug(`Query failed for ${rule.selector}: ${errorMessage(error)}`);
        continue;
      }

      const match = controls.find(accept);
      if (match) return match;
    }

    return undefined;
  }

  private navigableHref(control: ControlHandle): string | null {
    const href = control.href?.trim();
    if (!href || NON_NAVIGABLE_HREF.test(href)) {
      return null;
    }
    return resolveUrl(href, this.session.currentUrl());
  }

  /** Short settle after an interaction; the idle wait is expected to time out at times */
  private async settle(): Promise<void> {
    await this.session.wait(this.options.interactionSettleMs);
    this.options.signal?.throwIfAborted();
    await this.waitForIdle(this.options.idleTimeout);
  }

  private async waitForPageStability(): Promise<void> {
    await this.waitForIdle(this.options.pageLoadTimeout);
    await this.session.wait(this.options.initialSettleMs);
    this.options.signal?.throwIfAborted();
  }

  private async waitForIdle(timeoutMs: number): Promise<void> {
    try {
      await this.session.waitForIdle(timeoutMs);
    } catch (error) {
      this.rethrowIfAborted(error);
      this.debug(`Network idle not reached within ${timeoutMs}ms, continuing`);
    }
    this.options.signal?.throwIfAborted();
  }

  private record(kind: InteractionKind, target: string, resultingUrl?: string): void {
    const event: InteractionEvent = { kind, target, timestamp: new Date().toISOString() };
    if (resultingUrl !== undefined) {
      event.resultingUrl = resultingUrl;
    }
    this.events.push(event);
    console.error(`[INFO] ${kind}: ${target}${resultingUrl ? ` -> ${resultingUrl}` : ''}`);
  }

  private fail(message: string): void {
    const error = new InteractionError(message, { phase: this.phase });
    this.errors.push(toScrapeError('interact', error));
    console.error(`[WARN] ${error.message}`);
  }

  private rethrowIfAborted(error: unknown): void {
    if (this.options.signal?.aborted) {
      throw error;
    }
  }

  private debug(message: string): void {
    if (this.options.debug) {
      console.error(`[DEBUG] ${message}`);
    }
  }
}
