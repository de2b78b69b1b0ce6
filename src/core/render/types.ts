// src/core/render/types.ts
import type {
  BudgetCounters,
  InteractionEvent,
  PageDocument,
  ScrapeError,
} from '../types/index.js';

export type WaitUntil = 'load' | 'domcontentloaded' | 'networkidle';

/**
 * A clickable element found in the live page. `key` identifies the element by tag,
 * position in the DOM and text, so a control re-rendered elsewhere gets a new key.
 */
export interface ControlHandle {
  key: string;
  description: string;
  href?: string;
}

export interface BrowsingSession {
  navigate(url: string, waitUntil: WaitUntil, timeoutMs: number): Promise<void>;
  currentUrl(): string;
  /** Matches for a selector in document order, visible ones only unless includeHidden is set */
  queryControls(selector: string, options?: { includeHidden?: boolean }): Promise<ControlHandle[]>;
  click(control: ControlHandle, timeoutMs: number): Promise<void>;
  scrollToBottom(): Promise<void>;
  documentHeight(): Promise<number>;
  /** Resolves when the network is idle; rejects on timeout */
  waitForIdle(timeoutMs: number): Promise<void>;
  wait(ms: number): Promise<void>;
  currentHtml(): Promise<string>;
  close(): Promise<void>;
}

export interface SessionFactory {
  open(): Promise<BrowsingSession>;
}

export interface RenderOutcome {
  /** The last page the session ended on */
  document: PageDocument;
  /** Every page visited, landing page first */
  snapshots: PageDocument[];
  interactions: InteractionEvent[];
  budget: BudgetCounters;
  errors: ScrapeError[];
}

export interface PageRenderer {
  render(url: string, signal?: AbortSignal): Promise<RenderOutcome>;
}
