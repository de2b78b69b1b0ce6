// src/core/config/scrape-config.ts
import {
  DEFAULT_CLICK_TIMEOUT,
  DEFAULT_FETCH_TIMEOUT,
  DEFAULT_IDLE_TIMEOUT,
  DEFAULT_INITIAL_SETTLE_MS,
  DEFAULT_INTERACTION_SETTLE_MS,
  DEFAULT_MAX_LOAD_MORE,
  DEFAULT_MAX_PAGES,
  DEFAULT_MAX_SCROLLS,
  DEFAULT_MAX_TABS,
  DEFAULT_PAGE_LOAD_TIMEOUT,
  DEFAULT_USER_AGENT,
} from './constants.js';
import type { BudgetCounters } from '../types/index.js';

/**
 * - auto: render only when the static pass looks insufficient
 * - always: skip the sufficiency check and always render
 * - never: static pass only
 */
export type RenderMode = 'auto' | 'always' | 'never';

export type BrowserChannel = 'chromium' | 'chrome' | 'msedge';

export interface ScrapeConfig {
  fetchTimeout: number;
  pageLoadTimeout: number;
  initialSettleMs: number;
  interactionSettleMs: number;
  idleTimeout: number;
  clickTimeout: number;
  /** Upper bound for each interaction counter */
  ceilings: BudgetCounters;
  renderMode: RenderMode;
  browser: BrowserChannel;
  headless: boolean;
  userAgent: string;
  debug: boolean;
}

export type ScrapeConfigOverrides = Partial<Omit<ScrapeConfig, 'ceilings'>> & {
  ceilings?: Partial<BudgetCounters>;
};

export const DEFAULT_SCRAPE_CONFIG: ScrapeConfig = {
  fetchTimeout: DEFAULT_FETCH_TIMEOUT,
  pageLoadTimeout: DEFAULT_PAGE_LOAD_TIMEOUT,
  initialSettleMs: DEFAULT_INITIAL_SETTLE_MS,
  interactionSettleMs: DEFAULT_INTERACTION_SETTLE_MS,
  idleTimeout: DEFAULT_IDLE_TIMEOUT,
  clickTimeout: DEFAULT_CLICK_TIMEOUT,
  ceilings: {
    tabsClicked: DEFAULT_MAX_TABS,
    loadMoreClicks: DEFAULT_MAX_LOAD_MORE,
    scrolls: DEFAULT_MAX_SCROLLS,
    paginationDepth: DEFAULT_MAX_PAGES,
  },
  renderMode: 'auto',
  browser: 'chromium',
  headless: true,
  userAgent: DEFAULT_USER_AGENT,
  debug: false,
};

const TIMING_KEYS = [
  'fetchTimeout',
  'pageLoadTimeout',
  'initialSettleMs',
  'interactionSettleMs',
  'idleTimeout',
  'clickTimeout',
] as const;

export function resolveConfig(overrides: ScrapeConfigOverrides = {}): ScrapeConfig {
  const config: ScrapeConfig = {
    ...DEFAULT_SCRAPE_CONFIG,
    ...overrides,
    ceilings: { ...DEFAULT_SCRAPE_CONFIG.ceilings, ...overrides.ceilings },
  };

  for (const key of TIMING_KEYS) {
    const value = config[key];
    if (!Number.isFinite(value) || value < 0) {
      throw new Error(`Invalid ${key}: ${value}. Expected a non-negative number of milliseconds`);
    }
  }

  for (const [key, value] of Object.entries(config.ceilings)) {
    if (!Number.isInteger(value) || value < 0) {
      throw new Error(`Invalid ceiling for ${key}: ${value}. Expected a non-negative integer`);
    }
  }

  return config;
}
