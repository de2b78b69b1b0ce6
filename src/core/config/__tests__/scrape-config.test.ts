// src/core/config/__tests__/scrape-config.test.ts
import { describe, it, expect } from '@jest/globals';
import { DEFAULT_SCRAPE_CONFIG, resolveConfig } from '../scrape-config.js';

describe('resolveConfig', () => {
  it('returns the defaults when nothing is overridden', () => {
    const config = resolveConfig();

    expect(config).toEqual(DEFAULT_SCRAPE_CONFIG);
    expect(config.ceilings).toEqual({ tabsClicked: 3, loadMoreClicks: 3, scrolls: 3, paginationDepth: 3 });
    expect(config.fetchTimeout).toBe(30000);
    expect(config.renderMode).toBe('auto');
  });

  it('merges partial ceilings over the defaults', () => {
    const config = resolveConfig({ ceilings: { scrolls: 5 }, renderMode: 'never' });

    expect(config.ceilings).toEqual({ tabsClicked: 3, loadMoreClicks: 3, scrolls: 5, paginationDepth: 3 });
    expect(config.renderMode).toBe('never');
  });

  it('does not mutate the shared defaults', () => {
    resolveConfig({ ceilings: { tabsClicked: 0 } });

    expect(DEFAULT_SCRAPE_CONFIG.ceilings.tabsClicked).toBe(3);
  });

  it('rejects negative timings', () => {
    expect(() => resolveConfig({ fetchTimeout: -1 })).toThrow('Invalid fetchTimeout: -1');
  });

  it('rejects fractional ceilings', () => {
    expect(() => resolveConfig({ ceilings: { paginationDepth: 1.5 } })).toThrow(
      'Invalid ceiling for paginationDepth: 1.5'
    );
  });
});
