import { describe, it, expect } from '@jest/globals';
import { InvalidRequestError, healthCheck, scrape } from '../index.js';

describe('public API', () => {
  it('reports liveness', () => {
    expect(healthCheck()).toEqual({ status: 'ok' });
  });

  it('rejects an invalid URL without touching the network', async () => {
    await expect(scrape('javascript:alert(1)')).rejects.toBeInstanceOf(InvalidRequestError);
    await expect(scrape('   ')).rejects.toThrow('Invalid URL:');
  });

  it('rejects a bad configuration before scraping', async () => {
    await expect(scrape('https://example.com/', { config: { ceilings: { scrolls: -1 } } })).rejects.toThrow(
      'Invalid ceiling for scrolls: -1. Expected a non-negative integer'
    );
  });
});
