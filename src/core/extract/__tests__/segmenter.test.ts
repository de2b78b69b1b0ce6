// src/core/extract/__tests__/segmenter.test.ts
import { describe, it, expect } from '@jest/globals';
import { createPageDocument } from '../document.js';
import { segmentDocument } from '../segmenter.js';

const URL = 'https://example.com/';

function segment(html: string) {
  return segmentDocument(createPageDocument(URL, html, 'static'));
}

describe('segmentDocument', () => {
  it('returns every landmark in document order', () => {
    const boundaries = segment(`<html><body>
      <header>Top</header>
      <nav>Links</nav>
      <main><section>One</section><article>Two</article></main>
      <div role="contentinfo">Bottom</div>
    </body></html>`);

    expect(boundaries.map(b => b.tagName)).toEqual(['header', 'nav', 'main', 'section', 'article', 'div']);
    expect(boundaries.map(b => b.index)).toEqual([0, 1, 2, 3, 4, 5]);
    expect(boundaries[5].role).toBe('contentinfo');
    expect(boundaries.every(b => b.sourceUrl === URL)).toBe(true);
  });

  it('keeps nested landmarks as separate, overlapping boundaries', () => {
    const boundaries = segment('<html><body><main><section><p>Inner</p></section></main></body></html>');

    expect(boundaries).toHaveLength(2);
    expect(boundaries[0].element.name).toBe('main');
    expect(boundaries[1].element.parent).toBe(boundaries[0].element);
  });

  it('marks boundaries inside the main content flow', () => {
    const boundaries = segment(`<html><body>
      <header>Top</header>
      <div role="main"><nav>In-page</nav></div>
      <footer>Bottom</footer>
    </body></html>`);

    expect(boundaries.map(b => [b.tagName, b.inMainFlow])).toEqual([
      ['header', false],
      ['div', true],
      ['nav', true],
      ['footer', false],
    ]);
  });

  it('falls back to the body when there are no landmarks', () => {
    const boundaries = segment('<html><body><div><p>Plain page</p></div></body></html>');

    expect(boundaries).toHaveLength(1);
    expect(boundaries[0].tagName).toBe('body');
    expect(boundaries[0].inMainFlow).toBe(false);
  });

  it('treats elements with a landmark role as boundaries', () => {
    const boundaries = segment('<html><body><div role="navigation">Menu</div></body></html>');

    expect(boundaries).toHaveLength(1);
    expect(boundaries[0].tagName).toBe('div');
    expect(boundaries[0].role).toBe('navigation');
  });
});
