// src/core/extract/__tests__/classifier.test.ts
import { describe, it, expect } from '@jest/globals';
import { classifyBoundary, leadingWords } from '../classifier.js';
import { createPageDocument } from '../document.js';
import { CLASSIFICATION_RULES, matchRule } from '../rules.js';
import { segmentDocument } from '../segmenter.js';

function boundaries(html: string) {
  return segmentDocument(createPageDocument('https://example.com/', html, 'static'));
}

describe('classifyBoundary', () => {
  it('types and labels a typical landing page', () => {
    const result = boundaries(`<html><body>
      <header><a href="/">Logo</a></header>
      <nav aria-label="Primary"><a href="/a">A</a></nav>
      <main>
        <section class="hero-banner"><h1>Welcome</h1></section>
        <section id="pricing"><h2>Plans</h2></section>
        <div role="region" aria-label="Reviews"><p>Great product overall</p></div>
      </main>
      <footer><p>Copyright notice here</p></footer>
    </body></html>`).map(boundary => classifyBoundary(boundary));

    expect(result).toEqual([
      { type: 'nav', label: 'Header Content' },
      { type: 'nav', label: 'Primary' },
      { type: 'section', label: 'Welcome' },
      { type: 'hero', label: 'Welcome' },
      { type: 'pricing', label: 'Plans' },
      { type: 'section', label: 'Reviews' },
      { type: 'footer', label: 'Copyright notice here' },
    ]);
  });

  it('lets landmark semantics win over class keywords', () => {
    const [footer] = boundaries('<html><body><footer class="pricing-links">x</footer></body></html>');

    expect(classifyBoundary(footer).type).toBe('footer');
  });

  it('uses the first keyword in table order', () => {
    const [section] = boundaries('<html><body><section class="faq-list">x</section></body></html>');

    expect(matchRule(section)?.name).toBe('keyword:faq');
    expect(classifyBoundary(section).type).toBe('faq');
  });

  it('falls back to unknown outside the main flow', () => {
    const [body] = boundaries('<html><body><div><p>Just some plain text here</p></div></body></html>');

    expect(classifyBoundary(body)).toEqual({ type: 'unknown', label: 'Just some plain text here' });
  });

  it('skips empty headings and labels from the first non-empty one', () => {
    const [section] = boundaries('<html><body><section><h2>  </h2><h3>Second</h3></section></body></html>');

    expect(classifyBoundary(section).label).toBe('Second');
  });

  it('shortens long text labels to seven words', () => {
    const [section] = boundaries(
      '<html><body><section><p>one two three four five six seven eight nine</p></section></body></html>'
    );

    expect(classifyBoundary(section).label).toBe('one two three four five six seven...');
  });

  it('marks a text label of exactly seven words as shortened', () => {
    const [section] = boundaries(
      '<html><body><section><p>alpha beta gamma delta epsilon zeta etaword</p></section></body></html>'
    );

    expect(classifyBoundary(section).label).toBe('alpha beta gamma delta epsilon zeta etaword...');
  });

  it('names the tag when nothing else is available', () => {
    const [body] = boundaries('<html><body><div><span>tiny</span></div></body></html>');

    expect(classifyBoundary(body).label).toBe('Body Content');
  });

  it('accepts a custom rule table', () => {
    const [section] = boundaries('<html><body><section>x</section></body></html>');

    expect(classifyBoundary(section, [{ name: 'all', type: 'grid', matches: () => true }]).type).toBe('grid');
    expect(classifyBoundary(section, []).type).toBe('unknown');
  });

  it('checks landmark rules before keyword and flow rules', () => {
    expect(CLASSIFICATION_RULES.map(rule => rule.name)).toEqual([
      'banner',
      'contentinfo',
      'navigation',
      'keyword:hero',
      'keyword:pricing',
      'keyword:faq',
      'keyword:grid',
      'keyword:list',
      'main-flow',
    ]);
  });
});

describe('leadingWords', () => {
  it('adds the marker once the word limit is reached', () => {
    expect(leadingWords('a b c d e f', 7)).toBe('a b c d e f');
    expect(leadingWords('a b c d e f g', 7)).toBe('a b c d e f g...');
    expect(leadingWords('a b c d e f g h', 7)).toBe('a b c d e f g...');
  });
});
