// src/core/extract/rules.ts
import type { SectionType } from '../types/index.js';
import type { SectionBoundary } from './segmenter.js';

export interface ClassificationRule {
  name: string;
  type: SectionType;
  matches(boundary: SectionBoundary): boolean;
}

export const SECTION_KEYWORDS = ['hero', 'pricing', 'faq', 'grid', 'list'] as const satisfies readonly SectionType[];

function hasTagOrRole(boundary: SectionBoundary, tag: string, role: string): boolean {
  return boundary.tagName === tag || boundary.role === role;
}

function classAndId(boundary: SectionBoundary): string {
  const element = boundary.$(boundary.element);
  return `${element.attr('class') ?? ''} ${element.attr('id') ?? ''}`.toLowerCase();
}

function keywordRule(keyword: (typeof SECTION_KEYWORDS)[number]): ClassificationRule {
  return {
    name: `keyword:${keyword}`,
    type: keyword,
    matches: boundary => classAndId(boundary).includes(keyword),
  };
}

/**
 * Evaluated top to bottom, first match wins. Landmark semantics come first, then
 * class/id keywords, then position in the main content flow.
 */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  { name: 'banner', type: 'nav', matches: b => hasTagOrRole(b, 'header', 'banner') },
  { name: 'contentinfo', type: 'footer', matches: b => hasTagOrRole(b, 'footer', 'contentinfo') },
  { name: 'navigation', type: 'nav', matches: b => hasTagOrRole(b, 'nav', 'navigation') },
  ...SECTION_KEYWORDS.map(keywordRule),
  { name: 'main-flow', type: 'section', matches: b => b.inMainFlow },
];

export const FALLBACK_SECTION_TYPE: SectionType = 'unknown';

export function matchRule(
  boundary: SectionBoundary,
  rules: readonly ClassificationRule[] = CLASSIFICATION_RULES
): ClassificationRule | undefined {
  return rules.find(rule => rule.matches(boundary));
}
