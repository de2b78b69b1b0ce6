// src/core/extract/classifier.ts
import { LABEL_WORD_COUNT, MIN_TEXT_FRAGMENT_LENGTH, TRUNCATION_MARKER } from '../config/constants.js';
import type { SectionType } from '../types/index.js';
import { CLASSIFICATION_RULES, FALLBACK_SECTION_TYPE, matchRule, type ClassificationRule } from './rules.js';
import type { SectionBoundary } from './segmenter.js';
import { collectTextFragments, normalizeWhitespace, visibleText } from './text.js';

export interface Classification {
  type: SectionType;
  label: string;
}

export function classifyBoundary(
  boundary: SectionBoundary,
  rules: readonly ClassificationRule[] = CLASSIFICATION_RULES
): Classification {
  return {
    type: matchRule(boundary, rules)?.type ?? FALLBACK_SECTION_TYPE,
    label: labelBoundary(boundary),
  };
}

/**
 * Heading text, then aria-label, then the opening words of the section text,
 * then a name derived from the tag. Never returns an empty string.
 */
export function labelBoundary(boundary: SectionBoundary): string {
  const { $, element } = boundary;

  const heading = $(element)
    .find('h1, h2, h3, h4, h5, h6')
    .toArray()
    .map(node => visibleText(node))
    .find(text => text.length > 0);
  if (heading) {
    return heading;
  }

  const ariaLabel = normalizeWhitespace($(element).attr('aria-label') ?? '');
  if (ariaLabel) {
    return ariaLabel;
  }

  const text = collectTextFragments(element)
    .filter(fragment => fragment.length >= MIN_TEXT_FRAGMENT_LENGTH)
    .join(' ');
  if (text) {
    return leadingWords(text, LABEL_WORD_COUNT);
  }

  return `${capitalize(boundary.tagName || 'section')} Content`;
}

export function leadingWords(text: string, count: number): string {
  const words = text.split(' ').filter(Boolean);
  const label = words.slice(0, count).join(' ');
  return words.length >= count ? `${label}${TRUNCATION_MARKER}` : label;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
