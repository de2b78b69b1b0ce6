// src/core/extract/sanitizer.ts
import {
  MAX_RAW_HTML_LENGTH,
  MAX_TEXT_FRAGMENTS,
  MIN_TEXT_FRAGMENT_LENGTH,
  TRUNCATION_MARKER,
} from '../config/constants.js';
import type { SectionBoundary } from './segmenter.js';
import { collectTextFragments, NON_CONTENT_SELECTOR } from './text.js';

export interface SanitizerOptions {
  maxHtmlLength?: number;
  minFragmentLength?: number;
  maxFragments?: number;
}

export interface SanitizedSection {
  rawHtml: string;
  text: string;
  truncated: boolean;
}

export function sanitizeBoundary(boundary: SectionBoundary, options: SanitizerOptions = {}): SanitizedSection {
  const minFragmentLength = options.minFragmentLength ?? MIN_TEXT_FRAGMENT_LENGTH;
  const maxFragments = options.maxFragments ?? MAX_TEXT_FRAGMENTS;

  const { $, element } = boundary;
  const clone = $(element).clone();
  clone.find(NON_CONTENT_SELECTOR).remove();

  const { rawHtml, truncated } = capHtml($.html(clone), options.maxHtmlLength);

  const text = collectTextFragments(element)
    .filter(fragment => fragment.length >= minFragmentLength)
    .slice(0, maxFragments)
    .join(' ');

  return { rawHtml, text, truncated };
}

/**
 * Caps markup at `maxLength` characters, marker included.
 */
export function capHtml(
  html: string,
  maxLength: number = MAX_RAW_HTML_LENGTH
): { rawHtml: string; truncated: boolean } {
  if (html.length <= maxLength) {
    return { rawHtml: html, truncated: false };
  }

  const keep = Math.max(0, maxLength - TRUNCATION_MARKER.length);
  return { rawHtml: html.slice(0, keep) + TRUNCATION_MARKER, truncated: true };
}
