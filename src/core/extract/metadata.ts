// src/core/extract/metadata.ts
import { DEFAULT_LANGUAGE } from '../config/constants.js';
import type { PageDocument, PageMetadata } from '../types/index.js';
import { normalizeWhitespace } from './text.js';

export function emptyMetadata(): PageMetadata {
  return {
    title: '',
    description: '',
    language: DEFAULT_LANGUAGE,
    canonical: null,
  };
}

export function extractMetadata(doc: PageDocument): PageMetadata {
  const { $ } = doc;

  const title = pickText([
    $('title').first().text(),
    $('meta[property="og:title"]').attr('content') || '',
  ]);

  const description = pickText([
    $('meta[name="description"]').attr('content') || '',
    $('meta[property="og:description"]').attr('content') || '',
  ]);

  const language = normalizeWhitespace($('html').attr('lang') || '') || DEFAULT_LANGUAGE;

  const canonicalHref = $('link[rel="canonical"]').attr('href');
  const canonical = canonicalHref ? resolveUrl(canonicalHref, doc.url) : null;

  return { title, description, language, canonical };
}

export function resolveUrl(href: string, base: string): string | null {
  try {
    return new URL(href.trim(), base).toString();
  } catch {
    return null;
  }
}

function pickText(candidates: string[]): string {
  for (const candidate of candidates) {
    const value = normalizeWhitespace(candidate);
    if (value) return value;
  }
  return '';
}
