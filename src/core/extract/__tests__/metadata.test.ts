// src/core/extract/__tests__/metadata.test.ts
import { describe, it, expect } from '@jest/globals';
import { createPageDocument } from '../document.js';
import { emptyMetadata, extractMetadata, resolveUrl } from '../metadata.js';

describe('extractMetadata', () => {
  it('reads title, description, language and an absolute canonical URL', () => {
    const doc = createPageDocument(
      'https://example.com/a/b',
      `<html lang="fr"><head>
        <title> Shop   Home </title>
        <meta name="description" content="Best shop">
        <link rel="canonical" href="/home">
      </head><body></body></html>`,
      'static'
    );

    expect(extractMetadata(doc)).toEqual({
      title: 'Shop Home',
      description: 'Best shop',
      language: 'fr',
      canonical: 'https://example.com/home',
    });
  });

  it('falls back to Open Graph tags and the default language', () => {
    const doc = createPageDocument(
      'https://example.com/',
      `<html><head>
        <meta property="og:title" content="OG Title">
        <meta property="og:description" content="OG description">
      </head><body></body></html>`,
      'rendered'
    );

    expect(extractMetadata(doc)).toEqual({
      title: 'OG Title',
      description: 'OG description',
      language: 'en',
      canonical: null,
    });
  });

  it('matches the empty metadata for a blank page', () => {
    const doc = createPageDocument('https://example.com/', '', 'static');

    expect(extractMetadata(doc)).toEqual(emptyMetadata());
  });
});

describe('resolveUrl', () => {
  it('resolves relative references against the base', () => {
    expect(resolveUrl('../c', 'https://example.com/a/b/')).toBe('https://example.com/a/c');
  });

  it('returns null for unparseable input', () => {
    expect(resolveUrl('http://', 'not a base')).toBeNull();
  });
});
