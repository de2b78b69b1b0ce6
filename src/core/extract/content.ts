// src/core/extract/content.ts
import type { SectionContent, SectionImage, SectionLink } from '../types/index.js';
import { resolveUrl } from './metadata.js';
import type { SectionBoundary } from './segmenter.js';
import { normalizeWhitespace, visibleText } from './text.js';

export function extractContent(boundary: SectionBoundary): SectionContent {
  const { $, element, sourceUrl } = boundary;
  const root = $(element);

  const headings = root
    .find('h1, h2, h3, h4, h5, h6')
    .toArray()
    .map(node => visibleText(node))
    .filter(Boolean);

  const links: SectionLink[] = [];
  root.find('a[href]').each((_, anchor) => {
    const href = ($(anchor).attr('href') ?? '').trim();
    if (!href || href.startsWith('#') || href.toLowerCase().startsWith('javascript:')) return;

    const absolute = resolveUrl(href, sourceUrl);
    if (!absolute) return;

    links.push({ text: visibleText(anchor) || href, href: absolute });
  });

  const images: SectionImage[] = [];
  root.find('img[src]').each((_, img) => {
    const src = ($(img).attr('src') ?? '').trim();
    if (!src || src.startsWith('data:')) return;

    const absolute = resolveUrl(src, sourceUrl);
    if (!absolute) return;

    images.push({ src: absolute, alt: normalizeWhitespace($(img).attr('alt') ?? '') });
  });

  const lists = root
    .find('ul, ol')
    .toArray()
    .map(list =>
      $(list)
        .children('li')
        .toArray()
        .map(item => visibleText(item))
        .filter(Boolean)
    )
    .filter(items => items.length > 0);

  const tables = root
    .find('table')
    .toArray()
    .map(table =>
      $(table)
        .find('tr')
        .toArray()
        .map(row =>
          $(row)
            .children('td, th')
            .toArray()
            .map(cell => visibleText(cell))
        )
        .filter(row => row.length > 0)
    )
    .filter(rows => rows.length > 0);

  return { headings, links, images, lists, tables };
}
