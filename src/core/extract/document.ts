// src/core/extract/document.ts
import * as cheerio from 'cheerio';
import type { PageDocument, SourceMode } from '../types/index.js';
import { visibleText } from './text.js';

export function createPageDocument(url: string, html: string, sourceMode: SourceMode): PageDocument {
  const $ = cheerio.load(html);
  const body = $('body').get(0);

  return {
    url,
    sourceMode,
    html,
    textLength: body ? visibleText(body).length : 0,
    $,
  };
}
