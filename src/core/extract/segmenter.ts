// src/core/extract/segmenter.ts
import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import type { PageDocument } from '../types/index.js';

export const LANDMARK_TAGS = ['header', 'nav', 'main', 'section', 'article', 'footer'] as const;
export const LANDMARK_ROLES = ['banner', 'navigation', 'main', 'region', 'contentinfo'] as const;

export const LANDMARK_SELECTOR = [
  ...LANDMARK_TAGS,
  ...LANDMARK_ROLES.map(role => `[role="${role}"]`),
].join(', ');

const MAIN_FLOW_TAGS: ReadonlySet<string> = new Set(['main', 'section', 'article']);
const MAIN_FLOW_ROLES: ReadonlySet<string> = new Set(['main', 'region']);

/**
 * One landmark region of a document, before it is typed or labeled.
 */
export interface SectionBoundary {
  index: number;
  element: Element;
  tagName: string;
  role?: string;
  inMainFlow: boolean;
  sourceUrl: string;
  $: CheerioAPI;
}

/**
 * Every landmark becomes a boundary, in document order. Nested landmarks are kept as
 * separate boundaries, so their content may overlap. Without landmarks the whole body
 * is one boundary.
 */
export function segmentDocument(doc: PageDocument): SectionBoundary[] {
  const { $ } = doc;
  const landmarks = $<Element, string>(LANDMARK_SELECTOR).toArray();

  if (landmarks.length === 0) {
    const body = $('body').get(0);
    return body ? [toBoundary($, body, 0, doc.url)] : [];
  }

  return landmarks.map((element, index) => toBoundary($, element, index, doc.url));
}

function toBoundary($: CheerioAPI, element: Element, index: number, sourceUrl: string): SectionBoundary {
  const tagName = element.name.toLowerCase();
  const role = $(element).attr('role')?.trim().toLowerCase() || undefined;

  return {
    index,
    element,
    tagName,
    role,
    inMainFlow: isInMainFlow($, element, tagName, role),
    sourceUrl,
    $,
  };
}

function isInMainFlow($: CheerioAPI, element: Element, tagName: string, role?: string): boolean {
  if (MAIN_FLOW_TAGS.has(tagName) || (role !== undefined && MAIN_FLOW_ROLES.has(role))) {
    return true;
  }
  return $(element).parents('main, [role="main"]').length > 0;
}
