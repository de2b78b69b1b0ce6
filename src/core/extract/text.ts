// src/core/extract/text.ts
import { hasChildren, isTag, isText, type AnyNode } from 'domhandler';

export const NON_CONTENT_TAGS: ReadonlySet<string> = new Set(['script', 'style', 'noscript', 'template']);
export const NON_CONTENT_SELECTOR = [...NON_CONTENT_TAGS].join(', ');

// Tags that end a run of inline text
const BLOCK_TAGS: ReadonlySet<string> = new Set([
  'address', 'article', 'aside', 'blockquote', 'br', 'dd', 'details', 'dialog', 'div', 'dl',
  'dt', 'fieldset', 'figcaption', 'figure', 'footer', 'form', 'h1', 'h2', 'h3', 'h4', 'h5',
  'h6', 'header', 'hr', 'li', 'main', 'nav', 'ol', 'option', 'p', 'pre', 'section', 'summary',
  'table', 'tbody', 'td', 'tfoot', 'th', 'thead', 'tr', 'ul',
]);

export function normalizeWhitespace(text: string): string {
  return text
    .replace(/\\[nt]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Splits the visible text under `root` into block-level fragments, in document order.
 * Script, style, noscript and template subtrees contribute nothing.
 */
export function collectTextFragments(root: AnyNode): string[] {
  const fragments: string[] = [];
  let current = '';

  const flush = (): void => {
    const text = normalizeWhitespace(current);
    if (text) {
      fragments.push(text);
    }
    current = '';
  };

  const walk = (node: AnyNode): void => {
    if (isText(node)) {
      current += node.data;
      return;
    }

    if (isTag(node)) {
      const name = node.name.toLowerCase();
      if (NON_CONTENT_TAGS.has(name)) return;

      const block = BLOCK_TAGS.has(name);
      if (block) flush();
      node.children.forEach(walk);
      if (block) flush();
      return;
    }

    if (hasChildren(node)) {
      node.children.forEach(walk);
    }
  };

  walk(root);
  flush();

  return fragments;
}

export function visibleText(root: AnyNode): string {
  return collectTextFragments(root).join(' ');
}
