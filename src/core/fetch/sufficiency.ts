// src/core/fetch/sufficiency.ts
import { MIN_STATIC_TEXT_LENGTH } from '../config/constants.js';
import type { PageDocument, SufficiencyDecision } from '../types/index.js';

export interface JsIndicator {
  name: string;
  pattern: RegExp;
}

/**
 * Markers left by client-side frameworks. Matched against the lowercased body markup
 * and the attributes of the <html> element.
 */
export const JS_INDICATORS: readonly JsIndicator[] = [
  // framework root containers
  { name: 'id="root"', pattern: /\bid="root"/ },
  { name: 'id="app"', pattern: /\bid="app"/ },
  { name: 'id="__next"', pattern: /\bid="__next"/ },
  { name: 'id="__nuxt"', pattern: /\bid="__nuxt"/ },
  { name: 'id="___gatsby"', pattern: /\bid="___gatsby"/ },
  // build-tool injected attributes
  { name: 'data-reactroot', pattern: /\bdata-reactroot\b/ },
  { name: 'data-server-rendered', pattern: /\bdata-server-rendered\b/ },
  { name: 'data-v-app', pattern: /\bdata-v-app\b/ },
  // reactive-framework directives
  { name: 'ng-app', pattern: /\bng-app\b/ },
  { name: 'ng-version', pattern: /\bng-version\b/ },
  { name: 'v-cloak', pattern: /\bv-cloak\b/ },
  { name: 'x-data', pattern: /\bx-data\b/ },
];

export function findJsIndicators(doc: PageDocument): string[] {
  const { $ } = doc;
  const body = $('body');
  const rootAttributes = Object.entries($('html').attr() ?? {})
    .map(([name, value]) => (value ? `${name}="${value}"` : name))
    .join(' ');
  const markup = `${rootAttributes} ${body.length > 0 ? $.html(body) : ''}`.toLowerCase();

  return JS_INDICATORS.filter(indicator => indicator.pattern.test(markup)).map(indicator => indicator.name);
}

/**
 * Decides whether the static pass already carries the page's content.
 * Errs towards rendering: a short body or any framework marker means "insufficient".
 */
export function evaluateSufficiency(
  doc: PageDocument,
  minTextLength: number = MIN_STATIC_TEXT_LENGTH
): SufficiencyDecision {
  const indicators = findJsIndicators(doc);
  const signal = {
    textLength: doc.textLength,
    jsIndicatorsFound: indicators.length > 0,
  };

  if (doc.$('body').length === 0) {
    return { ...signal, sufficient: false, reason: 'no_body', indicators };
  }

  if (signal.textLength < minTextLength) {
    return { ...signal, sufficient: false, reason: 'too_little_text', indicators };
  }

  if (signal.jsIndicatorsFound) {
    return { ...signal, sufficient: false, reason: 'js_indicator', indicators };
  }

  return { ...signal, sufficient: true, reason: 'sufficient', indicators };
}
