// src/core/interact/selectors.ts

/**
 * Playwright selectors for the controls the driver looks for. Each table is tried top to
 * bottom; within one selector, matches come back in document order.
 */
export interface ControlRule {
  selector: string;
  /** Also consider elements that are not visible (e.g. <link rel="next"> in the head) */
  includeHidden?: boolean;
}

export const CONSENT_CONTROLS: readonly ControlRule[] = [
  { selector: '#onetrust-accept-btn-handler' },
  { selector: 'button:has-text("Accept all")' },
  { selector: 'button:has-text("Accept")' },
  { selector: 'button:has-text("I agree")' },
  { selector: 'button:text-is("OK")' },
  { selector: '[aria-label*="cookie" i] button' },
  { selector: '[id*="cookie" i] button' },
  { selector: '[class*="cookie" i] button' },
  { selector: '[class*="consent" i] button' },
];

export const OVERLAY_CLOSE_CONTROLS: readonly ControlRule[] = [
  { selector: '[role="dialog"] [aria-label="Close"]' },
  { selector: '[aria-label="Close"]' },
  { selector: 'button[aria-label*="close" i]' },
  { selector: '.modal-close' },
  { selector: '.close-button' },
];

export const TAB_CONTROLS: readonly ControlRule[] = [
  { selector: '[role="tab"]' },
  { selector: 'button[aria-selected]' },
  { selector: '[data-toggle="tab"]' },
  { selector: '[data-bs-toggle="tab"]' },
  { selector: '.tab-button' },
  { selector: '.tabs .tab' },
];

export const LOAD_MORE_CONTROLS: readonly ControlRule[] = [
  { selector: 'button:has-text("Load more")' },
  { selector: 'button:has-text("Show more")' },
  { selector: 'button:has-text("View more")' },
  { selector: '[role="button"]:has-text("Load more")' },
  { selector: 'a:has-text("Load more")' },
  { selector: '[aria-label*="load more" i]' },
  { selector: '[aria-label*="show more" i]' },
  { selector: '[class*="load-more" i]' },
  { selector: '[class*="show-more" i]' },
];

export const NEXT_PAGE_CONTROLS: readonly ControlRule[] = [
  { selector: 'a[rel="next"]', includeHidden: true },
  { selector: 'link[rel="next"]', includeHidden: true },
  { selector: 'a[aria-label*="next" i]' },
  { selector: 'a:text-is("Next")' },
  { selector: 'a:has-text("Next page")' },
  { selector: '.pagination .next a' },
  { selector: '.pagination a.next' },
  { selector: '.pager .next a' },
];
