// src/core/config/constants.ts
export const DEFAULT_FETCH_TIMEOUT = 30000; // 30 seconds
export const DEFAULT_PAGE_LOAD_TIMEOUT = 30000;
export const DEFAULT_INITIAL_SETTLE_MS = 2000;
export const DEFAULT_INTERACTION_SETTLE_MS = 1500;
export const DEFAULT_IDLE_TIMEOUT = 3000;
export const DEFAULT_CLICK_TIMEOUT = 2000;

export const DEFAULT_MAX_TABS = 3;
export const DEFAULT_MAX_LOAD_MORE = 3;
export const DEFAULT_MAX_SCROLLS = 3;
export const DEFAULT_MAX_PAGES = 3;

export const MIN_STATIC_TEXT_LENGTH = 200;
export const MIN_TEXT_FRAGMENT_LENGTH = 10;
export const MAX_TEXT_FRAGMENTS = 50;
export const MAX_RAW_HTML_LENGTH = 5000;
export const TRUNCATION_MARKER = '...';
export const LABEL_WORD_COUNT = 7;

export const DEFAULT_LANGUAGE = 'en';
export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
export const DEFAULT_VIEWPORT = { width: 1920, height: 1080 } as const;
