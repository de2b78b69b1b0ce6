// src/core/types/index.ts
import type { CheerioAPI } from 'cheerio';

export type SourceMode = 'static' | 'rendered';

export type SectionType =
  | 'nav'
  | 'header'
  | 'footer'
  | 'hero'
  | 'pricing'
  | 'faq'
  | 'grid'
  | 'list'
  | 'section'
  | 'unknown';

export type ScrapePhase = 'fetch' | 'render' | 'interact' | 'segment' | 'classify' | 'sanitize';

export type InteractionKind = 'tab' | 'loadMore' | 'scroll' | 'paginate' | 'dismiss';

export interface ScrapeRequest {
  readonly url: URL;
}

/**
 * Parsed HTML produced by either the static fetch or a rendered browser pass.
 * The cheerio instance is owned by whichever stage holds the document.
 */
export interface PageDocument {
  url: string;
  sourceMode: SourceMode;
  html: string;
  textLength: number;
  $: CheerioAPI;
}

export interface SufficiencySignal {
  textLength: number;
  jsIndicatorsFound: boolean;
}

export interface SufficiencyDecision extends SufficiencySignal {
  sufficient: boolean;
  reason: 'sufficient' | 'no_body' | 'too_little_text' | 'js_indicator';
  indicators: string[];
}

export interface BudgetCounters {
  tabsClicked: number;
  loadMoreClicks: number;
  scrolls: number;
  paginationDepth: number;
}

export type BudgetCategory = keyof BudgetCounters;

export interface InteractionEvent {
  kind: InteractionKind;
  target: string;
  resultingUrl?: string;
  timestamp: string;
}

export interface SectionLink {
  text: string;
  href: string;
}

export interface SectionImage {
  src: string;
  alt: string;
}

export interface SectionContent {
  headings: string[];
  links: SectionLink[];
  images: SectionImage[];
  lists: string[][];
  tables: string[][][];
}

export interface Section {
  id: string;
  type: SectionType;
  label: string;
  sourceUrl: string;
  rawHtml: string;
  text: string;
  truncated: boolean;
  content: SectionContent;
}

export interface ScrapeError {
  phase: ScrapePhase;
  message: string;
}

export interface PageMetadata {
  title: string;
  description: string;
  language: string;
  canonical: string | null;
}

export interface ScrapeResult {
  url: string;
  scrapedAt: string;
  sourceMode: SourceMode | null;
  metadata: PageMetadata;
  sections: Section[];
  interactions: InteractionEvent[];
  budget: BudgetCounters;
  errors: ScrapeError[];
}
