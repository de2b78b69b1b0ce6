// src/core/render/utils.ts
import { InvalidRequestError } from '../errors.js';
import type { ScrapeRequest } from '../types/index.js';

export function isValidUrl(urlString: string): boolean {
  try {
    const url = new URL(urlString);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

export function normalizeUrl(urlString: string): string {
  const url = new URL(urlString);
  url.hash = '';
  return url.toString();
}

export function parseScrapeRequest(input: string): ScrapeRequest {
  const trimmed = input.trim();
  if (!isValidUrl(trimmed)) {
    throw new InvalidRequestError(`Invalid URL: ${input}`, { url: input });
  }
  return { url: new URL(normalizeUrl(trimmed)) };
}
