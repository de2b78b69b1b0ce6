import { describe, it, expect } from '@jest/globals';
import { InvalidRequestError } from '../../errors.js';
import { isValidUrl, normalizeUrl, parseScrapeRequest } from '../utils.js';

describe('render utils', () => {
  describe('isValidUrl', () => {
    it('accepts http/https', () => {
      expect(isValidUrl('https://example.com')).toBe(true);
      expect(isValidUrl('http://example.com')).toBe(true);
    });

    it('rejects invalid or unsupported schemes', () => {
      expect(isValidUrl('ftp://example.com')).toBe(false);
      expect(isValidUrl('not-a-url')).toBe(false);
      expect(isValidUrl('/relative/path')).toBe(false);
    });
  });

  describe('normalizeUrl', () => {
    it('removes hash fragments', () => {
      expect(normalizeUrl('https://example.com/path#section')).toBe('https://example.com/path');
    });
  });

  describe('parseScrapeRequest', () => {
    it('trims and normalizes the URL', () => {
      const request = parseScrapeRequest('  https://Example.com/docs?x=1#intro ');

      expect(request.url.toString()).toBe('https://example.com/docs?x=1');
    });

    it('throws InvalidRequestError for anything else', () => {
      expect(() => parseScrapeRequest('mailto:someone@example.com')).toThrow(InvalidRequestError);
      expect(() => parseScrapeRequest('')).toThrow('Invalid URL: ');
    });
  });
});
