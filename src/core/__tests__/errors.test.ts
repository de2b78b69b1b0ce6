// src/core/__tests__/errors.test.ts
import { describe, it, expect } from '@jest/globals';
import {
  ErrorCode,
  FetchError,
  InteractionError,
  InvalidRequestError,
  PageSiftError,
  RenderError,
  SanitizationError,
  errorMessage,
  toScrapeError,
} from '../errors.js';

describe('PageSiftError', () => {
  it('should create error with all properties', () => {
    const error = new PageSiftError(
      ErrorCode.NETWORK_ERROR,
      'Network connection failed',
      true,
      'Check your internet connection',
      { url: 'https://example.com' }
    );

    expect(error).toBeInstanceOf(PageSiftError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('PageSiftError');
    expect(error.code).toBe(ErrorCode.NETWORK_ERROR);
    expect(error.message).toBe('Network connection failed');
    expect(error.retryable).toBe(true);
    expect(error.suggestion).toBe('Check your internet connection');
    expect(error.context).toEqual({ url: 'https://example.com' });
  });

  it('should create error with minimal properties', () => {
    const error = new PageSiftError(ErrorCode.SEGMENT_FAILED, 'Segment failed');

    expect(error.retryable).toBe(false);
    expect(error.suggestion).toBeUndefined();
    expect(error.context).toBeUndefined();
  });
});

describe('phase errors', () => {
  it('keeps subclass identity across the prototype chain', () => {
    const error = new InteractionError('click failed');

    expect(error).toBeInstanceOf(InteractionError);
    expect(error).toBeInstanceOf(PageSiftError);
    expect(error.name).toBe('InteractionError');
    expect(error.code).toBe(ErrorCode.INTERACTION_FAILED);
  });

  it('marks fetch errors retryable except for non-HTML bodies', () => {
    expect(new FetchError(ErrorCode.TIMEOUT, 'slow').retryable).toBe(true);
    expect(new FetchError(ErrorCode.HTTP_STATUS, 'HTTP 503').retryable).toBe(true);
    expect(new FetchError(ErrorCode.NOT_HTML, 'pdf').retryable).toBe(false);
  });

  it('suggests installing browsers when launch fails', () => {
    const launch = new RenderError(ErrorCode.BROWSER_LAUNCH_FAILED, 'no chromium');
    const navigation = new RenderError(ErrorCode.NAVIGATION_FAILED, 'net::ERR_NAME_NOT_RESOLVED');

    expect(launch.suggestion).toBe('Run `pagesift install-browsers` first');
    expect(launch.retryable).toBe(false);
    expect(navigation.suggestion).toBeUndefined();
    expect(navigation.retryable).toBe(true);
  });

  it('describes invalid requests with a hint', () => {
    const error = new InvalidRequestError('Invalid URL: ftp://x', { url: 'ftp://x' });

    expect(error.code).toBe(ErrorCode.INVALID_URL);
    expect(error.suggestion).toBe('Pass an absolute http:// or https:// URL');
  });
});

describe('toScrapeError', () => {
  it('converts errors and thrown values into result entries', () => {
    expect(toScrapeError('sanitize', new SanitizationError('bad markup'))).toEqual({
      phase: 'sanitize',
      message: 'bad markup',
    });
    expect(toScrapeError('render', 'crashed')).toEqual({ phase: 'render', message: 'crashed' });
  });

  it('reads messages from non-Error values', () => {
    expect(errorMessage(42)).toBe('42');
    expect(errorMessage(new Error('boom'))).toBe('boom');
  });
});
