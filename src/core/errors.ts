// src/core/errors.ts
import type { ScrapeError, ScrapePhase } from './types/index.js';

export enum ErrorCode {
  INVALID_URL = 'invalid_url',
  NETWORK_ERROR = 'network_error',
  HTTP_STATUS = 'http_status',
  TIMEOUT = 'timeout',
  NOT_HTML = 'not_html',
  BROWSER_LAUNCH_FAILED = 'browser_launch_failed',
  NAVIGATION_FAILED = 'navigation_failed',
  INTERACTION_FAILED = 'interaction_failed',
  SEGMENT_FAILED = 'segment_failed',
  CLASSIFY_FAILED = 'classify_failed',
  SANITIZE_FAILED = 'sanitize_failed',
}

export class PageSiftError extends Error {
  code: ErrorCode;
  retryable: boolean;
  suggestion?: string;
  context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    retryable: boolean = false,
    suggestion?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PageSiftError';
    this.code = code;
    this.retryable = retryable;
    this.suggestion = suggestion;
    this.context = context;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidRequestError extends PageSiftError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorCode.INVALID_URL, message, false, 'Pass an absolute http:// or https:// URL', context);
    this.name = 'InvalidRequestError';
  }
}

export class FetchError extends PageSiftError {
  constructor(
    code: ErrorCode.NETWORK_ERROR | ErrorCode.HTTP_STATUS | ErrorCode.TIMEOUT | ErrorCode.NOT_HTML,
    message: string,
    context?: Record<string, unknown>
  ) {
    super(code, message, code !== ErrorCode.NOT_HTML, undefined, context);
    this.name = 'FetchError';
  }
}

export class RenderError extends PageSiftError {
  constructor(
    code: ErrorCode.BROWSER_LAUNCH_FAILED | ErrorCode.NAVIGATION_FAILED,
    message: string,
    context?: Record<string, unknown>
  ) {
    super(
      code,
      message,
      code === ErrorCode.NAVIGATION_FAILED,
      code === ErrorCode.BROWSER_LAUNCH_FAILED ? 'Run `pagesift install-browsers` first' : undefined,
      context
    );
    this.name = 'RenderError';
  }
}

export class InteractionError extends PageSiftError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorCode.INTERACTION_FAILED, message, false, undefined, context);
    this.name = 'InteractionError';
  }
}

export class SegmentationError extends PageSiftError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorCode.SEGMENT_FAILED, message, false, undefined, context);
    this.name = 'SegmentationError';
  }
}

export class ClassificationError extends PageSiftError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorCode.CLASSIFY_FAILED, message, false, undefined, context);
    this.name = 'ClassificationError';
  }
}

export class SanitizationError extends PageSiftError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorCode.SANITIZE_FAILED, message, false, undefined, context);
    this.name = 'SanitizationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toScrapeError(phase: ScrapePhase, error: unknown): ScrapeError {
  return { phase, message: errorMessage(error) };
}
