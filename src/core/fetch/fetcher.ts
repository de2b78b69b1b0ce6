// src/core/fetch/fetcher.ts
import axios, { isAxiosError, type AxiosInstance, type AxiosResponse } from 'axios';
import { DEFAULT_FETCH_TIMEOUT, DEFAULT_USER_AGENT } from '../config/constants.js';
import { ErrorCode, FetchError, errorMessage } from '../errors.js';
import { createPageDocument } from '../extract/document.js';
import type { PageDocument } from '../types/index.js';

export interface HtmlFetcher {
  fetch(url: string, signal?: AbortSignal): Promise<PageDocument>;
}

export interface StaticFetcherOptions {
  timeout?: number;
  userAgent?: string;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Single GET bounded by a total deadline, parsed into a static PageDocument.
 */
export class StaticFetcher implements HtmlFetcher {
  private timeout: number;
  private userAgent: string;

  constructor(options: StaticFetcherOptions = {}, private client: AxiosInstance = axios) {
    this.timeout = options.timeout ?? DEFAULT_FETCH_TIMEOUT;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  }

  async fetch(url: string, signal?: AbortSignal): Promise<PageDocument> {
    // axios `timeout` only bounds idle time on the socket; this bounds the whole exchange
    const deadline = AbortSignal.timeout(this.timeout);
    let response: AxiosResponse<string>;

    try {
      response = await this.client.get<string>(url, {
        timeout: this.timeout,
        responseType: 'text',
        maxRedirects: 5,
        validateStatus: null,
        signal: signal ? AbortSignal.any([signal, deadline]) : deadline,
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8',
        },
      });
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      if (deadline.aborted || (isAxiosError(error) && error.code && TIMEOUT_CODES.has(error.code))) {
        throw new FetchError(ErrorCode.TIMEOUT, `Timed out after ${this.timeout}ms fetching ${url}`, { url });
      }
      throw new FetchError(ErrorCode.NETWORK_ERROR, `Failed to fetch ${url}: ${errorMessage(error)}`, { url });
    }

    if (response.status < 200 || response.status >= 300) {
      throw new FetchError(ErrorCode.HTTP_STATUS, `HTTP ${response.status} fetching ${url}`, {
        url,
        status: response.status,
      });
    }

    const contentType = String(response.headers['content-type'] ?? '');
    if (contentType && !/html|xml/i.test(contentType)) {
      throw new FetchError(ErrorCode.NOT_HTML, `Unexpected content type "${contentType}" for ${url}`, {
        url,
        contentType,
      });
    }

    return createPageDocument(url, String(response.data ?? ''), 'static');
  }
}
