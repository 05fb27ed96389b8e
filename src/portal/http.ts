/**
 * HTTP transport for the portal API
 * Uses native fetch; every failure surfaces as a TransportError
 */

import { TransportError } from '../types/index.js';
import { debug, error as logError } from '../utils/logger.js';
import { FETCH_TIMEOUT_MS } from '../config.js';

/**
 * fetch-compatible function, injectable for tests
 */
export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export type HttpMethod = 'GET' | 'POST' | 'PUT';

export interface RequestOptions {
  /** Query-string parameters */
  query?: Record<string, string>;
  /** JSON body; serialized with JSON.stringify */
  json?: unknown;
  /** Raw binary body, sent as-is */
  body?: Buffer;
  /** Headers for this request only */
  headers?: Record<string, string>;
}

/**
 * Appends query parameters to a URL
 */
export function buildUrl(url: string, query?: Record<string, string>): string {
  if (!query || Object.keys(query).length === 0) return url;
  const params = new URLSearchParams(query);
  return `${url}${url.includes('?') ? '&' : '?'}${params.toString()}`;
}

/**
 * Parses a response body
 * 204 and empty bodies yield an empty object; non-JSON bodies yield null
 */
function parseBody(status: number, text: string): unknown {
  if (status === 204 || text.trim() === '') return {};
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

export class PortalHttp {
  private readonly fetchFn: FetchFn;
  private readonly timeoutMs: number;

  /**
   * @param fetchFn - fetch implementation (default: global fetch)
   * @param timeoutMs - Per-request timeout
   */
  constructor(fetchFn: FetchFn = (input, init) => fetch(input, init), timeoutMs: number = FETCH_TIMEOUT_MS) {
    this.fetchFn = fetchFn;
    this.timeoutMs = timeoutMs;
  }

  /**
   * Executes a request and returns the parsed body
   *
   * @throws TransportError on network failure, timeout or non-2xx status
   */
  async request(method: HttpMethod, url: string, options: RequestOptions = {}): Promise<unknown> {
    const fullUrl = buildUrl(url, options.query);
    const headers: Record<string, string> = { ...options.headers };

    let body: string | Buffer | undefined;
    if (options.body !== undefined) {
      body = options.body;
    } else if (options.json !== undefined) {
      body = JSON.stringify(options.json);
    }

    debug('Portal request', { module: 'portal-http', phase: 'request', method, url: fullUrl });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    // The timeout covers the response body as well as the headers
    let response: Response;
    let text: string;
    try {
      response = await this.fetchFn(fullUrl, { method, headers, body, signal: controller.signal });
      text = await response.text();
    } catch (fetchError) {
      const err = fetchError instanceof Error ? fetchError : new Error('Unknown error');
      const isTimeout = err.name === 'AbortError';
      const message = isTimeout
        ? `Portal request timeout after ${this.timeoutMs}ms: ${method} ${fullUrl}`
        : `Portal request failed: ${method} ${fullUrl}: ${err.message}`;

      logError('Portal request failed', {
        module: 'portal-http',
        phase: 'request',
        method,
        url: fullUrl,
        error: err.message,
        isTimeout,
      });
      throw new TransportError(message, fullUrl, undefined, fetchError);
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      logError('Portal request returned error status', {
        module: 'portal-http',
        phase: 'request',
        method,
        url: fullUrl,
        status: response.status,
      });
      throw new TransportError(
        `Portal request ${method} ${fullUrl} returned ${response.status}`,
        fullUrl,
        response.status,
        text
      );
    }

    return parseBody(response.status, text);
  }
}
