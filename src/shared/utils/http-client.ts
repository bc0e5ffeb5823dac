/**
 * Shared HTTP Client
 *
 * Transport used by the portal client:
 * - Cookie jar management with tough-cookie
 * - Redirects followed by hand so cookies from every hop are kept
 * - Form POST helpers
 * - Per-request timeout and bounded retry with exponential backoff
 *
 * ## CookieFetch
 *
 * ```typescript
 * const http = createCookieFetch({ maxRetries: 3 });
 * const page = await http.request('GET', 'https://lk.misis.ru/ru/users/sign_in');
 * const result = await http.postForm(url, { 'user[login]': 'student' });
 * ```
 *
 * @see {@link CookieFetch} - Main HTTP client class
 * @see {@link createCookieFetch} - Factory function
 */

import { CookieJar, Cookie } from 'tough-cookie';
import { NetworkError } from '../errors.js';
import { getErrorMessage, Helpers } from './helpers.js';
import { createLogger, redactSensitive, type Logger } from './logger.js';

// ============================================================================
// Types
// ============================================================================

export type HttpMethod = 'GET' | 'POST';

/** The part of `fetch` the transport relies on; global `fetch` satisfies it */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface HttpClientConfig {
  /** Request timeout in ms (default: 30000) */
  timeout?: number;
  /** Total attempts per request, first one included (default: 3) */
  maxRetries?: number;
  /** Backoff unit in ms; attempt N waits 2^N units (default: 1000) */
  backoffBaseMs?: number;
  /** Maximum redirects followed per request (default: 10) */
  maxRedirects?: number;
  /** Custom user agent */
  userAgent?: string;
  /** Accept language header */
  acceptLanguage?: string;
  /** Logger handle (default: warn-level logger) */
  logger?: Logger;
  /** fetch implementation (default: global fetch) */
  fetch?: FetchLike;
  /** Sleep used between attempts (default: setTimeout based) */
  sleep?: (ms: number) => Promise<void>;
}

export interface RequestOptions {
  headers?: Record<string, string>;
  /** Form fields, sent as application/x-www-form-urlencoded */
  form?: Record<string, string>;
  redirect?: 'follow' | 'manual';
}

export interface HttpResponse {
  status: number;
  statusText: string;
  body: string;
  /** URL of the last hop, after any followed redirects */
  url: string;
  headers: Headers;
}

export interface FormPostResult {
  response: HttpResponse;
  html: string;
  location?: string;
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
const DEFAULT_ACCEPT_LANGUAGE = 'ru-RU,ru;q=0.9,en;q=0.8';
const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

// ============================================================================
// CookieFetch - Fetch wrapper with cookie jar and retries
// ============================================================================

export class CookieFetch {
  private cookieJar: CookieJar;
  private config: Required<Omit<HttpClientConfig, 'logger' | 'fetch' | 'sleep'>>;
  private logger: Logger;
  private fetchImpl: FetchLike;
  private sleep: (ms: number) => Promise<void>;

  constructor(config: HttpClientConfig = {}) {
    this.cookieJar = new CookieJar();
    this.config = {
      timeout: config.timeout ?? 30000,
      maxRetries: Math.max(1, config.maxRetries ?? 3),
      backoffBaseMs: config.backoffBaseMs ?? 1000,
      maxRedirects: config.maxRedirects ?? 10,
      userAgent: config.userAgent ?? DEFAULT_USER_AGENT,
      acceptLanguage: config.acceptLanguage ?? DEFAULT_ACCEPT_LANGUAGE
    };
    this.logger = config.logger ?? createLogger('HTTP');
    this.fetchImpl = config.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = config.sleep ?? Helpers.delay;
  }

  /**
   * Make an HTTP request, retrying on network failure or status >= 400.
   *
   * @throws NetworkError when every attempt failed
   */
  async request(method: HttpMethod, url: string, options: RequestOptions = {}): Promise<HttpResponse> {
    const { maxRetries, backoffBaseMs } = this.config;

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      const isLast = attempt === maxRetries - 1;

      try {
        const response = await this.send(method, url, options);

        if (response.status < 400) {
          return response;
        }

        this.logger.warn(`HTTP ${response.status} for ${url}, attempt ${attempt + 1}/${maxRetries}`);
        if (isLast) {
          throw new NetworkError(`HTTP ${response.status}: ${response.statusText}`, { status: response.status });
        }
      } catch (error: unknown) {
        if (error instanceof NetworkError) {
          throw error;
        }

        this.logger.error(`Network error for ${url}: ${getErrorMessage(error)}`);
        if (isLast) {
          throw new NetworkError(`Network error: ${getErrorMessage(error)}`, { cause: error });
        }
      }

      await this.sleep(2 ** attempt * backoffBaseMs);
    }

    // maxRetries is at least 1, so the loop always returns or throws
    throw new NetworkError('Maximum number of attempts exceeded');
  }

  /**
   * GET request that returns HTML
   */
  async getHtml(url: string, headers?: Record<string, string>): Promise<string> {
    const response = await this.request('GET', url, { headers });
    return response.body;
  }

  /**
   * POST form data without following redirects
   */
  async postForm(url: string, formData: Record<string, string>, headers?: Record<string, string>): Promise<FormPostResult> {
    this.logger.debug(`   [Form] ${url}`, redactSensitive(formData));
    const response = await this.request('POST', url, {
      form: formData,
      headers,
      redirect: 'manual'
    });

    const location = response.headers.get('location') ?? undefined;
    return { response, html: response.body, location };
  }

  async getCookieString(url: string): Promise<string> {
    return this.cookieJar.getCookieString(url);
  }

  /**
   * Clear all cookies
   */
  async clearCookies(): Promise<void> {
    await this.cookieJar.removeAllCookies();
  }

  // ==========================================================================
  // Internal: single attempt
  // ==========================================================================

  /**
   * One attempt: the request plus every redirect hop it leads to.
   */
  private async send(method: HttpMethod, url: string, options: RequestOptions): Promise<HttpResponse> {
    let currentUrl = url;
    let currentMethod = method;
    let body = options.form ? new URLSearchParams(options.form).toString() : undefined;

    for (let hop = 0; ; hop++) {
      const response = await this.fetchOnce(currentMethod, currentUrl, body, options.headers);
      const location = response.headers.get('location');

      if (options.redirect === 'manual' || !REDIRECT_STATUSES.has(response.status) || !location) {
        return { ...response, url: currentUrl };
      }

      if (hop >= this.config.maxRedirects) {
        throw new Error(`Too many redirects (${this.config.maxRedirects}) starting at ${url}`);
      }

      const nextUrl = new URL(location, currentUrl).toString();
      this.logger.debug(`   [Redirect] ${response.status} ${currentUrl} -> ${nextUrl}`);

      if (response.status !== 307 && response.status !== 308) {
        currentMethod = 'GET';
        body = undefined;
      }
      currentUrl = nextUrl;
    }
  }

  /**
   * One hop, body included. The timeout stays armed until the body is read.
   */
  private async fetchOnce(
    method: HttpMethod,
    url: string,
    body: string | undefined,
    extraHeaders: Record<string, string> = {}
  ): Promise<Omit<HttpResponse, 'url'>> {
    const headers: Record<string, string> = {
      'User-Agent': this.config.userAgent,
      'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'Accept-Language': this.config.acceptLanguage,
      ...extraHeaders
    };

    const cookieString = await this.cookieJar.getCookieString(url);
    if (cookieString) {
      headers['Cookie'] = cookieString;
      this.logger.debug(`   [Cookie] Sending ${cookieString.split(';').length} cookie(s)`);
    }

    if (body !== undefined && !headers['Content-Type']) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded; charset=UTF-8';
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeout);

    try {
      this.logger.debug(`   [${method}] ${url}`);

      const response = await this.fetchImpl(url, {
        method,
        headers,
        body,
        redirect: 'manual',
        signal: controller.signal
      });

      await this.storeCookies(response, url);
      this.logger.debug(`   [Response] ${response.status} ${response.statusText}`);

      return {
        status: response.status,
        statusText: response.statusText,
        body: await readBody(response, controller.signal),
        headers: response.headers
      };
    } catch (error: unknown) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new Error(`Request timeout after ${this.config.timeout}ms`, { cause: error });
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async storeCookies(response: Response, url: string): Promise<void> {
    for (const header of response.headers.getSetCookie()) {
      const cookie = Cookie.parse(header);
      if (!cookie) {
        this.logger.debug(`   [Cookie] Skipped unparseable Set-Cookie header`);
        continue;
      }

      try {
        await this.cookieJar.setCookie(cookie, url);
        this.logger.debug(`   [Cookie] Set: ${cookie.key}`);
      } catch (error: unknown) {
        // the jar rejects cookies scoped to another domain
        this.logger.debug(`   [Cookie] Rejected ${cookie.key}: ${getErrorMessage(error)}`);
      }
    }
  }
}

// a body stream that stalls after the headers still ends at the deadline
function readBody(response: Response, signal: AbortSignal): Promise<string> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }
  const aborted = new Promise<never>((_, reject) => {
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
  return Promise.race([response.text(), aborted]);
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create a new CookieFetch instance
 */
export function createCookieFetch(config?: HttpClientConfig): CookieFetch {
  return new CookieFetch(config);
}
