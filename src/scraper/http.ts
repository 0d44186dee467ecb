/**
 * HTTP Page Fetcher
 *
 * Plain GET + cheerio readiness check for server-rendered pages.
 */

import axios, { isAxiosError } from 'axios';
import type { AxiosInstance, AxiosResponse } from 'axios';
import * as cheerio from 'cheerio';
import { NavigationError, errorMessage } from '../utils/errors.js';
import { componentLogger } from '../utils/logger.js';
import { RateLimiter } from '../utils/rate-limiter.js';
import { withRetry } from '../utils/retry.js';
import type { RetryConfig } from '../types/index.js';
import type { LoadOptions, LoadedPage, PageFetcher } from './types.js';

const log = componentLogger('http');

export interface HttpFetcherOptions {
  userAgent: string;
  navigationTimeoutMs: number;
  rateLimitMs: number;
  retry: Partial<RetryConfig>;
}

export class HttpFetcher implements PageFetcher {
  private readonly client: AxiosInstance;
  private readonly limiter: RateLimiter;

  constructor(private readonly options: HttpFetcherOptions, client?: AxiosInstance) {
    this.limiter = new RateLimiter(options.rateLimitMs);
    this.client =
      client ??
      axios.create({
        timeout: options.navigationTimeoutMs,
        maxRedirects: 5,
        responseType: 'arraybuffer',
        headers: {
          'User-Agent': options.userAgent,
          'Accept-Language': 'ko-KR,ko;q=0.9,en-US;q=0.8,en;q=0.7',
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        },
      });
  }

  /**
   * The response is the whole document, so readiness is checked once and
   * `timeoutMs` does not apply; the request itself is bounded by
   * `navigationTimeoutMs`.
   */
  async load(url: string, { readySelector }: LoadOptions): Promise<LoadedPage> {
    await this.limiter.waitForSlot();
    log.debug({ url }, 'Fetching URL');

    let response: AxiosResponse<ArrayBuffer>;
    try {
      response = await withRetry(
        () => this.client.get<ArrayBuffer>(url, { responseType: 'arraybuffer' }),
        this.options.retry,
        isRetryable
      );
    } catch (error) {
      throw new NavigationError(url, `Fetch failed: ${errorMessage(error)}`, { cause: error });
    }

    const html = decodeBody(response.data, headerValue(response.headers['content-type']));
    const $ = cheerio.load(html);

    return {
      url: finalUrl(response, url),
      html,
      ready: $(readySelector).length > 0,
    };
  }

  async close(): Promise<void> {
    // Stateless: nothing to release
  }
}

function isRetryable(error: Error): boolean {
  if (!isAxiosError(error)) return false;
  const status = error.response?.status;
  return status === undefined || status >= 500;
}

function headerValue(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

/**
 * Final URL after redirects, as reported by the Node adapter
 */
function finalUrl(response: AxiosResponse, fallback: string): string {
  const request: unknown = response.request;
  if (typeof request === 'object' && request !== null && 'res' in request) {
    const res: unknown = request.res;
    if (typeof res === 'object' && res !== null && 'responseUrl' in res && typeof res.responseUrl === 'string') {
      return res.responseUrl;
    }
  }
  return fallback;
}

/**
 * Decode using the charset from the header or a `<meta>` tag; listings are often EUC-KR
 */
export function decodeBody(data: ArrayBuffer | Uint8Array | string, contentType: string): string {
  if (typeof data === 'string') {
    return data;
  }

  const bytes = data instanceof Uint8Array ? data : new Uint8Array(data);
  const charset = charsetFrom(contentType) ?? sniffMetaCharset(bytes) ?? 'utf-8';

  try {
    return new TextDecoder(charset).decode(bytes);
  } catch {
    log.warn({ charset }, 'Unknown charset, decoding as UTF-8');
    return new TextDecoder('utf-8').decode(bytes);
  }
}

function charsetFrom(contentType: string): string | null {
  const match = /charset=["']?([\w-]+)/i.exec(contentType);
  return match?.[1]?.toLowerCase() ?? null;
}

function sniffMetaCharset(bytes: Uint8Array): string | null {
  const head = new TextDecoder('latin1').decode(bytes.subarray(0, 2048));
  const match = /<meta[^>]+charset=["']?([\w-]+)/i.exec(head);
  return match?.[1]?.toLowerCase() ?? null;
}
