/**
 * HTTP page fetcher
 *
 * Loads pages with browser-like headers. Failures are reported as null so
 * that callers can degrade a single page instead of unwinding a crawl.
 */

import axios, { isAxiosError } from 'axios';
import type { AxiosInstance } from 'axios';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import type { FetchedPage } from '../types/index.js';
import type { PageFetcher } from './types.js';

/**
 * Markers of anti-bot interstitials
 */
export const CHALLENGE_MARKERS = ['verify you are human', 'cloudflare', 'access denied', 'challenge'];

export function detectChallenge(html: string): string[] {
  const lower = html.toLowerCase();
  return CHALLENGE_MARKERS.filter((marker) => lower.includes(marker));
}

export interface HttpFetcherOptions {
  userAgent?: string;
  timeout?: number;
  client?: AxiosInstance;
}

export function createHttpClient(options: HttpFetcherOptions = {}): AxiosInstance {
  return axios.create({
    timeout: options.timeout ?? config.scraper.timeout,
    responseType: 'text',
    headers: {
      'User-Agent': options.userAgent ?? config.scraper.userAgent,
      Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
      'Accept-Language': 'en-US,en;q=0.9',
      'upgrade-insecure-requests': '1',
    },
  });
}

export class HttpPageFetcher implements PageFetcher {
  private readonly client: AxiosInstance;

  constructor(options: HttpFetcherOptions = {}) {
    this.client = options.client ?? createHttpClient(options);
  }

  async fetch(url: string): Promise<FetchedPage | null> {
    logger.info({ url }, 'Loading page');

    try {
      const response = await this.client.get<unknown>(url, { responseType: 'text' });
      const html = typeof response.data === 'string' ? response.data : '';

      if (!html) {
        logger.warn({ url, status: response.status }, 'Empty response body');
        return null;
      }

      // A challenge page is still returned: the extractors decide what is usable
      const blocks = detectChallenge(html);
      if (blocks.length > 0) {
        logger.warn({ url, blocks }, 'Potential blocks detected');
      }

      logger.info({ url, length: html.length }, 'Successfully loaded page');
      return { url, html, fetchedAt: new Date() };
    } catch (error) {
      const status = isAxiosError(error) ? error.response?.status : undefined;
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ url, status, error: message }, 'Error loading page');
      return null;
    }
  }
}
