/**
 * Scraper Types
 */

import type { CheerioAPI } from 'cheerio';
import type { FetchedPage } from '../types/index.js';
import type { DedupFrontier } from './frontier.js';

/**
 * Turns a URL into rendered markup.
 * A failed fetch resolves to null; implementations never reject.
 */
export interface PageFetcher {
  fetch(url: string): Promise<FetchedPage | null>;
}

/**
 * One entry of a fallback chain
 */
export interface Strategy<T> {
  readonly name: string;
  extract($: CheerioAPI): T | null;
}

/**
 * Anything URLs can be checked against (a Set, a frontier)
 */
export interface UrlFilter {
  has(url: string): boolean;
}

/**
 * State of one keyword search
 */
export interface SearchSession {
  readonly keyword: string;
  readonly maxArticles: number;
  readonly maxPages: number;
  readonly frontier: DedupFrontier;
  pagesVisited: number;
  articlesYielded: number;
}

export type SearchStopReason =
  | 'max-articles'
  | 'max-pages'
  | 'no-new-urls'
  | 'no-continuation'
  | 'fetch-failed';

/**
 * Result of walking search result pages
 */
export interface SearchCrawl {
  urls: string[];
  pagesVisited: number;
  stopReason: SearchStopReason;
}
