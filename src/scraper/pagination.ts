/**
 * Search pagination
 *
 * Walks search result pages until enough URLs are collected, the page limit
 * is hit, a page yields nothing new, or no page suggests a next one.
 */

import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { defaultTemplate, type SiteTemplate } from '../config/index.js';
import type { Pacer } from '../utils/delay.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { DedupFrontier } from './frontier.js';
import { extractLinks } from './link-extractor.js';
import type { PageFetcher, SearchCrawl, SearchSession, SearchStopReason } from './types.js';

/**
 * What a continuation signal gets to look at
 */
export interface PageSignalContext {
  $: CheerioAPI;
  pageNum: number;
  maxPages: number;
  /** New URLs the current page contributed */
  newUrlCount: number;
  template: SiteTemplate;
}

/**
 * A hint that another result page exists. Signals are independent and
 * combined with OR; none of them is authoritative on its own.
 */
export interface ContinuationSignal {
  readonly name: string;
  test(ctx: PageSignalContext): boolean;
}

/**
 * Parse a "Page X of Y" label
 */
export function parsePageLabel(text: string): { current: number; total: number } | null {
  const match = text.match(/page\s+(\d+)\s+of\s+(\d+)/i);
  if (!match?.[1] || !match[2]) {
    return null;
  }
  return { current: parseInt(match[1], 10), total: parseInt(match[2], 10) };
}

function linksToPage(anchors: Cheerio<Element>, pageNum: number, requireSearch: boolean): boolean {
  const marker = `/page/${pageNum}/`;
  return anchors.toArray().some((anchor) => {
    const href = anchor.attribs['href'] ?? '';
    return href.includes(marker) && (!requireSearch || href.includes('?s='));
  });
}

export const pageLabelSignal: ContinuationSignal = {
  name: 'page-label',
  test({ $, template }) {
    const label = $(template.pagination.nav).find(template.pagination.label).first();
    const parsed = label.length > 0 ? parsePageLabel(label.text()) : null;
    return parsed !== null && parsed.current < parsed.total;
  },
};

export const navLinkSignal: ContinuationSignal = {
  name: 'nav-link',
  test({ $, pageNum, template }) {
    return linksToPage($(template.pagination.nav).find('a[href]'), pageNum + 1, false);
  },
};

export const searchLinkSignal: ContinuationSignal = {
  name: 'search-link',
  test({ $, pageNum }) {
    return linksToPage($('a[href]'), pageNum + 1, true);
  },
};

/**
 * Weak evidence: a full page of results usually means there are more
 */
export const fullPageSignal: ContinuationSignal = {
  name: 'full-page',
  test({ newUrlCount, pageNum, maxPages, template }) {
    return newUrlCount >= template.pagination.resultsPerPage && pageNum < maxPages;
  },
};

export const CONTINUATION_SIGNALS: readonly ContinuationSignal[] = [
  pageLabelSignal,
  navLinkSignal,
  searchLinkSignal,
  fullPageSignal,
];

/**
 * Name of the first signal suggesting a next page, or null
 */
export function hasNextPage(
  ctx: PageSignalContext,
  signals: readonly ContinuationSignal[] = CONTINUATION_SIGNALS
): string | null {
  const fired = signals.find((signal) => signal.test(ctx));
  return fired?.name ?? null;
}

/**
 * Page 1 is the bare search URL, later pages use the /page/N/ path
 */
export function buildSearchUrl(origin: string, keyword: string, pageNum: number): string {
  const base = origin.replace(/\/+$/, '');
  const query = new URLSearchParams({ s: keyword }).toString();
  return pageNum <= 1 ? `${base}/?${query}` : `${base}/page/${pageNum}/?${query}`;
}

export function createSearchSession(
  keyword: string,
  options: { maxArticles: number; maxPages: number; exclude?: Iterable<string> }
): SearchSession {
  return {
    keyword,
    maxArticles: options.maxArticles,
    maxPages: options.maxPages,
    frontier: new DedupFrontier(options.exclude),
    pagesVisited: 0,
    articlesYielded: 0,
  };
}

export interface SearchDependencies {
  fetcher: PageFetcher;
  pacer: Pacer;
  template?: SiteTemplate;
  signals?: readonly ContinuationSignal[];
  logger?: Logger;
}

/**
 * Collect unique article URLs from the search results for the session keyword
 */
export async function crawlSearch(session: SearchSession, deps: SearchDependencies): Promise<SearchCrawl> {
  const template = deps.template ?? defaultTemplate;
  const log = deps.logger ?? rootLogger;
  const { keyword, maxArticles, maxPages, frontier } = session;

  log.info({ keyword, maxArticles, maxPages }, 'Starting search crawl');

  let pageNum = 1;
  let stopReason: SearchStopReason;

  for (;;) {
    if (frontier.size >= maxArticles) {
      stopReason = 'max-articles';
      break;
    }
    if (pageNum > maxPages) {
      stopReason = 'max-pages';
      break;
    }

    if (pageNum > 1) {
      await deps.pacer.pause('page');
    }

    const url = buildSearchUrl(template.origin, keyword, pageNum);
    log.info({ url, page: pageNum }, 'Checking search page');

    const page = await deps.fetcher.fetch(url);
    if (!page) {
      log.warn({ url, page: pageNum }, 'Failed to load search page');
      stopReason = 'fetch-failed';
      break;
    }
    session.pagesVisited++;

    const $ = cheerio.load(page.html);
    const found = extractLinks($, template.origin, frontier, template);
    for (const link of found) {
      frontier.add(link);
    }

    if (found.length === 0) {
      log.info({ page: pageNum }, 'No new articles on page, stopping pagination');
      stopReason = 'no-new-urls';
      break;
    }

    log.info({ page: pageNum, found: found.length, total: frontier.size }, 'Found articles on page');

    if (frontier.size >= maxArticles) {
      stopReason = 'max-articles';
      break;
    }

    const signal = hasNextPage(
      { $, pageNum, maxPages, newUrlCount: found.length, template },
      deps.signals ?? CONTINUATION_SIGNALS
    );
    if (!signal) {
      log.info({ page: pageNum }, 'No more pages detected');
      stopReason = 'no-continuation';
      break;
    }

    log.debug({ page: pageNum, signal }, 'Next page evidence');
    pageNum++;
  }

  const urls = frontier.urls.slice(0, maxArticles);

  log.info(
    { keyword, pagesVisited: session.pagesVisited, found: frontier.size, kept: urls.length, stopReason },
    'Search crawl completed'
  );

  return { urls, pagesVisited: session.pagesVisited, stopReason };
}
