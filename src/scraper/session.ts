/**
 * Crawl Session
 *
 * Orchestrates one invocation: discovers article URLs (search pagination or
 * homepage), then fetches and extracts each article strictly one at a time,
 * yielding records in discovery order.
 */

import { randomUUID } from 'crypto';
import * as cheerio from 'cheerio';
import { config, defaultTemplate, type SiteTemplate } from '../config/index.js';
import { Pacer } from '../utils/delay.js';
import { createChildLogger, type Logger } from '../utils/logger.js';
import type { ArticleRecord, CrawlOperation, CrawlReport } from '../types/index.js';
import { extractArticle } from './content-extractor.js';
import { InvalidInvocationError } from './errors.js';
import { DedupFrontier } from './frontier.js';
import { extractLinks } from './link-extractor.js';
import { createSearchSession, crawlSearch, type ContinuationSignal } from './pagination.js';
import { countRealComments, failedArticle, FETCH_FAILED_MESSAGE } from './records.js';
import type { PageFetcher } from './types.js';

export interface CrawlSessionOptions {
  fetcher: PageFetcher;
  pacer?: Pacer;
  template?: SiteTemplate;
  signals?: readonly ContinuationSignal[];
  sessionId?: string;
}

export interface KeywordCrawlOptions {
  maxArticles: number;
  maxPages: number;
  /** URLs seen in earlier runs; never emitted again */
  exclude?: Iterable<string>;
}

export interface LatestCrawlOptions {
  maxArticles: number;
  exclude?: Iterable<string>;
}

/**
 * Discovery-side counters, filled while a stream runs
 */
export interface DiscoveryStats {
  pagesVisited: number;
  urlsDiscovered: number;
}

function assertBound(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidInvocationError(`${name} must be a positive integer (got ${value})`);
  }
}

export class CrawlSession {
  readonly sessionId: string;
  private readonly fetcher: PageFetcher;
  private readonly pacer: Pacer;
  private readonly template: SiteTemplate;
  private readonly signals: readonly ContinuationSignal[] | undefined;
  private readonly log: Logger;

  constructor(options: CrawlSessionOptions) {
    this.sessionId = options.sessionId ?? randomUUID();
    this.fetcher = options.fetcher;
    this.pacer = options.pacer ?? new Pacer(config.scraper.pacing);
    this.template = options.template ?? defaultTemplate;
    this.signals = options.signals;
    this.log = createChildLogger({ sessionId: this.sessionId });
  }

  /**
   * Whether a URL belongs to the crawled site
   */
  isSiteUrl(url: string): boolean {
    return url.startsWith(`${this.template.origin}/`);
  }

  /**
   * Fetch and extract one article. Never throws.
   */
  async scrapeArticle(url: string): Promise<ArticleRecord> {
    const page = await this.fetcher.fetch(url);
    if (!page) {
      this.log.warn({ url }, 'Article fetch failed');
      return failedArticle(url, FETCH_FAILED_MESSAGE);
    }
    return extractArticle(cheerio.load(page.html), url, this.template);
  }

  /**
   * Scrape URLs sequentially, pausing before every article after the first
   */
  async *scrapeAll(urls: readonly string[]): AsyncGenerator<ArticleRecord> {
    for (const [index, url] of urls.entries()) {
      if (index > 0) {
        await this.pacer.pause('article');
      }
      this.log.info({ url, position: index + 1, total: urls.length }, 'Scraping article');
      yield await this.scrapeArticle(url);
    }
  }

  /**
   * Article records for a keyword search, in search-rank order
   */
  async *streamByKeyword(
    keyword: string,
    options: KeywordCrawlOptions,
    stats: DiscoveryStats = { pagesVisited: 0, urlsDiscovered: 0 }
  ): AsyncGenerator<ArticleRecord> {
    assertBound('maxArticles', options.maxArticles);
    assertBound('maxPages', options.maxPages);
    if (!keyword.trim()) {
      throw new InvalidInvocationError('Search keyword must not be empty');
    }

    const search = createSearchSession(keyword, options);
    const crawl = await crawlSearch(search, {
      fetcher: this.fetcher,
      pacer: this.pacer,
      template: this.template,
      signals: this.signals,
      logger: this.log,
    });

    stats.pagesVisited = crawl.pagesVisited;
    stats.urlsDiscovered = search.frontier.size;

    if (crawl.urls.length === 0) {
      this.log.warn({ keyword }, 'No search results found for keyword');
      return;
    }

    let rank = 0;
    for await (const record of this.scrapeAll(crawl.urls)) {
      rank++;
      search.articlesYielded++;
      yield {
        ...record,
        search: { keyword, rank, totalResults: search.frontier.size, pagesSearched: crawl.pagesVisited },
      };
    }
  }

  /**
   * Article records for the newest articles linked from the homepage
   */
  async *streamLatest(
    options: LatestCrawlOptions,
    stats: DiscoveryStats = { pagesVisited: 0, urlsDiscovered: 0 }
  ): AsyncGenerator<ArticleRecord> {
    assertBound('maxArticles', options.maxArticles);

    const homepage = `${this.template.origin}/`;
    const page = await this.fetcher.fetch(homepage);
    if (!page) {
      this.log.error({ url: homepage }, 'No articles found: homepage failed to load');
      return;
    }
    stats.pagesVisited = 1;

    const frontier = new DedupFrontier(options.exclude);
    for (const url of extractLinks(cheerio.load(page.html), this.template.origin, frontier, this.template)) {
      frontier.add(url);
    }
    stats.urlsDiscovered = frontier.size;
    this.log.info({ found: frontier.size }, 'Found article URLs on homepage');

    yield* this.scrapeAll(frontier.urls.slice(0, options.maxArticles));
  }

  async crawlByKeyword(keyword: string, options: KeywordCrawlOptions): Promise<CrawlReport> {
    const stats: DiscoveryStats = { pagesVisited: 0, urlsDiscovered: 0 };
    return this.collect('crawl-by-keyword', this.streamByKeyword(keyword, options, stats), stats, keyword);
  }

  async crawlLatest(options: LatestCrawlOptions): Promise<CrawlReport> {
    const stats: DiscoveryStats = { pagesVisited: 0, urlsDiscovered: 0 };
    return this.collect('crawl-latest', this.streamLatest(options, stats), stats);
  }

  async fetchSingle(url: string): Promise<CrawlReport> {
    if (!this.isSiteUrl(url)) {
      throw new InvalidInvocationError(`URL must belong to ${this.template.origin} (got ${url})`);
    }
    const stats: DiscoveryStats = { pagesVisited: 0, urlsDiscovered: 1 };
    return this.collect('fetch-single-url', this.scrapeAll([url]), stats);
  }

  private async collect(
    operation: CrawlOperation,
    stream: AsyncGenerator<ArticleRecord>,
    stats: DiscoveryStats,
    keyword?: string
  ): Promise<CrawlReport> {
    const startTime = Date.now();
    const records: ArticleRecord[] = [];

    for await (const record of stream) {
      records.push(record);
    }

    const succeeded = records.filter((record) => record.success);
    const report: CrawlReport = {
      operation,
      sessionId: this.sessionId,
      ...(keyword !== undefined ? { keyword } : {}),
      records,
      urlsDiscovered: stats.urlsDiscovered,
      pagesVisited: stats.pagesVisited,
      attempted: records.length,
      succeeded: succeeded.length,
      failed: records.length - succeeded.length,
      realComments: succeeded.reduce((sum, record) => sum + countRealComments(record.comments), 0),
      images: succeeded.reduce((sum, record) => sum + record.images.length, 0),
      durationMs: Date.now() - startTime,
    };

    this.log.info(
      {
        operation,
        attempted: report.attempted,
        succeeded: report.succeeded,
        failed: report.failed,
        pagesVisited: report.pagesVisited,
        durationMs: report.durationMs,
      },
      'Crawl completed'
    );

    return report;
  }
}
