/**
 * Core types for the news crawler
 */

/**
 * Raw result of one fetch
 */
export interface FetchedPage {
  readonly url: string;
  readonly html: string;
  readonly fetchedAt: Date;
}

export interface ImageRecord {
  /** Always absolute */
  readonly sourceUrl: string;
  readonly altText: string;
  readonly titleText: string;
  readonly width?: number;
  readonly height?: number;
  readonly cssClasses: readonly string[];
  readonly caption: string;
}

export type CommentKind = 'comment' | 'reply' | 'metadata';

export interface CommentRecord {
  readonly id?: string;
  readonly text: string;
  readonly author: string;
  readonly dateRaw: string;
  readonly kind: CommentKind;
}

/**
 * Where a record sits in a keyword search
 */
export interface SearchPlacement {
  readonly keyword: string;
  readonly rank: number;
  readonly totalResults: number;
  readonly pagesSearched: number;
}

interface ArticleRecordBase {
  readonly url: string;
  readonly title: string;
  readonly bodyText: string;
  readonly author: string;
  readonly publishDateRaw: string;
  readonly bodyLength: number;
  readonly images: readonly ImageRecord[];
  readonly comments: readonly CommentRecord[];
  readonly search?: SearchPlacement;
}

export interface ExtractedArticle extends ArticleRecordBase {
  readonly success: true;
}

export interface FailedArticle extends ArticleRecordBase {
  readonly success: false;
  readonly bodyText: '';
  readonly images: readonly [];
  readonly comments: readonly [];
  readonly error: string;
}

export type ArticleRecord = ExtractedArticle | FailedArticle;

export type CrawlOperation = 'crawl-latest' | 'crawl-by-keyword' | 'fetch-single-url';

/**
 * Aggregate outcome of one crawl session
 */
export interface CrawlReport {
  operation: CrawlOperation;
  sessionId: string;
  keyword?: string;
  records: ArticleRecord[];
  urlsDiscovered: number;
  pagesVisited: number;
  attempted: number;
  succeeded: number;
  failed: number;
  realComments: number;
  images: number;
  durationMs: number;
}
