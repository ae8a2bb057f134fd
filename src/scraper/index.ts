/**
 * Scraper Module
 *
 * URL discovery (search pagination, homepage links), article extraction and
 * the session that drives them
 */

// Orchestration
export {
  CrawlSession,
  type CrawlSessionOptions,
  type KeywordCrawlOptions,
  type LatestCrawlOptions,
  type DiscoveryStats,
} from './session.js';

// URL discovery
export { DedupFrontier } from './frontier.js';
export { extractLinks, isArticleUrl, createLinkStrategies } from './link-extractor.js';
export {
  crawlSearch,
  createSearchSession,
  buildSearchUrl,
  hasNextPage,
  parsePageLabel,
  CONTINUATION_SIGNALS,
  type ContinuationSignal,
  type PageSignalContext,
} from './pagination.js';

// Extraction
export {
  extractArticle,
  extractTitle,
  extractBody,
  extractAuthor,
  extractPublishDate,
} from './content-extractor.js';
export { extractImages, extractFeaturedImage } from './image-extractor.js';
export { extractComments, readCommentCount } from './comment-extractor.js';
export { countRealComments, failedArticle, FETCH_FAILED_MESSAGE } from './records.js';

// Fetching
export { HttpPageFetcher, createHttpClient, detectChallenge } from './fetcher.js';

export { InvalidInvocationError } from './errors.js';
export type { PageFetcher, Strategy, UrlFilter, SearchSession, SearchCrawl, SearchStopReason } from './types.js';
