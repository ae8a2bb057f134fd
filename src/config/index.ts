/**
 * Application configuration
 */

import { env } from './env.js';
import { createSiteTemplate } from './site.js';

export const config = {
  app: {
    name: 'newsroom-crawler',
    version: '1.0.0',
    env: env.NODE_ENV,
  },

  site: {
    url: env.SITE_URL,
    resultsPerPage: env.RESULTS_PER_PAGE,
  },

  scraper: {
    userAgent: env.USER_AGENT,
    timeout: env.FETCH_TIMEOUT_MS,
    pacing: {
      page: { minMs: env.PAGE_DELAY_MIN_MS, maxMs: env.PAGE_DELAY_MAX_MS },
      article: { minMs: env.ARTICLE_DELAY_MIN_MS, maxMs: env.ARTICLE_DELAY_MAX_MS },
    },
  },

  crawl: {
    maxArticles: env.MAX_ARTICLES,
    maxPages: env.MAX_PAGES,
  },

  output: {
    dir: env.OUTPUT_DIR,
  },

  logging: {
    level: env.LOG_LEVEL,
    file: env.LOG_FILE,
  },
} as const;

export type Config = typeof config;

export const defaultTemplate = createSiteTemplate(config.site.url, config.site.resultsPerPage);

export { env } from './env.js';
export { createSiteTemplate, type SiteTemplate } from './site.js';
