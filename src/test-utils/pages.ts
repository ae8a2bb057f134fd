/**
 * In-process page fixtures for tests
 */

import { createSiteTemplate } from '../config/site.js';
import type { FetchedPage } from '../types/index.js';
import { Pacer, type Sleep } from '../utils/delay.js';
import type { PageFetcher } from '../scraper/types.js';

export const ORIGIN = 'https://news.example.com';

export const template = createSiteTemplate(ORIGIN, 7);

export function articleUrl(n: number): string {
  return `${ORIGIN}/2025/07/${String(n).padStart(2, '0')}/story-${n}/`;
}

/**
 * Serves canned HTML by URL; unknown URLs fail like a timed-out fetch
 */
export class FakeFetcher implements PageFetcher {
  readonly requested: string[] = [];

  constructor(private readonly pages: Record<string, string>) {}

  async fetch(url: string): Promise<FetchedPage | null> {
    this.requested.push(url);
    const html = this.pages[url];
    return html === undefined ? null : { url, html, fetchedAt: new Date(0) };
  }
}

/**
 * Pacer that records delays instead of waiting
 */
export function recordingPacer(delays: number[] = [], pageMs = 0, articleMs = 0): Pacer {
  const sleep: Sleep = async (ms) => {
    delays.push(ms);
  };
  return new Pacer({
    page: { minMs: pageMs, maxMs: pageMs },
    article: { minMs: articleMs, maxMs: articleMs },
    sleep,
  });
}

export interface ResultsPageOptions {
  /** e.g. "Page 1 of 3" */
  label?: string;
  navLinks?: string[];
}

export function resultsPage(urls: readonly string[], options: ResultsPageOptions = {}): string {
  const items = urls
    .map((url) => `<div class="td_module_16"><h3 class="entry-title td-module-title"><a href="${url}">Story</a></h3></div>`)
    .join('\n');

  const nav =
    options.label !== undefined || options.navLinks
      ? `<div class="page-nav td-pb-padding-side">
           ${options.label !== undefined ? `<span class="pages">${options.label}</span>` : ''}
           ${(options.navLinks ?? []).map((href) => `<a href="${href}">next</a>`).join('')}
         </div>`
      : '';

  return `<html><body>
    <div class="td-header-menu"><a href="${ORIGIN}/category/news/">News</a></div>
    <div class="td-main-content-wrap">${items}${nav}</div>
  </body></html>`;
}

export interface ArticlePageOptions {
  title?: string;
  body?: string;
  author?: string;
  date?: string;
  ogImage?: string;
  extra?: string;
}

export function articlePage(options: ArticlePageOptions = {}): string {
  const body =
    options.body ??
    'Crews responded to the two-alarm fire shortly after midnight and had the blaze under control within an hour, officials said.';

  return `<html>
  <head>${options.ogImage ? `<meta property="og:image" content="${options.ogImage}">` : ''}</head>
  <body>
    <h1 class="entry-title">${options.title ?? 'Fire destroys home on Main Street'}</h1>
    <div class="td-module-meta-info">
      <span class="td-post-author-name">${options.author ?? 'Jane Reporter'}</span>
      <time class="entry-date updated">${options.date ?? 'July 29, 2025'}</time>
    </div>
    <div class="td-post-content"><div class="pf-content"><p>${body}</p></div></div>
    ${options.extra ?? ''}
  </body>
</html>`;
}
