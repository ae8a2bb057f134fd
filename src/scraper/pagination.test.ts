import * as cheerio from 'cheerio';
import { describe, expect, it } from 'vitest';
import {
  FakeFetcher,
  ORIGIN,
  articleUrl,
  recordingPacer,
  resultsPage,
  template,
} from '../test-utils/pages.js';
import {
  buildSearchUrl,
  crawlSearch,
  createSearchSession,
  fullPageSignal,
  hasNextPage,
  navLinkSignal,
  pageLabelSignal,
  parsePageLabel,
  searchLinkSignal,
  type PageSignalContext,
} from './pagination.js';

function range(from: number, to: number): string[] {
  const urls: string[] = [];
  for (let n = from; n <= to; n++) {
    urls.push(articleUrl(n));
  }
  return urls;
}

function signalContext(html: string, overrides: Partial<PageSignalContext> = {}): PageSignalContext {
  return { $: cheerio.load(html), pageNum: 1, maxPages: 5, newUrlCount: 0, template, ...overrides };
}

const searchUrl = (page: number) => buildSearchUrl(ORIGIN, 'fire', page);

describe('parsePageLabel', () => {
  it('reads the current and total page', () => {
    expect(parsePageLabel('Page 2 of 11')).toEqual({ current: 2, total: 11 });
    expect(parsePageLabel('  Page 3 of 3 ')).toEqual({ current: 3, total: 3 });
  });

  it('returns null for other text', () => {
    expect(parsePageLabel('Next »')).toBeNull();
  });
});

describe('buildSearchUrl', () => {
  it('uses the bare search URL for page 1 and /page/N/ after that', () => {
    expect(buildSearchUrl(ORIGIN, 'fire safety', 1)).toBe('https://news.example.com/?s=fire+safety');
    expect(buildSearchUrl(`${ORIGIN}/`, 'fire safety', 3)).toBe('https://news.example.com/page/3/?s=fire+safety');
  });
});

describe('continuation signals', () => {
  it('page-label fires only before the last page', () => {
    expect(pageLabelSignal.test(signalContext(resultsPage([], { label: 'Page 1 of 3' })))).toBe(true);
    expect(pageLabelSignal.test(signalContext(resultsPage([], { label: 'Page 3 of 3' })))).toBe(false);
  });

  it('nav-link looks for the next page inside the pagination block', () => {
    const html = resultsPage([], { navLinks: [`${ORIGIN}/page/2/?s=fire`] });

    expect(navLinkSignal.test(signalContext(html, { pageNum: 1 }))).toBe(true);
    expect(navLinkSignal.test(signalContext(html, { pageNum: 2 }))).toBe(false);
  });

  it('search-link needs a search query on the next-page link', () => {
    expect(searchLinkSignal.test(signalContext(`<a href="${ORIGIN}/page/2/?s=fire">2</a>`))).toBe(true);
    expect(searchLinkSignal.test(signalContext(`<a href="${ORIGIN}/page/2/">2</a>`))).toBe(false);
  });

  it('full-page needs a full page and room for another page', () => {
    expect(fullPageSignal.test(signalContext('', { newUrlCount: 7, pageNum: 1, maxPages: 5 }))).toBe(true);
    expect(fullPageSignal.test(signalContext('', { newUrlCount: 6, pageNum: 1, maxPages: 5 }))).toBe(false);
    expect(fullPageSignal.test(signalContext('', { newUrlCount: 7, pageNum: 5, maxPages: 5 }))).toBe(false);
  });

  it('hasNextPage reports the first signal that fired', () => {
    const html = resultsPage([], { label: 'Page 3 of 3', navLinks: [`${ORIGIN}/page/4/?s=fire`] });

    expect(hasNextPage(signalContext(html, { pageNum: 3 }))).toBe('nav-link');
    expect(hasNextPage(signalContext(resultsPage([]), { newUrlCount: 2 }))).toBeNull();
  });
});

describe('crawlSearch', () => {
  it('stops once enough URLs are collected, without fetching further pages', async () => {
    const fetcher = new FakeFetcher({
      [searchUrl(1)]: resultsPage(range(1, 7), { label: 'Page 1 of 3' }),
      [searchUrl(2)]: resultsPage(range(8, 14), { label: 'Page 2 of 3' }),
      [searchUrl(3)]: resultsPage(range(15, 21), { label: 'Page 3 of 3' }),
    });
    const session = createSearchSession('fire', { maxArticles: 10, maxPages: 5 });

    const result = await crawlSearch(session, { fetcher, pacer: recordingPacer(), template });

    expect(fetcher.requested).toEqual([searchUrl(1), searchUrl(2)]);
    expect(result.urls).toEqual(range(1, 10));
    expect(result.pagesVisited).toBe(2);
    expect(result.stopReason).toBe('max-articles');
  });

  it('never visits more than maxPages pages', async () => {
    const fetcher = new FakeFetcher({
      [searchUrl(1)]: resultsPage(range(1, 7), { label: 'Page 1 of 99' }),
      [searchUrl(2)]: resultsPage(range(8, 14), { label: 'Page 2 of 99' }),
      [searchUrl(3)]: resultsPage(range(15, 21), { label: 'Page 3 of 99' }),
      [searchUrl(4)]: resultsPage(range(22, 28), { label: 'Page 4 of 99' }),
    });
    const session = createSearchSession('fire', { maxArticles: 100, maxPages: 3 });

    const result = await crawlSearch(session, { fetcher, pacer: recordingPacer(), template });

    expect(fetcher.requested).toHaveLength(3);
    expect(result.urls).toEqual(range(1, 21));
    expect(result.stopReason).toBe('max-pages');
  });

  it('stops when a page brings no new URLs', async () => {
    const fetcher = new FakeFetcher({
      [searchUrl(1)]: resultsPage(range(1, 7), { label: 'Page 1 of 3' }),
      [searchUrl(2)]: resultsPage(range(1, 7), { label: 'Page 2 of 3' }),
    });
    const session = createSearchSession('fire', { maxArticles: 50, maxPages: 5 });

    const result = await crawlSearch(session, { fetcher, pacer: recordingPacer(), template });

    expect(result.urls).toEqual(range(1, 7));
    expect(result.pagesVisited).toBe(2);
    expect(result.stopReason).toBe('no-new-urls');
  });

  it('stops when nothing suggests another page', async () => {
    const fetcher = new FakeFetcher({ [searchUrl(1)]: resultsPage(range(1, 3)) });
    const session = createSearchSession('fire', { maxArticles: 50, maxPages: 5 });

    const result = await crawlSearch(session, { fetcher, pacer: recordingPacer(), template });

    expect(fetcher.requested).toEqual([searchUrl(1)]);
    expect(result.urls).toEqual(range(1, 3));
    expect(result.stopReason).toBe('no-continuation');
  });

  it('follows a full page of results even without pagination markup', async () => {
    const fetcher = new FakeFetcher({
      [searchUrl(1)]: resultsPage(range(1, 7)),
      [searchUrl(2)]: resultsPage(range(8, 9)),
    });
    const session = createSearchSession('fire', { maxArticles: 50, maxPages: 5 });

    const result = await crawlSearch(session, { fetcher, pacer: recordingPacer(), template });

    expect(result.urls).toEqual(range(1, 9));
    expect(result.stopReason).toBe('no-continuation');
  });

  it('keeps what it has when a page fails to load', async () => {
    const fetcher = new FakeFetcher({ [searchUrl(1)]: resultsPage(range(1, 7), { label: 'Page 1 of 2' }) });
    const session = createSearchSession('fire', { maxArticles: 50, maxPages: 5 });

    const result = await crawlSearch(session, { fetcher, pacer: recordingPacer(), template });

    expect(fetcher.requested).toEqual([searchUrl(1), searchUrl(2)]);
    expect(result.urls).toEqual(range(1, 7));
    expect(result.pagesVisited).toBe(1);
    expect(result.stopReason).toBe('fetch-failed');
  });

  it('never returns excluded or duplicate URLs', async () => {
    const fetcher = new FakeFetcher({
      [searchUrl(1)]: resultsPage(range(1, 7), { label: 'Page 1 of 2' }),
      [searchUrl(2)]: resultsPage([...range(5, 9), articleUrl(9)], { label: 'Page 2 of 2' }),
    });
    const session = createSearchSession('fire', {
      maxArticles: 50,
      maxPages: 5,
      exclude: [articleUrl(2), articleUrl(8)],
    });

    const result = await crawlSearch(session, { fetcher, pacer: recordingPacer(), template });

    expect(result.urls).toEqual([1, 3, 4, 5, 6, 7, 9].map(articleUrl));
    expect(new Set(result.urls).size).toBe(result.urls.length);
  });

  it('pauses before every page after the first', async () => {
    const delays: number[] = [];
    const fetcher = new FakeFetcher({
      [searchUrl(1)]: resultsPage(range(1, 7), { label: 'Page 1 of 3' }),
      [searchUrl(2)]: resultsPage(range(8, 14), { label: 'Page 2 of 3' }),
      [searchUrl(3)]: resultsPage(range(15, 16), { label: 'Page 3 of 3' }),
    });
    const session = createSearchSession('fire', { maxArticles: 50, maxPages: 5 });

    await crawlSearch(session, { fetcher, pacer: recordingPacer(delays, 2500), template });

    expect(delays).toEqual([2500, 2500]);
  });
});
