import { describe, expect, it } from 'vitest';
import {
  FakeFetcher,
  ORIGIN,
  articlePage,
  articleUrl,
  recordingPacer,
  resultsPage,
  template,
} from '../test-utils/pages.js';
import { InvalidInvocationError } from './errors.js';
import { buildSearchUrl } from './pagination.js';
import { CrawlSession } from './session.js';

function session(pages: Record<string, string>, delays: number[] = []) {
  const fetcher = new FakeFetcher(pages);
  const crawl = new CrawlSession({
    fetcher,
    pacer: recordingPacer(delays, 1, 2),
    template,
    sessionId: 'test-session',
  });
  return { fetcher, crawl };
}

function articles(...ids: number[]): Record<string, string> {
  return Object.fromEntries(ids.map((id) => [articleUrl(id), articlePage({ title: `Story number ${id}` })]));
}

const COMMENTS = `
  <div id="comments">
    <ol class="comment-list">
      <li class="comment" id="comment-1"><article><cite>Ann</cite><div class="comment-content"><p>Thanks for covering this.</p></div></article></li>
      <li class="comment" id="comment-2"><article><cite>Bo</cite><div class="comment-content"><p>Stay safe out there, everyone.</p></div></article></li>
    </ol>
  </div>
`;

describe('CrawlSession.crawlByKeyword', () => {
  it('keeps going past a failed article and records the failure in place', async () => {
    const delays: number[] = [];
    const searchUrl = buildSearchUrl(ORIGIN, 'fire', 1);
    const { fetcher, crawl } = session(
      {
        [searchUrl]: resultsPage([1, 2, 3, 4, 5].map(articleUrl)),
        ...articles(1, 2, 4, 5),
      },
      delays
    );

    const report = await crawl.crawlByKeyword('fire', { maxArticles: 10, maxPages: 3 });

    expect(fetcher.requested).toEqual([searchUrl, ...[1, 2, 3, 4, 5].map(articleUrl)]);
    expect(report.records.map((record) => record.url)).toEqual([1, 2, 3, 4, 5].map(articleUrl));
    expect(report.records[2]).toEqual({
      url: articleUrl(3),
      title: '',
      bodyText: '',
      author: '',
      publishDateRaw: '',
      bodyLength: 0,
      images: [],
      comments: [],
      success: false,
      error: 'Failed to load page',
      search: { keyword: 'fire', rank: 3, totalResults: 5, pagesSearched: 1 },
    });
    expect(report.records[3]?.title).toBe('Story number 4');
    expect(report).toMatchObject({
      operation: 'crawl-by-keyword',
      sessionId: 'test-session',
      keyword: 'fire',
      urlsDiscovered: 5,
      pagesVisited: 1,
      attempted: 5,
      succeeded: 4,
      failed: 1,
      realComments: 0,
      images: 0,
    });
    expect(delays).toEqual([2, 2, 2, 2]);
  });

  it('returns an empty report when the search finds nothing', async () => {
    const searchUrl = buildSearchUrl(ORIGIN, 'zebra', 1);
    const { crawl } = session({ [searchUrl]: resultsPage([]) });

    const report = await crawl.crawlByKeyword('zebra', { maxArticles: 5, maxPages: 3 });

    expect(report.records).toEqual([]);
    expect(report.attempted).toBe(0);
    expect(report.pagesVisited).toBe(1);
    expect(report.urlsDiscovered).toBe(0);
  });

  it('rejects invalid bounds and empty keywords', async () => {
    const { crawl, fetcher } = session({});

    await expect(crawl.crawlByKeyword('fire', { maxArticles: 0, maxPages: 3 })).rejects.toThrow(InvalidInvocationError);
    await expect(crawl.crawlByKeyword('fire', { maxArticles: 5, maxPages: 1.5 })).rejects.toThrow(InvalidInvocationError);
    await expect(crawl.crawlByKeyword('   ', { maxArticles: 5, maxPages: 3 })).rejects.toThrow(
      'Search keyword must not be empty'
    );
    expect(fetcher.requested).toEqual([]);
  });
});

describe('CrawlSession.streamByKeyword', () => {
  it('fetches articles only as records are consumed', async () => {
    const searchUrl = buildSearchUrl(ORIGIN, 'fire', 1);
    const { fetcher, crawl } = session({
      [searchUrl]: resultsPage([1, 2, 3].map(articleUrl)),
      ...articles(1, 2, 3),
    });

    const titles: string[] = [];
    for await (const record of crawl.streamByKeyword('fire', { maxArticles: 3, maxPages: 1 })) {
      titles.push(record.title);
      break;
    }

    expect(titles).toEqual(['Story number 1']);
    expect(fetcher.requested).toEqual([searchUrl, articleUrl(1)]);
  });
});

describe('CrawlSession.crawlLatest', () => {
  it('scrapes the newest homepage links that were not seen before', async () => {
    const { fetcher, crawl } = session({
      [`${ORIGIN}/`]: resultsPage([1, 2, 3, 4].map(articleUrl)),
      ...articles(1, 2, 3, 4),
    });

    const report = await crawl.crawlLatest({ maxArticles: 2, exclude: [articleUrl(2)] });

    expect(fetcher.requested).toEqual([`${ORIGIN}/`, articleUrl(1), articleUrl(3)]);
    expect(report.records.map((record) => record.title)).toEqual(['Story number 1', 'Story number 3']);
    expect(report).toMatchObject({ operation: 'crawl-latest', urlsDiscovered: 3, pagesVisited: 1, succeeded: 2 });
    expect(report.keyword).toBeUndefined();
  });

  it('returns an empty report when the homepage fails', async () => {
    const { crawl } = session({});

    const report = await crawl.crawlLatest({ maxArticles: 3 });

    expect(report.attempted).toBe(0);
    expect(report.pagesVisited).toBe(0);
  });
});

describe('CrawlSession.fetchSingle', () => {
  it('scrapes one article and counts real comments and images', async () => {
    const url = articleUrl(7);
    const { crawl } = session({
      [url]: articlePage({ ogImage: 'https://cdn.example.com/lead.jpg', extra: COMMENTS }),
    });

    const report = await crawl.fetchSingle(url);

    expect(report.operation).toBe('fetch-single-url');
    expect(report.records).toHaveLength(1);
    expect(report.records[0]?.comments.map((comment) => comment.author)).toEqual(['Ann', 'Bo']);
    expect(report.realComments).toBe(2);
    expect(report.images).toBe(1);
  });

  it('rejects URLs from other sites without fetching', async () => {
    const { crawl, fetcher } = session({});

    await expect(crawl.fetchSingle('https://elsewhere.example.org/2025/07/01/story/')).rejects.toThrow(
      InvalidInvocationError
    );
    expect(fetcher.requested).toEqual([]);
  });

  it('reports a fetch failure as a failed record', async () => {
    const { crawl } = session({});

    const report = await crawl.fetchSingle(articleUrl(9));

    expect(report.failed).toBe(1);
    expect(report.records[0]?.success).toBe(false);
  });
});
