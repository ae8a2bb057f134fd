/**
 * Site template
 *
 * Selector tables for the target site's WordPress theme. Every list is ordered:
 * earlier entries win over later ones.
 */

export interface SiteTemplate {
  /** Canonical origin, without trailing slash */
  origin: string;

  links: {
    /** Region of a results page holding the result list */
    resultsScope: string;
    /** Headings wrapping the title link of each result */
    titleHeading: string;
    /** Path segment every article URL carries */
    articlePath: RegExp;
    excludedFragments: readonly string[];
    excludedSuffixes: readonly string[];
  };

  pagination: {
    nav: string;
    label: string;
    /** Nominal number of results on a full page */
    resultsPerPage: number;
  };

  article: {
    titleTags: readonly string[];
    titleTokens: readonly string[];
    titleFallback: string;
    bodyCandidates: readonly string[];
    stripped: readonly string[];
    minBodyLength: number;
    authorTags: readonly string[];
    authorTokens: readonly string[];
    dateTags: readonly string[];
    dateTokens: readonly string[];
    bylineFallback: string;
  };

  images: {
    containers: readonly string[];
    minDimension: number;
    denylist: readonly string[];
    featuredLabel: string;
  };

  comments: {
    container: string;
    list: string;
    item: string;
    replyContainer: string;
    countHeader: string;
    countFallback: string;
    /** Plugin selectors tried when the theme's own list is absent */
    genericItems: readonly string[];
    genericText: readonly string[];
    genericAuthor: readonly string[];
    genericDate: readonly string[];
    genericStripped: readonly string[];
    minLength: number;
    noisePhrases: readonly string[];
  };
}

export function createSiteTemplate(origin: string, resultsPerPage = 7): SiteTemplate {
  return {
    origin: origin.replace(/\/+$/, ''),

    links: {
      resultsScope: 'div.td-main-content-wrap',
      titleHeading: 'h3.entry-title',
      articlePath: /\/20\d{2}\//,
      excludedFragments: ['/page/'],
      excludedSuffixes: ['#comments', '#respond'],
    },

    pagination: {
      nav: 'div.page-nav',
      label: 'span.pages',
      resultsPerPage,
    },

    article: {
      titleTags: ['h1', 'h2'],
      titleTokens: ['title', 'headline', 'entry-title'],
      titleFallback: 'No title found',
      bodyCandidates: [
        '.pf-content',
        '.td-post-content',
        '.entry-content',
        '.post-content',
        '.article-content',
        '[class*="content"]',
        'article',
        '.post',
      ],
      stripped: ['script', 'style', 'nav', 'aside'],
      minBodyLength: 100,
      authorTags: ['span', 'div', 'p'],
      authorTokens: ['author'],
      dateTags: ['time', 'span'],
      dateTokens: ['date', 'published', 'time'],
      bylineFallback: 'Unknown',
    },

    images: {
      containers: ['.pf-content', '.td-post-content', '.entry-content', 'article'],
      minDimension: 50,
      denylist: ['emoji', 'printfriendly', 'gravatar', 'icon-', 'button'],
      featuredLabel: 'Featured Image',
    },

    comments: {
      container: 'div#comments, div.comments',
      list: 'ol.comment-list',
      item: 'li.comment',
      replyContainer: 'ul.children',
      countHeader: 'h4.td-comments-title',
      countFallback: '.td-post-comments a',
      genericItems: [
        '.wpd-comment',
        '.dsq-comment',
        'li.comment',
        'div.comment',
        '.comment-body',
        '.comment-content',
      ],
      genericText: ['.comment-content', '.comment-text', '.comment-body', 'p'],
      genericAuthor: [
        '.comment-author',
        '.comment-author-name',
        '.author',
        '.comment-meta .author',
        '[class*="author"]',
      ],
      genericDate: ['.comment-date', '.comment-time', 'time', '.date', '[class*="date"]', '[class*="time"]'],
      genericStripped: ['script', 'style', 'button', 'form'],
      minLength: 10,
      noisePhrases: ['leave a reply', 'cancel reply', 'comment:', 'your email'],
    },
  };
}
