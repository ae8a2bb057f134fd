/**
 * Article link extraction from result pages and the homepage
 */

import type { Cheerio, CheerioAPI } from 'cheerio';
import type { AnyNode } from 'domhandler';
import { defaultTemplate, type SiteTemplate } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { runStrategies } from './strategy.js';
import type { Strategy, UrlFilter } from './types.js';

/**
 * Region of the page to search for result links
 */
function resultsScope($: CheerioAPI, template: SiteTemplate): Cheerio<AnyNode> {
  const scope = $(template.links.resultsScope).first();
  return scope.length > 0 ? scope : $.root();
}

/**
 * Title links: the first anchor under each result heading
 */
export function titleLinkStrategy(template: SiteTemplate): Strategy<string[]> {
  return {
    name: 'title-links',
    extract($) {
      const hrefs: string[] = [];
      resultsScope($, template)
        .find(template.links.titleHeading)
        .each((_, heading) => {
          const href = $(heading).find('a[href]').first().attr('href');
          if (href) {
            hrefs.push(href);
          }
        });
      return hrefs;
    },
  };
}

/**
 * Every anchor in the results region
 */
export function anchorScanStrategy(template: SiteTemplate): Strategy<string[]> {
  return {
    name: 'anchor-scan',
    extract($) {
      const hrefs: string[] = [];
      resultsScope($, template)
        .find('a[href]')
        .each((_, anchor) => {
          const href = $(anchor).attr('href');
          if (href) {
            hrefs.push(href);
          }
        });
      return hrefs;
    },
  };
}

export function createLinkStrategies(template: SiteTemplate): Strategy<string[]>[] {
  return [titleLinkStrategy(template), anchorScanStrategy(template)];
}

function originPrefix(baseUrl: string): string {
  try {
    return `${new URL(baseUrl).origin}/`;
  } catch {
    return `${baseUrl.replace(/\/+$/, '')}/`;
  }
}

/**
 * Whether an href points at an article of the site
 */
export function isArticleUrl(href: string, baseUrl: string, template: SiteTemplate = defaultTemplate): boolean {
  const { articlePath, excludedFragments, excludedSuffixes } = template.links;
  return (
    href.startsWith(originPrefix(baseUrl)) &&
    articlePath.test(href) &&
    !excludedFragments.some((fragment) => href.includes(fragment)) &&
    !excludedSuffixes.some((suffix) => href.endsWith(suffix))
  );
}

function acceptLinks(
  hrefs: readonly string[],
  baseUrl: string,
  exclude: UrlFilter,
  template: SiteTemplate
): string[] {
  const accepted: string[] = [];
  const onPage = new Set<string>();

  for (const href of hrefs) {
    if (onPage.has(href) || exclude.has(href) || !isArticleUrl(href, baseUrl, template)) {
      continue;
    }
    onPage.add(href);
    accepted.push(href);
  }

  return accepted;
}

/**
 * Candidate article URLs in page order. The title-link strategy is tried
 * first; the anchor scan only runs when it finds nothing.
 */
export function extractLinks(
  $: CheerioAPI,
  baseUrl: string,
  exclude: UrlFilter = new Set<string>(),
  template: SiteTemplate = defaultTemplate
): string[] {
  const strategies = createLinkStrategies(template).map(
    (strategy): Strategy<string[]> => ({
      name: strategy.name,
      extract: (dom) => acceptLinks(strategy.extract(dom) ?? [], baseUrl, exclude, template),
    })
  );

  const hit = runStrategies($, strategies, (links) => links.length > 0);
  if (!hit) {
    logger.debug({ baseUrl }, 'No article links found');
    return [];
  }

  logger.debug({ baseUrl, strategy: hit.strategy, count: hit.value.length }, 'Article links extracted');
  return hit.value;
}
