/**
 * Article Content Extractor
 *
 * Title, body, byline, images and comments of one article page. Every field
 * has an ordered list of strategies; a missing field becomes a sentinel
 * value rather than a failure.
 */

import type { CheerioAPI } from 'cheerio';
import { defaultTemplate, type SiteTemplate } from '../config/index.js';
import { classContains, visibleText } from '../utils/html.js';
import { logger } from '../utils/logger.js';
import type { ArticleRecord } from '../types/index.js';
import { extractComments } from './comment-extractor.js';
import { extractImages } from './image-extractor.js';
import { failedArticle } from './records.js';
import { runStrategies } from './strategy.js';
import type { Strategy } from './types.js';

/**
 * First element among `tags` whose class contains one of `tokens`
 */
function classedElementStrategy(name: string, tags: readonly string[], tokens: readonly string[]): Strategy<string> {
  return {
    name,
    extract($) {
      const match = $(tags.join(', '))
        .filter((_, el) => classContains($(el), tokens))
        .first();
      if (match.length === 0) {
        return null;
      }
      const text = visibleText(match);
      return text || null;
    },
  };
}

/**
 * Body text of the first element matching `selector`, with non-content
 * subtrees removed from a copy of it
 */
function bodyCandidateStrategy(selector: string, stripped: readonly string[]): Strategy<string> {
  return {
    name: selector,
    extract($) {
      const container = $(selector).first();
      if (container.length === 0) {
        return null;
      }
      const copy = container.clone();
      copy.find(stripped.join(', ')).remove();
      return visibleText(copy);
    },
  };
}

export function titleStrategies(template: SiteTemplate): Strategy<string>[] {
  const { titleTags, titleTokens } = template.article;
  return [classedElementStrategy('classed-heading', titleTags, titleTokens)];
}

export function bodyStrategies(template: SiteTemplate): Strategy<string>[] {
  return template.article.bodyCandidates.map((selector) => bodyCandidateStrategy(selector, template.article.stripped));
}

export function extractTitle($: CheerioAPI, template: SiteTemplate = defaultTemplate): string {
  return runStrategies($, titleStrategies(template))?.value ?? template.article.titleFallback;
}

/**
 * First candidate with at least `minBodyLength` characters. When none has,
 * the text of the last candidate present on the page is kept.
 */
export function extractBody($: CheerioAPI, template: SiteTemplate = defaultTemplate): string {
  let last = '';

  for (const strategy of bodyStrategies(template)) {
    const text = strategy.extract($);
    if (text === null) {
      continue;
    }
    if (text.length >= template.article.minBodyLength) {
      logger.debug({ selector: strategy.name, length: text.length }, 'Body candidate accepted');
      return text;
    }
    last = text;
  }

  return last;
}

export function extractAuthor($: CheerioAPI, template: SiteTemplate = defaultTemplate): string {
  const { authorTags, authorTokens, bylineFallback } = template.article;
  return runStrategies($, [classedElementStrategy('author', authorTags, authorTokens)])?.value ?? bylineFallback;
}

export function extractPublishDate($: CheerioAPI, template: SiteTemplate = defaultTemplate): string {
  const { dateTags, dateTokens, bylineFallback } = template.article;
  return runStrategies($, [classedElementStrategy('date', dateTags, dateTokens)])?.value ?? bylineFallback;
}

/**
 * Extract a full article record. Unexpected errors produce a failed record
 * carrying the error message.
 */
export function extractArticle($: CheerioAPI, url: string, template: SiteTemplate = defaultTemplate): ArticleRecord {
  try {
    const title = extractTitle($, template);
    const bodyText = extractBody($, template);
    const author = extractAuthor($, template);
    const publishDateRaw = extractPublishDate($, template);
    const images = extractImages($, url, template);
    const comments = extractComments($, template);

    logger.info(
      { url, title: title.slice(0, 50), contentLength: bodyText.length, images: images.length },
      'Extracted article'
    );

    return {
      url,
      title,
      bodyText,
      author,
      publishDateRaw,
      bodyLength: bodyText.length,
      images,
      comments,
      success: true,
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ error, url }, 'Content extraction error');
    return failedArticle(url, message);
  }
}
