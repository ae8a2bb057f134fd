/**
 * Comment Tree Extractor
 *
 * Two markup shapes are handled: the theme's own threaded list
 * (div#comments > ol.comment-list > li.comment, replies under ul.children)
 * and a generic list of selectors used by comment plugins, tried only when
 * the page has no threaded list. The result is never empty: when no
 * genuine comment is found a single metadata record explains why.
 */

import type { Cheerio, CheerioAPI } from 'cheerio';
import type { AnyNode, Element } from 'domhandler';
import { defaultTemplate, type SiteTemplate } from '../config/index.js';
import { visibleText } from '../utils/html.js';
import { logger } from '../utils/logger.js';
import type { CommentKind, CommentRecord } from '../types/index.js';

interface CommentCandidate {
  id?: string;
  text: string;
  author: string;
  dateRaw: string;
  kind: Exclude<CommentKind, 'metadata'>;
}

/**
 * Applies the noise filters and deduplication shared by both shapes.
 * Candidates with an id are deduplicated by id, the others by exact text.
 */
class CommentCollector {
  private readonly comments: CommentRecord[] = [];
  private readonly ids = new Set<string>();
  private readonly texts = new Set<string>();

  constructor(private readonly template: SiteTemplate) {}

  offer(candidate: CommentCandidate): boolean {
    const text = candidate.text.trim();
    const { minLength, noisePhrases } = this.template.comments;

    if (text.length < minLength) {
      return false;
    }

    const lower = text.toLowerCase();
    if (noisePhrases.some((phrase) => lower.includes(phrase))) {
      return false;
    }

    if (candidate.id) {
      if (this.ids.has(candidate.id)) {
        return false;
      }
      this.ids.add(candidate.id);
    } else {
      if (this.texts.has(text)) {
        return false;
      }
      this.texts.add(text);
    }

    this.comments.push({ ...candidate, text });
    return true;
  }

  get results(): CommentRecord[] {
    return this.comments;
  }
}

function metadataRecord(text: string): CommentRecord {
  return { text, author: 'System', dateRaw: 'N/A', kind: 'metadata' };
}

function commentId(el: Cheerio<AnyNode>): string | undefined {
  const raw = el.attr('id') ?? el.attr('data-comment-id') ?? '';
  const id = raw.replace(/^comment-/, '').trim();
  return id || undefined;
}

function firstNumber(text: string): number | null {
  const match = text.match(/\d+/);
  return match ? parseInt(match[0], 10) : null;
}

/**
 * Comment count as announced by the page. Used for diagnostics only.
 */
export function readCommentCount($: CheerioAPI, template: SiteTemplate = defaultTemplate): number {
  const { countHeader, container, list, item, countFallback } = template.comments;

  const header = $(countHeader).first();
  const fromHeader = header.length > 0 ? firstNumber(header.text()) : null;
  if (fromHeader !== null) {
    return fromHeader;
  }

  const listed = $(container).first().find(list).first();
  if (listed.length > 0) {
    return listed.find(item).length;
  }

  const meta = $(countFallback).first();
  return (meta.length > 0 ? firstNumber(meta.text()) : null) ?? 0;
}

type StructuredOutcome =
  | { kind: 'comments'; comments: CommentRecord[] }
  | { kind: 'empty'; reason: string; listFound: boolean };

/**
 * Threaded list of the theme
 */
export function extractStructuredComments(
  $: CheerioAPI,
  template: SiteTemplate = defaultTemplate
): StructuredOutcome {
  const { container, list, item, replyContainer } = template.comments;

  const section = $(container).first();
  if (section.length === 0) {
    return { kind: 'empty', reason: 'No comments section found', listFound: false };
  }

  const commentList = section.find(list).first();
  if (commentList.length === 0) {
    return { kind: 'empty', reason: 'No comment list found', listFound: false };
  }

  const collector = new CommentCollector(template);

  commentList.find(item).each((_, el) => {
    const entry = $(el);
    const body = entry.find('article').first();
    if (body.length === 0) {
      return;
    }

    const content = body.find('div.comment-content').first();
    if (content.length === 0) {
      return;
    }

    const cite = body.find('cite').first();
    const time = body.find('time').first();
    const isReply = entry.parents(replyContainer).length > 0;

    collector.offer({
      id: commentId(entry),
      text: visibleText(content),
      author: (cite.length > 0 ? visibleText(cite) : '') || 'Anonymous',
      dateRaw: (time.length > 0 ? visibleText(time) : '') || 'Unknown',
      kind: isReply ? 'reply' : 'comment',
    });
  });

  const comments = collector.results;
  return comments.length > 0
    ? { kind: 'comments', comments }
    : { kind: 'empty', reason: 'No comments extracted', listFound: true };
}

function firstText(scope: Cheerio<AnyNode>, selectors: readonly string[], minLength = 1): string | null {
  for (const selector of selectors) {
    const match = scope.find(selector).first();
    if (match.length === 0) {
      continue;
    }
    const text = visibleText(match);
    if (text.length >= minLength) {
      return text;
    }
  }
  return null;
}

/**
 * Plugin markup. Selectors are tried in order and the first one that
 * produces a comment is used alone, so a wrapper and its inner text node
 * are never both counted.
 */
export function extractGenericComments($: CheerioAPI, template: SiteTemplate = defaultTemplate): CommentRecord[] {
  const { genericItems, genericText, genericAuthor, genericDate, genericStripped, minLength } = template.comments;

  for (const selector of genericItems) {
    const elements = $(selector);
    if (elements.length === 0) {
      continue;
    }

    const collector = new CommentCollector(template);

    elements.each((_, el) => {
      const entry = $(el);
      const copy = entry.clone();
      copy.find(genericStripped.join(', ')).remove();

      collector.offer({
        id: commentId(entry),
        text: firstText(copy, genericText, minLength + 1) ?? visibleText(copy),
        author: firstText(copy, genericAuthor) ?? 'Anonymous',
        dateRaw: firstText(copy, genericDate) ?? 'Unknown',
        kind: entry.parents('.children, .replies').length > 0 ? 'reply' : 'comment',
      });
    });

    if (collector.results.length > 0) {
      logger.debug({ selector, count: collector.results.length }, 'Comments extracted with generic selector');
      return collector.results;
    }
  }

  return [];
}

/**
 * All comments and replies of the page, in document order
 */
export function extractComments($: CheerioAPI, template: SiteTemplate = defaultTemplate): CommentRecord[] {
  const structured = extractStructuredComments($, template);
  if (structured.kind === 'comments') {
    logger.info({ count: structured.comments.length }, 'Extracted comments/replies');
    return structured.comments;
  }

  // Items of a present threaded list were already judged there
  const generic = structured.listFound ? [] : extractGenericComments($, template);
  if (generic.length > 0) {
    logger.info({ count: generic.length }, 'Extracted comments/replies');
    return generic;
  }

  const count = readCommentCount($, template);
  return [metadataRecord(`${structured.reason} (Comment count: ${count})`)];
}
