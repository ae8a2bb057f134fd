/**
 * Article record helpers
 */

import type { CommentRecord, FailedArticle } from '../types/index.js';

export const FETCH_FAILED_MESSAGE = 'Failed to load page';

/**
 * Record for an article that could not be fetched or extracted
 */
export function failedArticle(url: string, error: string): FailedArticle {
  return {
    url,
    title: '',
    bodyText: '',
    author: '',
    publishDateRaw: '',
    bodyLength: 0,
    images: [],
    comments: [],
    success: false,
    error,
  };
}

/**
 * Comments excluding the metadata sentinel
 */
export function countRealComments(comments: readonly CommentRecord[]): number {
  return comments.filter((comment) => comment.kind !== 'metadata').length;
}
