/**
 * DOM text helpers shared by the extractors
 */

import type { Cheerio } from 'cheerio';
import { hasChildren, isText } from 'domhandler';
import type { AnyNode } from 'domhandler';

function collectText(node: AnyNode, parts: string[]): void {
  if (isText(node)) {
    const text = node.data.replace(/\s+/g, ' ').trim();
    if (text) {
      parts.push(text);
    }
    return;
  }

  if (hasChildren(node)) {
    for (const child of node.children) {
      collectText(child, parts);
    }
  }
}

/**
 * Visible text of a selection: every text node trimmed, empty ones dropped,
 * the rest joined with single spaces
 */
export function visibleText(selection: Cheerio<AnyNode>): string {
  const parts: string[] = [];
  for (const node of selection.toArray()) {
    collectText(node, parts);
  }
  return parts.join(' ');
}

/**
 * Whether the element's class attribute contains any of the tokens (case-insensitive)
 */
export function classContains(selection: Cheerio<AnyNode>, tokens: readonly string[]): boolean {
  const className = (selection.attr('class') ?? '').toLowerCase();
  if (!className) {
    return false;
  }
  return tokens.some((token) => className.includes(token));
}

/**
 * Resolve a possibly relative reference against a base URL
 */
export function toAbsoluteUrl(ref: string, baseUrl: string): string | null {
  try {
    return new URL(ref.trim(), baseUrl).href;
  } catch {
    return null;
  }
}
