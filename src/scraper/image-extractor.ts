/**
 * Image extraction
 *
 * Featured image first (Open Graph, then Twitter card), then the images of
 * the article body. Icons, spacers and UI sprites are dropped.
 */

import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { defaultTemplate, type SiteTemplate } from '../config/index.js';
import { classContains, toAbsoluteUrl, visibleText } from '../utils/html.js';
import type { ImageRecord } from '../types/index.js';

function parseDimension(value: string | undefined): number | undefined {
  if (value === undefined || !/^\s*\d+\s*$/.test(value)) {
    return undefined;
  }
  return parseInt(value, 10);
}

/**
 * Featured image from social meta tags
 */
export function extractFeaturedImage(
  $: CheerioAPI,
  baseUrl: string,
  template: SiteTemplate = defaultTemplate
): ImageRecord | null {
  const candidates = [
    $('meta[property="og:image"]').first().attr('content'),
    $('meta[name="twitter:image"]').first().attr('content'),
  ];

  for (const content of candidates) {
    const sourceUrl = content?.trim() ? toAbsoluteUrl(content, baseUrl) : null;
    if (sourceUrl) {
      const label = template.images.featuredLabel;
      return {
        sourceUrl,
        altText: label,
        titleText: label,
        cssClasses: ['featured-image'],
        caption: label,
      };
    }
  }

  return null;
}

/**
 * Caption from an enclosing figure, else from a caption-classed sibling
 */
export function findCaption($: CheerioAPI, img: Cheerio<Element>): string {
  const figcaption = img.closest('figure').find('figcaption').first();
  if (figcaption.length > 0) {
    return visibleText(figcaption);
  }

  const captioned = img
    .parent()
    .find('p, div, span')
    .filter((_, el) => classContains($(el), ['caption']))
    .first();

  return captioned.length > 0 ? visibleText(captioned) : '';
}

function isDecorative(sourceUrl: string, template: SiteTemplate): boolean {
  const lower = sourceUrl.toLowerCase();
  return template.images.denylist.some((pattern) => lower.includes(pattern));
}

/**
 * All article images, featured first, unique by source URL
 */
export function extractImages(
  $: CheerioAPI,
  baseUrl: string,
  template: SiteTemplate = defaultTemplate
): ImageRecord[] {
  const images: ImageRecord[] = [];
  const seen = new Set<string>();

  const featured = extractFeaturedImage($, baseUrl, template);
  if (featured) {
    images.push(featured);
    seen.add(featured.sourceUrl);
  }

  const containers = $(template.images.containers.join(', '));
  const imgTags = containers.length > 0 ? containers.find('img') : $('img');

  imgTags.each((_, el) => {
    const img = $(el);
    const src = img.attr('src') || img.attr('data-src');
    if (!src) {
      return;
    }

    const sourceUrl = toAbsoluteUrl(src, baseUrl);
    if (!sourceUrl) {
      return;
    }

    const width = parseDimension(img.attr('width'));
    const height = parseDimension(img.attr('height'));
    const { minDimension } = template.images;
    if (width !== undefined && height !== undefined && (width < minDimension || height < minDimension)) {
      return;
    }

    if (isDecorative(sourceUrl, template) || seen.has(sourceUrl)) {
      return;
    }

    seen.add(sourceUrl);
    images.push({
      sourceUrl,
      altText: (img.attr('alt') ?? '').trim(),
      titleText: (img.attr('title') ?? '').trim(),
      ...(width !== undefined ? { width } : {}),
      ...(height !== undefined ? { height } : {}),
      cssClasses: (img.attr('class') ?? '').split(/\s+/).filter(Boolean),
      caption: findCaption($, img),
    });
  });

  return images;
}
