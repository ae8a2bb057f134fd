/**
 * File naming for per-article output
 */

import type { ArticleRecord } from '../types/index.js';

const MONTHS = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

const SKIP_WORDS = new Set(['the', 'and', 'for', 'with', 'from']);

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

function toStamp(year: number, month: number, day: number): string | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return `${year}${pad(month)}${pad(day)}`;
}

function monthIndex(name: string): number | null {
  const lower = name.toLowerCase();
  const index = MONTHS.findIndex((month) => month === lower || (lower.length === 3 && month.startsWith(lower)));
  return index >= 0 ? index + 1 : null;
}

/**
 * Parse a displayed publish date into YYYYMMDD.
 *
 * Accepts "March 20, 2025", "Mar 20, 2025", "March 20 2025", "2025-03-20",
 * "03/20/2025" and "20/03/2025" (month-first is tried before day-first).
 */
export function parsePublishDate(raw: string): string | null {
  const text = raw.trim();
  if (!text || ['unknown', 'n/a'].includes(text.toLowerCase())) {
    return null;
  }

  const named = text.match(/^([A-Za-z]+)\s+(\d{1,2}),?\s+(\d{4})$/);
  if (named?.[1] && named[2] && named[3]) {
    const month = monthIndex(named[1]);
    return month ? toStamp(parseInt(named[3], 10), month, parseInt(named[2], 10)) : null;
  }

  const iso = text.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (iso?.[1] && iso[2] && iso[3]) {
    return toStamp(parseInt(iso[1], 10), parseInt(iso[2], 10), parseInt(iso[3], 10));
  }

  const slashed = text.match(/^(\d{2})\/(\d{2})\/(\d{4})$/);
  if (slashed?.[1] && slashed[2] && slashed[3]) {
    const first = parseInt(slashed[1], 10);
    const second = parseInt(slashed[2], 10);
    const year = parseInt(slashed[3], 10);
    return toStamp(year, first, second) ?? toStamp(year, second, first);
  }

  return null;
}

/**
 * Up to three meaningful words of the title, joined with underscores
 */
export function titleSlug(title: string): string {
  const words: string[] = [];

  for (const word of title.split(/\s+/).slice(0, 6)) {
    const clean = word.replace(/[^\p{L}\p{N}]/gu, '');
    if (clean.length > 2 && !SKIP_WORDS.has(clean.toLowerCase())) {
      words.push(clean);
    }
    if (words.length >= 3) {
      break;
    }
  }

  return words.join('_').slice(0, 30) || 'article';
}

/**
 * `<slug>_<YYYYMMDD>_<###>.json`, falling back to `fallbackDate` when the
 * publish date cannot be parsed
 */
export function articleFileName(record: ArticleRecord, index: number, fallbackDate: string): string {
  const datePart = parsePublishDate(record.publishDateRaw) ?? fallbackDate;
  return `${titleSlug(record.title)}_${datePart}_${pad(index, 3)}.json`;
}

/**
 * Local timestamp as YYYYMMDD_HHMMSS
 */
export function timestamp(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
