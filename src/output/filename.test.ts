import { describe, expect, it } from 'vitest';
import { failedArticle } from '../scraper/records.js';
import { articleFileName, parsePublishDate, timestamp, titleSlug } from './filename.js';

describe('parsePublishDate', () => {
  it.each([
    ['March 20, 2025', '20250320'],
    ['Mar 20 2025', '20250320'],
    ['July 29, 2025', '20250729'],
    ['2025-07-29', '20250729'],
    ['07/29/2025', '20250729'],
    ['29/07/2025', '20250729'],
  ])('parses %s', (raw, expected) => {
    expect(parsePublishDate(raw)).toBe(expected);
  });

  it.each(['Unknown', 'N/A', '', 'Smarch 1, 2025', '02/30/2025', 'Yesterday'])('rejects %j', (raw) => {
    expect(parsePublishDate(raw)).toBeNull();
  });
});

describe('titleSlug', () => {
  it('keeps the first three meaningful words', () => {
    expect(titleSlug('After fire destroys home, Burrillville couple looks to raise awareness')).toBe(
      'After_fire_destroys'
    );
    expect(titleSlug('The fire and the flood')).toBe('fire_flood');
  });

  it('caps the slug at thirty characters', () => {
    expect(titleSlug('Extraordinarily Comprehensive Infrastructure')).toBe('Extraordinarily_Comprehensive_');
  });

  it('falls back when no word qualifies', () => {
    expect(titleSlug('A to Z')).toBe('article');
  });
});

describe('articleFileName', () => {
  const record = {
    ...failedArticle('https://news.example.com/2025/07/29/fire/', 'unused'),
    title: 'Fire destroys home on Main Street',
    publishDateRaw: 'July 29, 2025',
  };

  it('combines slug, publish date and index', () => {
    expect(articleFileName(record, 4, '20250801')).toBe('Fire_destroys_home_20250729_004.json');
  });

  it('uses the fallback date when the publish date is unreadable', () => {
    expect(articleFileName({ ...record, publishDateRaw: 'Unknown' }, 12, '20250801')).toBe(
      'Fire_destroys_home_20250801_012.json'
    );
  });
});

describe('timestamp', () => {
  it('formats local time', () => {
    expect(timestamp(new Date(2025, 6, 29, 8, 5, 9))).toBe('20250729_080509');
  });
});
