/**
 * Result writers
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { logger } from '../utils/logger.js';
import type { ArticleRecord, CrawlOperation } from '../types/index.js';
import { articleFileName, timestamp } from './filename.js';

async function writeJson(path: string, value: unknown): Promise<void> {
  await writeFile(path, JSON.stringify(value, null, 2), 'utf-8');
}

/**
 * Operation label used in combined file names, e.g. `search_fire_safety`
 */
export function operationLabel(operation: CrawlOperation, keyword?: string): string {
  switch (operation) {
    case 'crawl-by-keyword':
      return `search_${(keyword ?? '').replace(/[^\p{L}\p{N}]+/gu, '_').replace(/^_+|_+$/g, '')}`;
    case 'fetch-single-url':
      return 'single_url';
    case 'crawl-latest':
      return 'latest';
  }
}

/**
 * All records in one JSON file. Returns the file path.
 */
export async function saveCombined(
  records: readonly ArticleRecord[],
  options: { outputDir: string; label: string; now?: Date }
): Promise<string> {
  await mkdir(options.outputDir, { recursive: true });
  const path = join(options.outputDir, `crawl_results_${options.label}_${timestamp(options.now)}.json`);
  await writeJson(path, records);
  logger.info({ path, count: records.length }, 'Results saved');
  return path;
}

/**
 * One JSON file per successful record. Returns the file names written.
 */
export async function saveSeparate(
  records: readonly ArticleRecord[],
  options: { outputDir: string; now?: Date }
): Promise<string[]> {
  await mkdir(options.outputDir, { recursive: true });
  const fallbackDate = timestamp(options.now).slice(0, 8);
  const saved: string[] = [];

  for (const [index, record] of records.entries()) {
    if (!record.success) {
      continue;
    }
    const fileName = articleFileName(record, index + 1, fallbackDate);
    await writeJson(join(options.outputDir, fileName), record);
    saved.push(fileName);
  }

  logger.info({ outputDir: options.outputDir, count: saved.length }, 'Individual article files saved');
  return saved;
}
