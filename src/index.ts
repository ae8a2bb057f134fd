#!/usr/bin/env node
/**
 * News crawler
 *
 * Crawls a news site and writes structured article records:
 * 1. Discovers article URLs (search pagination, homepage, or a single URL)
 * 2. Fetches each article with human-paced delays
 * 3. Extracts title, body, byline, images and comments
 * 4. Saves the records as JSON
 *
 * Usage:
 *   node dist/index.js --search "fire" --max-articles 10
 *   node dist/index.js --url "https://www.nrinow.news/2025/..."
 *   node dist/index.js --max-articles 5 --separate-files --output-dir articles/
 */

import { loadExcludedUrls, parseArgs, USAGE, type CliOptions } from './cli/args.js';
import { config } from './config/index.js';
import { operationLabel, saveCombined, saveSeparate } from './output/writer.js';
import { InvalidInvocationError } from './scraper/errors.js';
import { HttpPageFetcher } from './scraper/fetcher.js';
import { CrawlSession } from './scraper/session.js';
import type { CrawlReport } from './types/index.js';
import { logger } from './utils/logger.js';

async function runOperation(session: CrawlSession, options: CliOptions, exclude: string[]): Promise<CrawlReport> {
  switch (options.operation) {
    case 'fetch-single-url':
      return session.fetchSingle(options.url ?? '');
    case 'crawl-by-keyword':
      return session.crawlByKeyword(options.keyword ?? '', {
        maxArticles: options.maxArticles,
        maxPages: options.maxPages,
        exclude,
      });
    case 'crawl-latest':
      return session.crawlLatest({ maxArticles: options.maxArticles, exclude });
  }
}

function logSummary(report: CrawlReport): void {
  logger.info(`Crawl summary: ${report.succeeded}/${report.attempted} articles scraped`);
  if (report.operation === 'crawl-by-keyword') {
    logger.info(`  Search:   "${report.keyword ?? ''}" (${report.pagesVisited} pages, ${report.urlsDiscovered} results)`);
  }
  logger.info(`  Images:   ${report.images}`);
  logger.info(`  Comments: ${report.realComments}`);
  if (report.failed > 0) {
    logger.info(`  Failed:   ${report.failed}`);
  }
  logger.info(`  Duration: ${(report.durationMs / 1000).toFixed(1)}s`);

  for (const [index, record] of report.records.entries()) {
    if (record.success) {
      logger.info({ rank: index + 1, title: record.title.slice(0, 60), author: record.author, date: record.publishDateRaw });
    } else {
      logger.warn({ rank: index + 1, url: record.url, error: record.error }, 'Article failed');
    }
  }
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  if (options.help) {
    process.stdout.write(USAGE);
    return;
  }

  logger.info({ env: config.app.env, operation: options.operation, site: config.site.url }, 'Starting crawler');

  const exclude = options.excludeFile ? await loadExcludedUrls(options.excludeFile) : [];
  const session = new CrawlSession({ fetcher: new HttpPageFetcher() });
  const report = await runOperation(session, options, exclude);

  if (report.attempted === 0) {
    logger.warn('No articles were attempted');
  }

  if (options.separateFiles) {
    await saveSeparate(report.records, { outputDir: options.outputDir });
  } else {
    await saveCombined(report.records, {
      outputDir: options.outputDir,
      label: operationLabel(report.operation, report.keyword),
    });
  }

  logSummary(report);
}

main().catch((error: unknown) => {
  if (error instanceof InvalidInvocationError) {
    logger.error(error.message);
    process.stderr.write(`Error: ${error.message}\n\n${USAGE}`);
    process.exit(2);
  }
  logger.fatal({ error }, 'Crawler failed');
  process.exit(1);
});
