/**
 * Command line options
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { config } from '../config/index.js';
import { InvalidInvocationError } from '../scraper/errors.js';
import type { CrawlOperation } from '../types/index.js';

export interface CliOptions {
  operation: CrawlOperation;
  keyword?: string;
  url?: string;
  maxArticles: number;
  maxPages: number;
  outputDir: string;
  separateFiles: boolean;
  excludeFile?: string;
  help: boolean;
}

export const USAGE = `Usage: newsroom-crawler [options]

  --search <keyword>     Crawl search results for a keyword
  --url <url>            Scrape a single article URL
  (neither)              Crawl the latest articles from the homepage

  --max-articles <n>     Maximum number of articles to scrape (default: ${config.crawl.maxArticles})
  --max-pages <n>        Maximum search result pages to check (default: ${config.crawl.maxPages})
  --output-dir <dir>     Directory to save results (default: ${config.output.dir})
  --separate-files       Save each article as a separate JSON file
  --exclude <file>       File of already-seen URLs (JSON array or one per line)
  --help                 Show this message
`;

const optionsSchema = z.object({
  search: z.string().trim().min(1, '--search needs a keyword').optional(),
  url: z.string().url('--url must be an absolute URL').optional(),
  maxArticles: z.coerce.number().int().positive('--max-articles must be a positive integer'),
  maxPages: z.coerce.number().int().positive('--max-pages must be a positive integer'),
  outputDir: z.string().min(1),
  exclude: z.string().min(1).optional(),
});

const VALUE_FLAGS = ['--search', '--url', '--max-articles', '--max-pages', '--output-dir', '--exclude'];
const SWITCHES = ['--separate-files', '--help'];

function collectFlags(args: readonly string[]): Map<string, string> {
  const values = new Map<string, string>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (SWITCHES.includes(arg)) {
      continue;
    }
    if (!VALUE_FLAGS.includes(arg)) {
      throw new InvalidInvocationError(`Unknown argument: ${arg}`);
    }
    const value = args[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new InvalidInvocationError(`${arg} needs a value`);
    }
    values.set(arg, value);
    i++;
  }

  return values;
}

/**
 * Parse and validate arguments (without the node and script paths)
 */
export function parseArgs(args: readonly string[], siteOrigin: string = config.site.url): CliOptions {
  const flags = collectFlags(args);

  const parsed = optionsSchema.safeParse({
    search: flags.get('--search'),
    url: flags.get('--url'),
    maxArticles: flags.get('--max-articles') ?? config.crawl.maxArticles,
    maxPages: flags.get('--max-pages') ?? config.crawl.maxPages,
    outputDir: flags.get('--output-dir') ?? config.output.dir,
    exclude: flags.get('--exclude'),
  });

  if (!parsed.success) {
    const message = parsed.error.issues.map((issue) => issue.message).join('; ');
    throw new InvalidInvocationError(message);
  }

  const { search, url, maxArticles, maxPages, outputDir, exclude } = parsed.data;

  if (search !== undefined && url !== undefined) {
    throw new InvalidInvocationError('Cannot use both --url and --search: pick one operation');
  }

  const origin = siteOrigin.replace(/\/+$/, '');
  if (url !== undefined && !url.startsWith(`${origin}/`)) {
    throw new InvalidInvocationError(`URL must be from ${origin} (got ${url})`);
  }

  const operation: CrawlOperation =
    url !== undefined ? 'fetch-single-url' : search !== undefined ? 'crawl-by-keyword' : 'crawl-latest';

  return {
    operation,
    ...(search !== undefined ? { keyword: search } : {}),
    ...(url !== undefined ? { url } : {}),
    maxArticles,
    maxPages,
    outputDir,
    separateFiles: args.includes('--separate-files'),
    ...(exclude !== undefined ? { excludeFile: exclude } : {}),
    help: args.includes('--help'),
  };
}

/**
 * Parse an exclude list: a JSON array of URLs, or one URL per line
 */
export function parseExcludeList(content: string): string[] {
  const trimmed = content.trim();
  if (!trimmed) {
    return [];
  }

  if (trimmed.startsWith('[')) {
    let json: unknown;
    try {
      json = JSON.parse(trimmed);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new InvalidInvocationError(`Exclude file is not valid JSON: ${message}`);
    }
    const parsed = z.array(z.string()).safeParse(json);
    if (!parsed.success) {
      throw new InvalidInvocationError('Exclude file must be a JSON array of URL strings');
    }
    return parsed.data.map((url) => url.trim()).filter(Boolean);
  }

  return trimmed
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith('#'));
}

export async function loadExcludedUrls(path: string): Promise<string[]> {
  return parseExcludeList(await readFile(path, 'utf-8'));
}
