/**
 * Environment variable validation using Zod
 */

import { z } from 'zod';
import 'dotenv/config';

const envSchema = z
  .object({
    // Target site
    SITE_URL: z.string().url().default('https://www.nrinow.news'),
    RESULTS_PER_PAGE: z.coerce.number().int().positive().default(7),

    // Fetching
    USER_AGENT: z
      .string()
      .default(
        'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'
      ),
    FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

    // Pacing
    PAGE_DELAY_MIN_MS: z.coerce.number().int().nonnegative().default(2000),
    PAGE_DELAY_MAX_MS: z.coerce.number().int().nonnegative().default(4000),
    ARTICLE_DELAY_MIN_MS: z.coerce.number().int().nonnegative().default(3000),
    ARTICLE_DELAY_MAX_MS: z.coerce.number().int().nonnegative().default(7000),

    // Crawl bounds
    MAX_ARTICLES: z.coerce.number().int().positive().default(3),
    MAX_PAGES: z.coerce.number().int().positive().default(15),

    // Output
    OUTPUT_DIR: z.string().default('.'),

    // Logging
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    LOG_FILE: z.string().optional(),

    // Environment
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  })
  .refine((e) => e.PAGE_DELAY_MIN_MS <= e.PAGE_DELAY_MAX_MS, {
    message: 'PAGE_DELAY_MIN_MS must not exceed PAGE_DELAY_MAX_MS',
    path: ['PAGE_DELAY_MIN_MS'],
  })
  .refine((e) => e.ARTICLE_DELAY_MIN_MS <= e.ARTICLE_DELAY_MAX_MS, {
    message: 'ARTICLE_DELAY_MIN_MS must not exceed ARTICLE_DELAY_MAX_MS',
    path: ['ARTICLE_DELAY_MIN_MS'],
  });

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.format();
    throw new Error(`Environment validation failed:\n${JSON.stringify(errors, null, 2)}`);
  }

  return result.data;
}

export const env = validateEnv();
