import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  DATA_DIR: z.string().default('.'),
  CDX_API_URL: z.string().url().default('http://web.archive.org/cdx/search/cdx'),
  ARCHIVE_BASE_URL: z.string().url().default('https://web.archive.org/web'),
  USER_AGENT: z.string().default('WaybackSnapshots/1.0 (research project)'),
  WINDOW_DAYS: z.coerce.number().int().positive().default(90),
  DOMAIN_QUERY_LIMIT: z.coerce.number().int().positive().default(100000),
  BATCH_QUERY_LIMIT: z.coerce.number().int().positive().default(10000),
  PARALLELISM: z.coerce.number().int().positive().default(8),
  SEQUENTIAL_THRESHOLD: z.coerce.number().int().nonnegative().default(20),
  SEQUENTIAL_DELAY_MS: z.coerce.number().int().nonnegative().default(500),
  QUERY_HEADERS_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  QUERY_BODY_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),
  QUERY_RETRIES: z.coerce.number().int().nonnegative().default(0),
  QUERY_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(5000),
  DOWNLOAD_CONCURRENCY: z.coerce.number().int().positive().default(3),
  DOWNLOAD_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  DOWNLOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
});

export const config = envSchema.parse(process.env);
export type Config = z.infer<typeof envSchema>;
