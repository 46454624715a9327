import crypto from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import * as cheerio from 'cheerio';
import pLimit from 'p-limit';
import { request, type Dispatcher } from 'undici';
import { unpaced, type Pacer } from '../compliance/rate-limiter.js';
import { pathExists, writeJson } from '../io/json-file.js';
import type { Snapshot } from '../types/snapshot.js';
import { nowIsoSeconds } from '../utils/date.js';
import { logger } from '../utils/logger.js';

export interface DownloadOptions {
  domain: string;
  targetDate: string;
  snapshots: readonly Snapshot[];
  /** Pages land in `<outDir>/pages`, the manifest in `<outDir>/manifest.json` */
  outDir: string;
  concurrency: number;
  /** Skip pages whose file already exists */
  resume: boolean;
  userAgent: string;
  timeoutMs: number;
  pacer?: Pacer;
  dispatcher?: Dispatcher;
}

export type PageStatus = 'downloaded' | 'skipped' | 'failed';

export interface PageRecord {
  original_url: string;
  archive_url: string;
  timestamp: string;
  file: string;
  status: PageStatus;
  title: string | null;
  bytes: number;
  error: string | null;
}

export interface DownloadManifest {
  domain: string;
  target_date: string;
  generated_at: string;
  stats: { total: number; downloaded: number; skipped: number; failed: number; bytes: number };
  pages: PageRecord[];
}

const MAX_NAME_LENGTH = 120;

/** Readable, collision-free file name for a page. */
export function pageFileName(originalUrl: string): string {
  const readable = originalUrl
    .replace(/^[a-z][a-z0-9+.-]*:\/\//i, '')
    .replace(/[^A-Za-z0-9._-]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .slice(0, MAX_NAME_LENGTH);
  const hash = crypto.createHash('sha256').update(originalUrl).digest('hex').slice(0, 10);
  return `${readable || 'page'}-${hash}.html`;
}

export function extractTitle(html: string): string | null {
  const $ = cheerio.load(html);
  const title = $('title').first().text().replace(/\s+/g, ' ').trim();
  return title || null;
}

async function fetchPage(
  snapshot: Snapshot,
  options: DownloadOptions,
): Promise<{ ok: true; html: string } | { ok: false; error: string }> {
  try {
    const { statusCode, body } = await request(snapshot.archive_url, {
      method: 'GET',
      headers: { 'User-Agent': options.userAgent },
      // the archive redirects to the nearest stored capture
      maxRedirections: 3,
      headersTimeout: options.timeoutMs,
      bodyTimeout: options.timeoutMs,
      dispatcher: options.dispatcher,
    });
    const html = await body.text();
    if (statusCode !== 200) return { ok: false, error: `HTTP ${statusCode}` };
    return { ok: true, html };
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}

async function downloadOne(
  snapshot: Snapshot,
  pagesDir: string,
  options: DownloadOptions,
  pacer: Pacer,
): Promise<PageRecord> {
  const file = pageFileName(snapshot.original_url);
  const filePath = path.join(pagesDir, file);
  const record: PageRecord = {
    original_url: snapshot.original_url,
    archive_url: snapshot.archive_url,
    timestamp: snapshot.timestamp,
    file: path.posix.join('pages', file),
    status: 'failed',
    title: null,
    bytes: 0,
    error: null,
  };

  if (options.resume && (await pathExists(filePath))) {
    return { ...record, status: 'skipped' };
  }

  await pacer.acquire();
  const result = await fetchPage(snapshot, options);
  if (!result.ok) {
    logger.warn({ url: snapshot.archive_url, err: result.error }, 'Snapshot download failed');
    return { ...record, error: result.error };
  }

  try {
    await fs.writeFile(filePath, result.html, 'utf-8');
  } catch (err) {
    const error = err instanceof Error ? err.message : String(err);
    logger.warn({ file: filePath, err: error }, 'Could not save snapshot page');
    return { ...record, error };
  }
  return {
    ...record,
    status: 'downloaded',
    title: extractTitle(result.html),
    bytes: Buffer.byteLength(result.html, 'utf-8'),
  };
}

/**
 * Downloads the archived HTML of each snapshot. Failed pages get one more
 * attempt after the first pass. Writes a manifest describing every page.
 */
export async function downloadSnapshots(options: DownloadOptions): Promise<DownloadManifest> {
  const log = logger.child({ domain: options.domain, targetDate: options.targetDate });
  const pagesDir = path.join(options.outDir, 'pages');
  const pacer = options.pacer ?? unpaced;
  const limit = pLimit(Math.max(1, Math.floor(options.concurrency)));

  await fs.mkdir(pagesDir, { recursive: true });
  log.info({ pages: options.snapshots.length, concurrency: options.concurrency }, 'Starting downloads');

  const pages = await Promise.all(
    options.snapshots.map((snapshot, position) =>
      limit(async () => {
        if (position === 0 || (position + 1) % 10 === 0) {
          log.info({ current: position + 1, total: options.snapshots.length }, 'Downloading');
        }
        return downloadOne(snapshot, pagesDir, options, pacer);
      }),
    ),
  );

  const failed = pages.flatMap((page, position) => (page.status === 'failed' ? [position] : []));
  if (failed.length > 0) {
    log.info({ failed: failed.length }, 'Retrying failed downloads');
    for (const position of failed) {
      const snapshot = options.snapshots[position];
      if (!snapshot) continue;
      pages[position] = await downloadOne(snapshot, pagesDir, options, pacer);
    }
  }

  const stats = { total: pages.length, downloaded: 0, skipped: 0, failed: 0, bytes: 0 };
  for (const page of pages) {
    stats[page.status]++;
    stats.bytes += page.bytes;
  }

  const manifest: DownloadManifest = {
    domain: options.domain,
    target_date: options.targetDate,
    generated_at: nowIsoSeconds(),
    stats,
    pages,
  };
  await writeJson(path.join(options.outDir, 'manifest.json'), manifest);

  log.info(stats, 'Downloads finished');
  return manifest;
}
