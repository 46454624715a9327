import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { MockAgent } from 'undici';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { downloadSnapshots, extractTitle, pageFileName } from '../../src/download/snapshot-downloader.js';
import type { Snapshot } from '../../src/types/snapshot.js';
import { CountingPacer } from '../helpers/archive.js';

function snapshot(originalUrl: string): Snapshot {
  return {
    archive_url: `https://web.archive.org/web/20191110000000/${originalUrl}`,
    timestamp: '20191110000000',
    original_url: originalUrl,
    status_code: '200',
    size_bytes: 6000,
    days_diff: 5,
  };
}

describe('pageFileName', () => {
  it('should keep a readable prefix and append a short hash', () => {
    expect(pageFileName('https://a.com/news/item?id=3')).toMatch(/^a\.com_news_item_id_3-[0-9a-f]{10}\.html$/);
  });

  it('should not collide for URLs that sanitize alike', () => {
    expect(pageFileName('https://a.com/x')).not.toBe(pageFileName('http://a.com/x'));
  });
});

describe('extractTitle', () => {
  it('should collapse whitespace in the title', () => {
    expect(extractTitle('<html><head><title>  About\n   us </title></head></html>')).toBe('About us');
  });

  it('should return null without a title', () => {
    expect(extractTitle('<p>no head</p>')).toBeNull();
  });
});

describe('downloadSnapshots', () => {
  let agent: MockAgent;
  let outDir: string;

  beforeEach(async () => {
    agent = new MockAgent();
    agent.disableNetConnect();
    outDir = await fs.mkdtemp(path.join(os.tmpdir(), 'downloads-'));
  });

  afterEach(async () => {
    await agent.close();
    await fs.rm(outDir, { recursive: true, force: true });
  });

  const archive = () => agent.get('https://web.archive.org');
  const pathFor = (url: string) => (p: string) => p.endsWith(`/${url}`);

  function run(snapshots: Snapshot[], resume = true, pacer = new CountingPacer()) {
    return downloadSnapshots({
      domain: 'a.com',
      targetDate: '20191115',
      snapshots,
      outDir,
      concurrency: 2,
      resume,
      userAgent: 'test-agent',
      timeoutMs: 1000,
      pacer,
      dispatcher: agent,
    });
  }

  it('should save pages and record their titles in the manifest', async () => {
    const html = '<html><head><title>About</title></head><body>hi</body></html>';
    archive().intercept({ path: pathFor('https://a.com/about'), method: 'GET' }).reply(200, html);
    const pacer = new CountingPacer();

    const manifest = await run([snapshot('https://a.com/about')], true, pacer);

    const file = pageFileName('https://a.com/about');
    expect(await fs.readFile(path.join(outDir, 'pages', file), 'utf-8')).toBe(html);
    expect(manifest.pages).toEqual([
      {
        original_url: 'https://a.com/about',
        archive_url: 'https://web.archive.org/web/20191110000000/https://a.com/about',
        timestamp: '20191110000000',
        file: `pages/${file}`,
        status: 'downloaded',
        title: 'About',
        bytes: Buffer.byteLength(html),
        error: null,
      },
    ]);
    expect(pacer.acquired).toBe(1);

    const written = JSON.parse(await fs.readFile(path.join(outDir, 'manifest.json'), 'utf-8'));
    expect(written.stats).toEqual({ total: 1, downloaded: 1, skipped: 0, failed: 0, bytes: Buffer.byteLength(html) });
  });

  it('should retry a failed page once and keep it failed', async () => {
    archive().intercept({ path: pathFor('https://a.com/gone'), method: 'GET' }).reply(404, 'nope').times(2);

    const manifest = await run([snapshot('https://a.com/gone')]);

    agent.assertNoPendingInterceptors();
    expect(manifest.pages[0]).toMatchObject({ status: 'failed', error: 'HTTP 404', title: null });
    expect(manifest.stats.failed).toBe(1);
  });

  it('should recover a page that succeeds on the retry', async () => {
    const pool = archive();
    pool.intercept({ path: pathFor('https://a.com/flaky'), method: 'GET' }).reply(502, 'busy');
    pool.intercept({ path: pathFor('https://a.com/flaky'), method: 'GET' }).reply(200, '<title>Flaky</title>');

    const manifest = await run([snapshot('https://a.com/flaky')]);

    expect(manifest.pages[0]).toMatchObject({ status: 'downloaded', title: 'Flaky' });
  });

  it('should skip pages already on disk when resuming', async () => {
    const file = pageFileName('https://a.com/');
    await fs.mkdir(path.join(outDir, 'pages'), { recursive: true });
    await fs.writeFile(path.join(outDir, 'pages', file), '<p>old</p>', 'utf-8');
    const pacer = new CountingPacer();

    const manifest = await run([snapshot('https://a.com/')], true, pacer);

    expect(manifest.pages[0]?.status).toBe('skipped');
    expect(manifest.stats).toEqual({ total: 1, downloaded: 0, skipped: 1, failed: 0, bytes: 0 });
    expect(pacer.acquired).toBe(0);
  });

  it('should download again when resume is off', async () => {
    const file = pageFileName('https://a.com/');
    await fs.mkdir(path.join(outDir, 'pages'), { recursive: true });
    await fs.writeFile(path.join(outDir, 'pages', file), '<p>old</p>', 'utf-8');
    archive().intercept({ path: pathFor('https://a.com/'), method: 'GET' }).reply(200, '<p>new</p>');

    const manifest = await run([snapshot('https://a.com/')], false);

    expect(manifest.pages[0]?.status).toBe('downloaded');
    expect(await fs.readFile(path.join(outDir, 'pages', file), 'utf-8')).toBe('<p>new</p>');
  });

  it('should count a page that cannot be saved as failed and finish the run', async () => {
    const blocked = pageFileName('https://a.com/a');
    await fs.mkdir(path.join(outDir, 'pages', blocked), { recursive: true });
    archive().intercept({ path: pathFor('https://a.com/a'), method: 'GET' }).reply(200, '<p>a</p>').times(2);
    archive().intercept({ path: pathFor('https://a.com/b'), method: 'GET' }).reply(200, '<p>b</p>');

    const manifest = await run([snapshot('https://a.com/a'), snapshot('https://a.com/b')], false);

    expect(manifest.pages.map((page) => [page.original_url, page.status])).toEqual([
      ['https://a.com/a', 'failed'],
      ['https://a.com/b', 'downloaded'],
    ]);
    expect(manifest.pages[0]?.error).toContain('EISDIR');
    expect(manifest.stats).toMatchObject({ total: 2, downloaded: 1, failed: 1 });
    const written = JSON.parse(await fs.readFile(path.join(outDir, 'manifest.json'), 'utf-8'));
    expect(written.stats.failed).toBe(1);
  });
});
