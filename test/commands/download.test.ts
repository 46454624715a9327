import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { MockAgent } from 'undici';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { runDownload } from '../../src/commands/download.js';
import { SnapshotListMissingError } from '../../src/errors.js';

describe('runDownload', () => {
  let dataDir: string;
  let agent: MockAgent;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'download-'));
    agent = new MockAgent();
    agent.disableNetConnect();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await agent.close();
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  const options = () => ({
    domain: 'a.com',
    targetDate: '20191115',
    dataDir,
    concurrency: 1,
    resume: true,
    delayMs: 0,
    dispatcher: agent,
  });

  it('should download the pages listed by a previous find run', async () => {
    await fs.writeFile(
      path.join(dataDir, 'a.com_snapshots_20191115.json'),
      JSON.stringify([
        {
          archive_url: 'https://web.archive.org/web/20191114000000/https://a.com/',
          timestamp: '20191114000000',
          original_url: 'https://a.com/',
          status_code: '200',
          size_bytes: 500,
          days_diff: 1,
        },
      ]),
      'utf-8',
    );
    agent
      .get('https://web.archive.org')
      .intercept({ path: '/web/20191114000000/https://a.com/', method: 'GET' })
      .reply(200, '<title>Home</title>');

    const manifest = await runDownload(options());

    expect(manifest.stats).toMatchObject({ total: 1, downloaded: 1, failed: 0 });
    expect(manifest.pages[0]?.title).toBe('Home');
    const manifestPath = path.join(dataDir, 'snapshots', 'a.com', '20191115', 'manifest.json');
    expect(JSON.parse(await fs.readFile(manifestPath, 'utf-8')).domain).toBe('a.com');
  });

  it('should ask for a find run when the snapshot list is missing', async () => {
    await expect(runDownload(options())).rejects.toBeInstanceOf(SnapshotListMissingError);
  });
});
