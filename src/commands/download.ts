import type { Dispatcher } from 'undici';
import { IntervalPacer } from '../compliance/rate-limiter.js';
import { config } from '../config.js';
import { downloadSnapshots, type DownloadManifest } from '../download/snapshot-downloader.js';
import { downloadDir, snapshotListPath } from '../io/paths.js';
import { readSnapshotList } from '../io/snapshot-store.js';
import { parseTargetDate } from '../utils/date.js';

export interface DownloadCommandOptions {
  domain: string;
  targetDate: string;
  dataDir: string;
  concurrency: number;
  resume: boolean;
  delayMs: number;
  dispatcher?: Dispatcher;
}

export async function runDownload(options: DownloadCommandOptions): Promise<DownloadManifest> {
  const targetDate = parseTargetDate(options.targetDate);
  const snapshots = await readSnapshotList(snapshotListPath(options.dataDir, options.domain, targetDate));
  const outDir = downloadDir(options.dataDir, options.domain, targetDate);

  const manifest = await downloadSnapshots({
    domain: options.domain,
    targetDate,
    snapshots,
    outDir,
    concurrency: options.concurrency,
    resume: options.resume,
    userAgent: config.USER_AGENT,
    timeoutMs: config.DOWNLOAD_TIMEOUT_MS,
    pacer: new IntervalPacer(options.delayMs),
    dispatcher: options.dispatcher,
  });

  const { stats } = manifest;
  console.log(`Downloaded: ${stats.downloaded}, skipped: ${stats.skipped}, failed: ${stats.failed}`);
  console.log(`Output: ${outDir}`);
  return manifest;
}
