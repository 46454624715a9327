import path from 'node:path';

export function masterListPath(dataDir: string, domain: string): string {
  return path.join(dataDir, `${domain}_master_list.json`);
}

export function snapshotListPath(dataDir: string, domain: string, targetDate: string): string {
  return path.join(dataDir, `${domain}_snapshots_${targetDate}.json`);
}

export function downloadDir(dataDir: string, domain: string, targetDate: string): string {
  return path.join(dataDir, 'snapshots', domain, targetDate);
}
