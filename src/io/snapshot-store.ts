import { z } from 'zod';
import { SnapshotListMissingError } from '../errors.js';
import type { Snapshot } from '../types/snapshot.js';
import { pathExists, readJson, writeJson } from './json-file.js';

const snapshotSchema = z.object({
  archive_url: z.string().url(),
  timestamp: z.string().regex(/^\d{14}$/),
  original_url: z.string().min(1),
  status_code: z.string(),
  size_bytes: z.number().int().nonnegative(),
  days_diff: z.number().int().nonnegative(),
});

export const snapshotListSchema = z.array(snapshotSchema);

export async function writeSnapshotList(filePath: string, snapshots: readonly Snapshot[]): Promise<void> {
  await writeJson(filePath, snapshots);
}

export async function readSnapshotList(filePath: string): Promise<Snapshot[]> {
  if (!(await pathExists(filePath))) {
    throw new SnapshotListMissingError(filePath);
  }
  return snapshotListSchema.parse(await readJson(filePath));
}
