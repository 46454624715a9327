import fs from 'node:fs/promises';
import { z } from 'zod';
import { MasterListMissingError, MasterListUnreadableError } from '../errors.js';
import type { MasterListEntry } from '../types/master-list.js';
import { logger } from '../utils/logger.js';

export const masterListSchema = z.array(z.object({ original: z.string().min(1) }).passthrough());

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Keeps the first entry for each URL. */
export function uniqueEntries<T extends MasterListEntry>(entries: readonly T[]): T[] {
  const seen = new Set<string>();
  return entries.filter((entry) => {
    if (seen.has(entry.original)) return false;
    seen.add(entry.original);
    return true;
  });
}

export async function loadMasterList(filePath: string): Promise<MasterListEntry[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) throw new MasterListMissingError(filePath);
    throw new MasterListUnreadableError(filePath, err instanceof Error ? err.message : String(err), err);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (err) {
    throw new MasterListUnreadableError(filePath, 'invalid JSON', err);
  }

  const parsed = masterListSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'schema mismatch';
    throw new MasterListUnreadableError(filePath, where, parsed.error);
  }

  const entries = uniqueEntries(parsed.data);
  if (entries.length < parsed.data.length) {
    logger.warn(
      { path: filePath, dropped: parsed.data.length - entries.length },
      'Master list has duplicate URLs, keeping first occurrence',
    );
  }
  return entries;
}
