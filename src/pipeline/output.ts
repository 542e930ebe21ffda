import { mkdir, readdir, unlink } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigError } from '../errors';
import type { ExistingOutputPolicy } from '../types';

export interface PreparedOutput {
  existingEntries: number;
  removed: string[];
}

/**
 * Create the output directory and apply the policy for anything already in it.
 * `clean` removes top-level files only; subdirectories stay.
 */
export async function prepareOutputDir(
  dir: string,
  policy: ExistingOutputPolicy
): Promise<PreparedOutput> {
  await mkdir(dir, { recursive: true });
  const entries = await readdir(dir, { withFileTypes: true });

  if (entries.length === 0 || policy === 'overwrite') {
    return { existingEntries: entries.length, removed: [] };
  }

  if (policy === 'abort') {
    throw new ConfigError(
      `Output directory is not empty: ${dir} (use --on-existing overwrite or clean)`
    );
  }

  const removed: string[] = [];
  for (const entry of entries) {
    if (!entry.isFile()) continue;
    const filePath = join(dir, entry.name);
    await unlink(filePath);
    removed.push(filePath);
  }
  return { existingEntries: entries.length, removed };
}
