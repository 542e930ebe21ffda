import type { Dirent } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { join, extname, resolve } from 'node:path';
import { NotFoundError } from '../errors';
import { log } from '../logger';

export interface EnumerateOptions {
  /** Matched case-insensitively, with or without the leading dot */
  extension: string;
  recursive: boolean;
}

export function naturalSort(a: string, b: string): number {
  const cmp = a.localeCompare(b, undefined, { numeric: true, sensitivity: 'base' });
  if (cmp !== 0) return cmp;
  return a < b ? -1 : a > b ? 1 : 0;
}

export function normalizeExtension(extension: string): string {
  const lower = extension.trim().toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}

async function* walk(
  dir: string,
  extension: string,
  recursive: boolean,
  isRoot = true
): AsyncGenerator<string> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (err) {
    // only the root is fatal; unreadable subfolders are skipped
    if (isRoot) throw err;
    log.warn({ err, dir }, 'skipping unreadable folder');
    return;
  }
  entries.sort((a, b) => naturalSort(a.name, b.name));

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      if (recursive) yield* walk(fullPath, extension, recursive, false);
    } else if (entry.isFile() && extname(entry.name).toLowerCase() === extension) {
      yield fullPath;
    }
  }
}

/**
 * Validates `root` up front, then returns a lazy sequence of matching files.
 * Each iteration walks the tree again from the top.
 */
export async function enumerateFiles(
  root: string,
  options: EnumerateOptions
): Promise<AsyncIterable<string>> {
  const absRoot = resolve(root);

  let isDirectory = false;
  try {
    isDirectory = (await stat(absRoot)).isDirectory();
  } catch {
    throw new NotFoundError(absRoot, `Input directory does not exist: ${absRoot}`);
  }
  if (!isDirectory) {
    throw new NotFoundError(absRoot, `Input path is not a directory: ${absRoot}`);
  }

  const extension = normalizeExtension(options.extension);
  return {
    [Symbol.asyncIterator]: () => walk(absRoot, extension, options.recursive),
  };
}

export async function collectFiles(files: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const file of files) {
    out.push(file);
  }
  return out;
}
