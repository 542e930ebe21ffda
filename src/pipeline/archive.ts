import { stat } from 'node:fs/promises';
import { basename, dirname, join, relative, resolve, isAbsolute, sep } from 'node:path';
import { ArchiveError, describeError } from '../errors';
import { ARCHIVE_FORMATS, type ArchiveFormat, type ArchiveResult, type ToolInvocation } from '../types';
import { runOrThrow, type ToolRunner } from './exec';

export interface ArchiveOptions {
  run: ToolRunner;
  timeoutMs?: number;
}

export function isArchiveFormat(value: string): value is ArchiveFormat {
  return ARCHIVE_FORMATS.some((format) => format === value);
}

/** `<parent>/<name>.<format>` beside the directory being archived. */
export function defaultArchivePath(sourceDir: string, format: ArchiveFormat): string {
  const abs = resolve(sourceDir);
  return join(dirname(abs), `${basename(abs)}.${format}`);
}

export function archiveInvocation(
  sourceDir: string,
  format: ArchiveFormat,
  destPath: string
): ToolInvocation {
  switch (format) {
    case 'zip':
      return { tool: 'zip', args: ['-r', '-q', destPath, '.'] };
    case '7z':
      return { tool: '7z', args: ['a', '-t7z', '-y', destPath, '.'] };
    case 'tar.gz':
      return { tool: 'tar', args: ['-czf', destPath, '-C', sourceDir, '.'] };
  }
}

function isInside(parent: string, child: string): boolean {
  const rel = relative(parent, child);
  return rel !== '' && rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

export async function archive(
  sourceDir: string,
  format: string,
  destPath: string | undefined,
  options: ArchiveOptions
): Promise<ArchiveResult> {
  if (!isArchiveFormat(format)) {
    throw new ArchiveError(
      `Unsupported archive format: ${format} (expected ${ARCHIVE_FORMATS.join(', ')})`
    );
  }

  const source = resolve(sourceDir);
  const dest = resolve(destPath ?? defaultArchivePath(source, format));

  let isDirectory = false;
  try {
    isDirectory = (await stat(source)).isDirectory();
  } catch (err) {
    throw new ArchiveError(`Cannot archive ${source}: ${describeError(err)}`, err);
  }
  if (!isDirectory) {
    throw new ArchiveError(`Cannot archive ${source}: not a directory`);
  }
  if (isInside(source, dest)) {
    throw new ArchiveError(`Archive path ${dest} must not be inside ${source}`);
  }

  const { tool, args } = archiveInvocation(source, format, dest);
  const started = performance.now();

  try {
    await runOrThrow(options.run, tool, args, { cwd: source, timeout: options.timeoutMs });
  } catch (err) {
    throw new ArchiveError(`Failed to create ${format} archive ${dest}: ${describeError(err)}`, err);
  }

  let sizeBytes: number;
  try {
    sizeBytes = (await stat(dest)).size;
  } catch (err) {
    throw new ArchiveError(`${tool} reported success but ${dest} was not written`, err);
  }

  return {
    path: dest,
    format,
    sizeBytes,
    durationMs: Math.round(performance.now() - started),
  };
}
