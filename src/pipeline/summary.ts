import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ArchiveResult, BatchSummary, JobResult } from '../types';

export const SUMMARY_FILE = 'summary.json';

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

export function summarize(results: readonly JobResult[]): BatchSummary {
  let succeededCount = 0;
  let totalInputBytes = 0;
  let totalOutputBytes = 0;
  let totalDurationMs = 0;
  const failures: BatchSummary['failures'] = [];

  for (const result of results) {
    totalInputBytes += result.inputSizeBytes;
    totalOutputBytes += result.outputSizeBytes;
    totalDurationMs += result.durationMs;
    if (result.succeeded) {
      succeededCount++;
    } else {
      failures.push({
        sourcePath: result.task.sourcePath,
        errorMessage: result.errorMessage ?? 'unknown error',
      });
    }
  }

  const savedBytes = totalInputBytes - totalOutputBytes;

  return {
    totalFiles: results.length,
    succeededCount,
    failedCount: results.length - succeededCount,
    totalInputBytes,
    totalOutputBytes,
    totalDurationMs,
    savedBytes,
    savedPercent: totalInputBytes === 0 ? 0 : round2((savedBytes / totalInputBytes) * 100),
    perFileResults: [...results],
    failures,
  };
}

const UNITS = ['', 'K', 'M', 'G', 'T'];

export function formatBytes(size: number): string {
  let n = size;
  let unit = 0;
  while (n > 1024 && unit < UNITS.length - 1) {
    n /= 1024;
    unit++;
  }
  return `${n.toFixed(2)} ${UNITS[unit]}B`;
}

export interface RenderContext {
  inputDir: string;
  outputDir: string;
  archive?: ArchiveResult;
}

export function renderSummary(summary: BatchSummary, context: RenderContext): string[] {
  const lines = [
    'Job Summary:',
    `  Input Directory: ${context.inputDir}`,
    `  Output Directory: ${context.outputDir}`,
    `  Files Processed: ${summary.totalFiles}`,
    `  Succeeded: ${summary.succeededCount}`,
    `  Failed: ${summary.failedCount}`,
    `  Initial Size: ${formatBytes(summary.totalInputBytes)}`,
    `  Final Size: ${formatBytes(summary.totalOutputBytes)}`,
    `  Saved: ${summary.savedPercent}%`,
    `  Elapsed: ${(summary.totalDurationMs / 1000).toFixed(2)}s`,
  ];

  if (context.archive) {
    lines.push(`  Archive: ${context.archive.path} (${formatBytes(context.archive.sizeBytes)})`);
  }

  if (summary.failures.length > 0) {
    lines.push('Failures:');
    for (const failure of summary.failures) {
      lines.push(`  ${failure.sourcePath}: ${failure.errorMessage}`);
    }
  }

  return lines;
}

export async function writeSummary(
  outputDir: string,
  summary: BatchSummary
): Promise<string> {
  const summaryPath = join(outputDir, SUMMARY_FILE);
  await writeFile(summaryPath, JSON.stringify(summary, null, 2));
  return summaryPath;
}
