import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { formatBytes, renderSummary, summarize, writeSummary } from '../src/pipeline/summary';
import type { JobResult } from '../src/types';
import { makeTempDir, removeTempDir } from './helpers';

function result(
  index: number,
  fields: { succeeded: boolean; input: number; output: number; durationMs: number; errorMessage?: string }
): JobResult {
  return {
    task: {
      index,
      sourcePath: `/in/file${index}.pdf`,
      destPath: `/out/file${index}.pdf`,
      operation: { kind: 'compress', quality: 'ebook', safer: false, verbose: false },
    },
    succeeded: fields.succeeded,
    exitCode: fields.succeeded ? 0 : 1,
    inputSizeBytes: fields.input,
    outputSizeBytes: fields.output,
    durationMs: fields.durationMs,
    errorMessage: fields.errorMessage,
  };
}

const mixed = [
  result(0, { succeeded: true, input: 1000, output: 400, durationMs: 10 }),
  result(1, { succeeded: false, input: 500, output: 0, durationMs: 20, errorMessage: 'bad xref' }),
  result(2, { succeeded: true, input: 500, output: 100, durationMs: 30 }),
];

describe('summarize', () => {
  it('returns zeros for an empty batch', () => {
    expect(summarize([])).toEqual({
      totalFiles: 0,
      succeededCount: 0,
      failedCount: 0,
      totalInputBytes: 0,
      totalOutputBytes: 0,
      totalDurationMs: 0,
      savedBytes: 0,
      savedPercent: 0,
      perFileResults: [],
      failures: [],
    });
  });

  it('totals counts, sizes and durations', () => {
    const summary = summarize(mixed);

    expect(summary.totalFiles).toBe(3);
    expect(summary.succeededCount).toBe(2);
    expect(summary.failedCount).toBe(1);
    expect(summary.succeededCount + summary.failedCount).toBe(summary.totalFiles);
    expect(summary.totalInputBytes).toBe(2000);
    expect(summary.totalOutputBytes).toBe(500);
    expect(summary.savedBytes).toBe(1500);
    expect(summary.savedPercent).toBe(75);
    expect(summary.totalDurationMs).toBe(60);
  });

  it('keeps results in order and lists every failure', () => {
    const summary = summarize(mixed);
    expect(summary.perFileResults).toHaveLength(3);
    expect(summary.perFileResults.map((r) => r.task.index)).toEqual([0, 1, 2]);
    expect(summary.failures).toEqual([{ sourcePath: '/in/file1.pdf', errorMessage: 'bad xref' }]);
  });

  it('rounds the saved percentage to two decimals', () => {
    const summary = summarize([result(0, { succeeded: true, input: 3, output: 1, durationMs: 1 })]);
    expect(summary.savedPercent).toBe(66.67);
  });

  it('reports growth as a negative saving', () => {
    const summary = summarize([result(0, { succeeded: true, input: 100, output: 150, durationMs: 1 })]);
    expect(summary.savedBytes).toBe(-50);
    expect(summary.savedPercent).toBe(-50);
  });

  it('treats an all-failed batch as a summary, not an error', () => {
    const summary = summarize([
      result(0, { succeeded: false, input: 0, output: 0, durationMs: 1, errorMessage: 'x' }),
    ]);
    expect(summary.succeededCount).toBe(0);
    expect(summary.savedPercent).toBe(0);
  });
});

describe('formatBytes', () => {
  it.each([
    [0, '0.00 B'],
    [512, '512.00 B'],
    [1024, '1024.00 B'],
    [1536, '1.50 KB'],
    [5 * 1024 * 1024, '5.00 MB'],
    [3 * 1024 ** 3, '3.00 GB'],
  ])('formats %d as %s', (size, expected) => {
    expect(formatBytes(size)).toBe(expected);
  });
});

describe('renderSummary', () => {
  it('renders counts, sizes and failures', () => {
    const lines = renderSummary(summarize(mixed), { inputDir: '/in', outputDir: '/out' });
    expect(lines).toEqual([
      'Job Summary:',
      '  Input Directory: /in',
      '  Output Directory: /out',
      '  Files Processed: 3',
      '  Succeeded: 2',
      '  Failed: 1',
      '  Initial Size: 1.95 KB',
      '  Final Size: 500.00 B',
      '  Saved: 75%',
      '  Elapsed: 0.06s',
      'Failures:',
      '  /in/file1.pdf: bad xref',
    ]);
  });

  it('mentions the archive when one was written', () => {
    const lines = renderSummary(summarize([]), {
      inputDir: '/in',
      outputDir: '/out',
      archive: { path: '/out.zip', format: 'zip', sizeBytes: 2048, durationMs: 5 },
    });
    expect(lines[lines.length - 1]).toBe('  Archive: /out.zip (2.00 KB)');
  });
});

describe('writeSummary', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('writes summary.json into the output folder', async () => {
    const summary = summarize(mixed);
    const path = await writeSummary(dir, summary);

    expect(path).toBe(join(dir, 'summary.json'));
    const written: unknown = JSON.parse(await readFile(path, 'utf8'));
    expect(written).toEqual(JSON.parse(JSON.stringify(summary)));
  });
});
