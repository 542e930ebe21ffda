import { resolve } from 'node:path';
import type { CliCommand } from './args';
import type { Config } from './config';
import { ConfigError } from './errors';
import { log } from './logger';
import { archive } from './pipeline/archive';
import { collectFiles, enumerateFiles } from './pipeline/enumerate';
import type { ToolRunner } from './pipeline/exec';
import { prepareOutputDir } from './pipeline/output';
import { isInPlace, planTasks } from './pipeline/plan';
import { runBatch } from './pipeline/runner';
import { summarize, writeSummary } from './pipeline/summary';
import type { ArchiveResult, BatchSummary, JobResult, Operation } from './types';

export interface JobOutcome {
  inputDir: string;
  outputDir: string;
  summary: BatchSummary;
  summaryPath: string;
  archive?: ArchiveResult;
}

export interface JobDeps {
  run: ToolRunner;
  config: Config;
  onResult?: (result: JobResult, completed: number, total: number) => void;
}

export function buildOperation(command: CliCommand, config: Config): Operation {
  switch (command.operation) {
    case 'convert':
      return { kind: 'convert', preserveLayout: command.preserveLayout };
    case 'compress':
      return {
        kind: 'compress',
        quality: command.quality ?? config.quality,
        safer: command.safer,
        verbose: command.verbose,
      };
    case 'decompress':
      return { kind: 'decompress', uncompressStreams: command.uncompressStreams };
  }
}

/**
 * Enumerate, run and summarize one batch, then archive the output folder if
 * asked. Only folder-level problems reject; per-file failures end up in the
 * summary.
 */
export async function runJob(command: CliCommand, deps: JobDeps): Promise<JobOutcome> {
  const { run, config } = deps;

  if (!command.input || !command.output) {
    throw new ConfigError('Input and output folders are required (as arguments or in the settings file)');
  }
  const inputDir = resolve(command.input);
  const outputDir = resolve(command.output);
  const operation = buildOperation(command, config);

  const files = await collectFiles(
    await enumerateFiles(inputDir, { extension: '.pdf', recursive: command.recursive })
  );
  log.info({ inputDir, count: files.length, operation: operation.kind }, 'files found');

  // planned before touching the output folder so an in-place refusal deletes nothing
  const tasks = planTasks(files, {
    inputRoot: inputDir,
    outputRoot: outputDir,
    operation,
    allowInPlace: command.inPlace,
  });

  if (isInPlace(inputDir, outputDir)) {
    if (command.onExisting === 'clean') {
      throw new ConfigError('--on-existing clean cannot be combined with an in-place run');
    }
  } else {
    const prepared = await prepareOutputDir(outputDir, command.onExisting);
    if (prepared.removed.length > 0) {
      log.info({ outputDir, removed: prepared.removed.length }, 'cleaned output directory');
    }
  }

  const results = await runBatch(tasks, {
    run,
    timeoutMs: config.timeoutMs,
    concurrency: command.concurrency ?? config.concurrency,
    onResult: deps.onResult,
  });

  const summary = summarize(results);
  const summaryPath = await writeSummary(outputDir, summary);

  let archived: ArchiveResult | undefined;
  if (command.archive !== 'none') {
    archived = await archive(outputDir, command.archive, command.archivePath, {
      run,
      timeoutMs: config.timeoutMs,
    });
    log.info({ path: archived.path, sizeBytes: archived.sizeBytes }, 'output archived');
  }

  return { inputDir, outputDir, summary, summaryPath, archive: archived };
}
