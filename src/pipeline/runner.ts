import { mkdir, rename, rm, stat } from 'node:fs/promises';
import { dirname } from 'node:path';
import { NotFoundError, ToolExecutionError, describeError } from '../errors';
import { log } from '../logger';
import type { FileTask, JobResult } from '../types';
import { buildInvocation } from './commands';
import { batchExec, DEFAULT_TIMEOUT_MS, type ToolRunner } from './exec';

export interface RunBatchOptions {
  run: ToolRunner;
  timeoutMs?: number;
  /** Tasks processed at once; 1 keeps the batch strictly sequential */
  concurrency?: number;
  onResult?: (result: JobResult, completed: number, total: number) => void;
}

const IN_PLACE_SUFFIX = '.pdfwork-tmp';

type Outcome = Pick<JobResult, 'succeeded' | 'outputSizeBytes' | 'errorMessage' | 'errorKind'>;

async function sizeOf(path: string): Promise<number | null> {
  try {
    const stats = await stat(path);
    return stats.isFile() ? stats.size : null;
  } catch {
    return null;
  }
}

export async function runTask(
  task: FileTask,
  run: ToolRunner,
  timeoutMs: number = DEFAULT_TIMEOUT_MS
): Promise<JobResult> {
  const started = performance.now();
  let inputSizeBytes = 0;
  let exitCode: number | null = null;

  const finish = (outcome: Outcome): JobResult =>
    Object.freeze({
      task,
      exitCode,
      inputSizeBytes,
      durationMs: Math.round(performance.now() - started),
      ...outcome,
    });

  // the tool must not write over the file it is reading
  const inPlace = task.destPath === task.sourcePath;
  const outputPath = inPlace ? task.destPath + IN_PLACE_SUFFIX : task.destPath;

  try {
    const size = await sizeOf(task.sourcePath);
    if (size === null) {
      throw new NotFoundError(task.sourcePath, `Source file not found: ${task.sourcePath}`);
    }
    inputSizeBytes = size;

    await mkdir(dirname(task.destPath), { recursive: true });

    const { tool, args } = buildInvocation(task, outputPath);
    const result = await run(tool, args, { timeout: timeoutMs });
    exitCode = result.exitCode;

    if (result.exitCode !== 0) {
      throw new ToolExecutionError(tool, result.exitCode, result.stderr);
    }

    const outputSize = await sizeOf(outputPath);
    if (outputSize === null) {
      throw new NotFoundError(outputPath, `${tool} produced no output: ${outputPath}`);
    }
    if (inPlace) {
      await rename(outputPath, task.destPath);
    }

    return finish({ succeeded: true, outputSizeBytes: outputSize });
  } catch (err) {
    // a failed run leaves no partial output behind
    await rm(outputPath, { force: true }).catch((rmErr: unknown) => {
      log.warn({ err: rmErr, file: outputPath }, 'could not remove partial output');
    });
    return finish({
      succeeded: false,
      outputSizeBytes: 0,
      errorMessage: describeError(err),
      errorKind: err instanceof Error ? err.name : 'Error',
    });
  }
}

/**
 * Run every task, recording one JobResult each. A failing file never stops
 * the batch; results come back in task order whatever the concurrency.
 */
export async function runBatch(
  tasks: readonly FileTask[],
  options: RunBatchOptions
): Promise<JobResult[]> {
  const { run, timeoutMs = DEFAULT_TIMEOUT_MS, concurrency = 1, onResult } = options;
  let completed = 0;

  return batchExec(
    tasks,
    async (task) => {
      const result = await runTask(task, run, timeoutMs);
      completed++;

      if (result.succeeded) {
        log.info(
          { file: task.sourcePath, output: task.destPath, durationMs: result.durationMs },
          'file processed'
        );
      } else {
        log.warn(
          { file: task.sourcePath, exitCode: result.exitCode, error: result.errorMessage },
          'file failed'
        );
      }

      if (onResult) {
        try {
          onResult(result, completed, tasks.length);
        } catch (err) {
          log.error({ err }, 'result callback threw');
        }
      }
      return result;
    },
    concurrency
  );
}
