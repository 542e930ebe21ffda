import { spawn } from 'node:child_process';
import { basename } from 'node:path';
import { TimeoutError, ToolExecutionError, ToolNotFoundError } from '../errors';
import type { ExecResult, ToolId, ToolPaths } from '../types';

export interface ExecOptions {
  timeout?: number;
  cwd?: string;
}

export type ToolRunner = (
  tool: ToolId,
  args: string[],
  options?: ExecOptions
) => Promise<ExecResult>;

export const DEFAULT_TIMEOUT_MS = 300000;

/**
 * Run a command without a shell. Non-zero exits resolve; a missing executable
 * rejects with ToolNotFoundError and an expired timeout kills the child and
 * rejects with TimeoutError.
 */
export function exec(
  cmd: string[],
  options: ExecOptions = {}
): Promise<ExecResult> {
  const { timeout = DEFAULT_TIMEOUT_MS, cwd } = options;
  const [file, ...args] = cmd;
  if (!file) {
    return Promise.reject(new Error('Cannot execute an empty command'));
  }

  const started = performance.now();

  return new Promise<ExecResult>((resolve, reject) => {
    const proc = spawn(file, args, {
      cwd,
      shell: false,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let settled = false;

    proc.stdout.setEncoding('utf8');
    proc.stderr.setEncoding('utf8');
    proc.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    proc.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    const timer = timeout > 0
      ? setTimeout(() => {
          if (settled) return;
          settled = true;
          proc.kill('SIGKILL');
          reject(new TimeoutError(basename(file), timeout));
        }, timeout)
      : null;

    const finish = () => {
      settled = true;
      if (timer) clearTimeout(timer);
    };

    proc.on('error', (err: NodeJS.ErrnoException) => {
      if (settled) return;
      finish();
      reject(err.code === 'ENOENT' ? new ToolNotFoundError(file) : err);
    });

    proc.on('close', (code) => {
      if (settled) return;
      finish();
      resolve({
        stdout,
        stderr,
        // killed by a signal we did not send
        exitCode: code ?? -1,
        durationMs: Math.round(performance.now() - started),
      });
    });
  });
}

export async function runOrThrow(
  run: ToolRunner,
  tool: ToolId,
  args: string[],
  options: ExecOptions = {}
): Promise<ExecResult> {
  const result = await run(tool, args, options);
  if (result.exitCode !== 0) {
    throw new ToolExecutionError(tool, result.exitCode, result.stderr);
  }
  return result;
}

export function createToolRunner(paths: ToolPaths): ToolRunner {
  return (tool, args, options) => exec([paths[tool], ...args], options);
}

/**
 * Map items through fn with at most `concurrency` calls in flight.
 * Results keep the order of `items`.
 */
export async function batchExec<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  concurrency: number
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const workers = Math.max(1, Math.min(Math.floor(concurrency) || 1, items.length));
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const i = next++;
      results[i] = await fn(items[i], i);
    }
  };

  await Promise.all(Array.from({ length: workers }, () => worker()));
  return results;
}
