import { extname, join, relative, resolve } from 'node:path';
import { ConfigError } from '../errors';
import type { FileTask, Operation } from '../types';

export interface PlanOptions {
  inputRoot: string;
  outputRoot: string;
  operation: Operation;
  /** Required when outputRoot is the same directory as inputRoot */
  allowInPlace?: boolean;
}

/** Text output gets `.txt`; PDF output keeps the source's own extension. */
export function outputExtension(operation: Operation, sourceExtension: string): string {
  return operation.kind === 'convert' ? '.txt' : sourceExtension || '.pdf';
}

/** Mirror `sourcePath`'s position under inputRoot into outputRoot. */
export function destinationFor(
  sourcePath: string,
  inputRoot: string,
  outputRoot: string,
  operation: Operation
): string {
  const rel = relative(resolve(inputRoot), resolve(sourcePath));
  const ext = extname(rel);
  const stem = ext ? rel.slice(0, -ext.length) : rel;
  return join(resolve(outputRoot), `${stem}${outputExtension(operation, ext)}`);
}

export function isInPlace(inputRoot: string, outputRoot: string): boolean {
  return resolve(inputRoot) === resolve(outputRoot);
}

export function planTasks(files: readonly string[], options: PlanOptions): FileTask[] {
  const { inputRoot, outputRoot, allowInPlace = false } = options;

  if (isInPlace(inputRoot, outputRoot) && !allowInPlace) {
    throw new ConfigError(
      `Output directory is the input directory (${resolve(inputRoot)}); pass --in-place to write there`
    );
  }

  const operation = Object.freeze({ ...options.operation });
  const claimed = new Map<string, string>();

  return files.map((file, index) => {
    const sourcePath = resolve(file);
    const destPath = destinationFor(file, inputRoot, outputRoot, operation);

    const other = claimed.get(destPath);
    if (other !== undefined) {
      throw new ConfigError(`${other} and ${sourcePath} would both be written to ${destPath}`);
    }
    claimed.set(destPath, sourcePath);

    return Object.freeze({ index, sourcePath, destPath, operation });
  });
}
