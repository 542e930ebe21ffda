import { ToolNotFoundError } from '../errors';
import type { OperationKind, ToolId } from '../types';
import type { ToolRunner } from './exec';

export interface ToolProbe {
  tool: ToolId;
  available: boolean;
  version: string;
}

const VERSION_ARGS: Record<ToolId, string[]> = {
  pdftotext: ['-v'],
  gs: ['--version'],
  qpdf: ['--version'],
  zip: ['-v'],
  '7z': ['i'],
  tar: ['--version'],
};

export const OPERATION_TOOLS: Record<OperationKind, ToolId> = {
  convert: 'pdftotext',
  compress: 'gs',
  decompress: 'qpdf',
};

export function parseVersion(output: string): string | null {
  const match = output.match(/(\d+\.\d+(?:\.\d+)?)/);
  return match ? match[1] : null;
}

/** pdftotext prints its version on stderr, so both streams are searched. */
export async function probeTool(run: ToolRunner, tool: ToolId): Promise<ToolProbe> {
  try {
    const result = await run(tool, VERSION_ARGS[tool], { timeout: 10000 });
    const version = parseVersion(result.stdout) ?? parseVersion(result.stderr) ?? 'unknown';
    return { tool, available: true, version };
  } catch (err) {
    if (err instanceof ToolNotFoundError) {
      return { tool, available: false, version: 'unknown' };
    }
    throw err;
  }
}
