import type { FileTask, ToolInvocation } from '../types';

export function buildInvocation(task: FileTask, outputPath = task.destPath): ToolInvocation {
  const { operation, sourcePath } = task;

  switch (operation.kind) {
    case 'convert':
      return {
        tool: 'pdftotext',
        args: [
          ...(operation.preserveLayout ? ['-layout'] : []),
          '-nopgbrk',
          '-enc', 'UTF-8',
          sourcePath,
          outputPath,
        ],
      };

    case 'compress':
      return {
        tool: 'gs',
        args: [
          '-sDEVICE=pdfwrite',
          '-dCompatibilityLevel=1.4',
          `-dPDFSETTINGS=/${operation.quality}`,
          ...(operation.safer ? ['-dSAFER'] : []),
          operation.verbose ? '-dVERBOSE' : '-q',
          '-o', outputPath,
          sourcePath,
        ],
      };

    case 'decompress':
      return {
        tool: 'qpdf',
        args: [
          '--linearize',
          ...(operation.uncompressStreams ? ['--stream-data=uncompress'] : []),
          sourcePath,
          outputPath,
        ],
      };
  }
}
