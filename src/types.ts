export type OperationKind = 'convert' | 'compress' | 'decompress';

export type QualityLevel = 'screen' | 'ebook' | 'prepress' | 'default';

export const QUALITY_LEVELS: readonly QualityLevel[] = ['screen', 'ebook', 'prepress', 'default'];

export type ToolId = 'pdftotext' | 'gs' | 'qpdf' | 'zip' | '7z' | 'tar';

export const TOOL_IDS: readonly ToolId[] = ['pdftotext', 'gs', 'qpdf', 'zip', '7z', 'tar'];

export type ToolPaths = Record<ToolId, string>;

export type ArchiveFormat = 'zip' | '7z' | 'tar.gz';

export const ARCHIVE_FORMATS: readonly ArchiveFormat[] = ['zip', '7z', 'tar.gz'];

export type ExistingOutputPolicy = 'overwrite' | 'clean' | 'abort';

export interface ConvertOperation {
  kind: 'convert';
  preserveLayout: boolean;
}

export interface CompressOperation {
  kind: 'compress';
  quality: QualityLevel;
  safer: boolean;
  verbose: boolean;
}

export interface DecompressOperation {
  kind: 'decompress';
  /** Also rewrite streams uncompressed (qpdf --stream-data=uncompress) */
  uncompressStreams: boolean;
}

export type Operation = ConvertOperation | CompressOperation | DecompressOperation;

export interface FileTask {
  readonly index: number;
  readonly sourcePath: string;
  readonly destPath: string;
  readonly operation: Readonly<Operation>;
}

export interface ToolInvocation {
  tool: ToolId;
  args: string[];
}

export interface JobResult {
  readonly task: FileTask;
  readonly succeeded: boolean;
  /** null when the tool never produced an exit status (missing, timed out, skipped) */
  readonly exitCode: number | null;
  readonly inputSizeBytes: number;
  readonly outputSizeBytes: number;
  readonly durationMs: number;
  readonly errorMessage?: string;
  readonly errorKind?: string;
}

export interface FailedFile {
  sourcePath: string;
  errorMessage: string;
}

export interface BatchSummary {
  totalFiles: number;
  succeededCount: number;
  failedCount: number;
  totalInputBytes: number;
  totalOutputBytes: number;
  totalDurationMs: number;
  savedBytes: number;
  savedPercent: number;
  perFileResults: readonly JobResult[];
  failures: FailedFile[];
}

export interface ArchiveResult {
  path: string;
  format: ArchiveFormat;
  sizeBytes: number;
  durationMs: number;
}

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  durationMs: number;
}
