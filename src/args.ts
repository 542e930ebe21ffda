import {
  ARCHIVE_FORMATS,
  QUALITY_LEVELS,
  type ArchiveFormat,
  type ExistingOutputPolicy,
  type OperationKind,
  type QualityLevel,
} from './types';

export const USAGE = `
pdfwork - Batch PDF converter, compressor and decompressor

Usage:
  pdfwork <convert|compress|decompress> [input] [output] [options]

Arguments:
  input   Folder searched for PDF files (default: inputDir from settings)
  output  Folder receiving results (default: outputDir from settings)

Options:
  --quality <level>          screen, ebook, prepress or default (compress)
  --safer                    Pass -dSAFER to Ghostscript (compress)
  --verbose                  Run Ghostscript verbosely instead of quietly (compress)
  --no-layout                Do not preserve layout (convert)
  --uncompress-streams       Also uncompress stream data (decompress)
  --no-recursive             Only look at the top level of the input folder
  --archive <format>         zip, 7z, tar.gz or none (default: none)
  --archive-path <file>      Where to write the archive (default: beside output)
  --on-existing <policy>     overwrite, clean or abort when output is not empty
  --in-place                 Allow output to be the same folder as input
  --concurrency <n>          Files processed at once (default: 1)
  --timeout <ms>             Per-file tool timeout, 0 for none (default: 300000)
  --config <file>            Settings file (default: pdfwork.config.json)
  --save-settings            Remember folders and quality in the settings file
  --strict                   Exit with status 2 if any file failed
  --help                     Show this help message

Examples:
  pdfwork compress ./scans ./out --quality screen --archive zip
  pdfwork convert ./papers ./text --no-recursive
`;

export interface CliCommand {
  operation: OperationKind;
  input?: string;
  output?: string;
  quality?: QualityLevel;
  safer: boolean;
  verbose: boolean;
  preserveLayout: boolean;
  uncompressStreams: boolean;
  recursive: boolean;
  archive: ArchiveFormat | 'none';
  archivePath?: string;
  onExisting: ExistingOutputPolicy;
  inPlace: boolean;
  concurrency?: number;
  timeoutMs?: number;
  configPath?: string;
  saveSettings: boolean;
  strict: boolean;
}

export type ParseResult =
  | { kind: 'run'; command: CliCommand }
  | { kind: 'help' }
  | { kind: 'error'; error: string };

const OPERATIONS: readonly OperationKind[] = ['convert', 'compress', 'decompress'];
const POLICIES: readonly ExistingOutputPolicy[] = ['overwrite', 'clean', 'abort'];

function oneOf<T extends string>(allowed: readonly T[], value: string): T | undefined {
  return allowed.find((candidate) => candidate === value);
}

export function parseArgs(args: string[]): ParseResult {
  const positional: string[] = [];
  const command: Omit<CliCommand, 'operation'> = {
    safer: false,
    verbose: false,
    preserveLayout: true,
    uncompressStreams: false,
    recursive: true,
    archive: 'none',
    onExisting: 'overwrite',
    inPlace: false,
    saveSettings: false,
    strict: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const takesValue = (): string | undefined => {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('--')) return undefined;
      i++;
      return value;
    };

    switch (arg) {
      case '--help':
      case '-h':
        return { kind: 'help' };
      case '--safer':
        command.safer = true;
        break;
      case '--verbose':
        command.verbose = true;
        break;
      case '--no-layout':
        command.preserveLayout = false;
        break;
      case '--uncompress-streams':
        command.uncompressStreams = true;
        break;
      case '--recursive':
        command.recursive = true;
        break;
      case '--no-recursive':
        command.recursive = false;
        break;
      case '--in-place':
        command.inPlace = true;
        break;
      case '--save-settings':
        command.saveSettings = true;
        break;
      case '--strict':
        command.strict = true;
        break;
      case '--quality': {
        const value = takesValue();
        const quality = value === undefined ? undefined : oneOf(QUALITY_LEVELS, value);
        if (!quality) {
          return { kind: 'error', error: `--quality must be one of ${QUALITY_LEVELS.join(', ')}` };
        }
        command.quality = quality;
        break;
      }
      case '--archive': {
        const value = takesValue();
        const format = value === undefined ? undefined : oneOf([...ARCHIVE_FORMATS, 'none' as const], value);
        if (!format) {
          return { kind: 'error', error: `--archive must be one of ${ARCHIVE_FORMATS.join(', ')}, none` };
        }
        command.archive = format;
        break;
      }
      case '--archive-path': {
        const value = takesValue();
        if (!value) return { kind: 'error', error: '--archive-path needs a file path' };
        command.archivePath = value;
        break;
      }
      case '--on-existing': {
        const value = takesValue();
        const policy = value === undefined ? undefined : oneOf(POLICIES, value);
        if (!policy) {
          return { kind: 'error', error: `--on-existing must be one of ${POLICIES.join(', ')}` };
        }
        command.onExisting = policy;
        break;
      }
      case '--concurrency': {
        const value = Number(takesValue());
        if (!Number.isInteger(value) || value < 1) {
          return { kind: 'error', error: 'Concurrency must be a whole number of at least 1' };
        }
        command.concurrency = value;
        break;
      }
      case '--timeout': {
        const value = Number(takesValue());
        if (!Number.isInteger(value) || value < 0) {
          return { kind: 'error', error: 'Timeout must be a whole number of milliseconds' };
        }
        command.timeoutMs = value;
        break;
      }
      case '--config': {
        const value = takesValue();
        if (!value) return { kind: 'error', error: '--config needs a file path' };
        command.configPath = value;
        break;
      }
      default:
        if (arg.startsWith('-')) {
          return { kind: 'error', error: `Unknown option ${arg}` };
        }
        positional.push(arg);
    }
  }

  const [operationArg, input, output, ...extra] = positional;
  if (operationArg === undefined) {
    return { kind: 'error', error: 'Missing operation (convert, compress or decompress)' };
  }
  const operation = oneOf(OPERATIONS, operationArg);
  if (!operation) {
    return { kind: 'error', error: `Unknown operation: ${operationArg}` };
  }
  if (extra.length > 0) {
    return { kind: 'error', error: `Unexpected argument: ${extra[0]}` };
  }

  return { kind: 'run', command: { ...command, operation, input, output } };
}
