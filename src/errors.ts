export class PdfWorkError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PdfWorkError';
  }
}

export class NotFoundError extends PdfWorkError {
  constructor(public readonly path: string, message = `Not found: ${path}`) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class ToolNotFoundError extends NotFoundError {
  constructor(public readonly tool: string) {
    super(tool, `Executable not found: ${tool}`);
    this.name = 'ToolNotFoundError';
  }
}

export class TimeoutError extends PdfWorkError {
  constructor(
    public readonly command: string,
    public readonly timeoutMs: number
  ) {
    super(`${command} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class ToolExecutionError extends PdfWorkError {
  constructor(
    public readonly tool: string,
    public readonly exitCode: number,
    public readonly stderr: string
  ) {
    super(stderr.trim() || `${tool} exited with code ${exitCode}`);
    this.name = 'ToolExecutionError';
  }
}

export class ArchiveError extends PdfWorkError {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ArchiveError';
  }
}

export class ConfigError extends PdfWorkError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return String(err);
}
