import pino, { type Logger, type LoggerOptions } from 'pino';

export interface LoggerConfig {
  level?: string;
  /** Write log lines to this file instead of stderr */
  file?: string;
}

export function createLogger(config: LoggerConfig = {}): Logger {
  const options: LoggerOptions = {
    name: 'pdfwork',
    level: config.level ?? 'info',
    formatters: {
      level: (label) => ({ level: label }),
      bindings: () => ({}),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  const destination = config.file
    ? pino.destination({ dest: config.file, mkdir: true, sync: false })
    : pino.destination(2);

  return pino(options, destination);
}

/** `level` if pino knows it, otherwise `info`. */
export function knownLevel(level: string | undefined): string {
  if (level === undefined) return 'info';
  return level === 'silent' || Object.hasOwn(pino.levels.values, level) ? level : 'info';
}

// config validates LOG_LEVEL later; a bad value must not break the import
export let log: Logger = createLogger({
  level: knownLevel(process.env.LOG_LEVEL),
  file: process.env.LOG_FILE,
});

export function setLogger(logger: Logger): void {
  log = logger;
}
