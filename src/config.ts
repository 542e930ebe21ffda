import * as dotenv from 'dotenv';
import { readFile, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError, describeError } from './errors';
import { TOOL_IDS, type QualityLevel, type ToolId, type ToolPaths } from './types';

// Load environment variables from .env file
dotenv.config();

export const DEFAULT_SETTINGS_FILE = 'pdfwork.config.json';

export const DEFAULT_TOOL_PATHS: ToolPaths = {
  pdftotext: 'pdftotext',
  gs: 'gs',
  qpdf: 'qpdf',
  zip: 'zip',
  '7z': '7z',
  tar: 'tar',
};

const TOOL_ENV_KEYS: Record<ToolId, string> = {
  pdftotext: 'PDFTOTEXT_PATH',
  gs: 'GS_PATH',
  qpdf: 'QPDF_PATH',
  zip: 'ZIP_PATH',
  '7z': 'SEVENZIP_PATH',
  tar: 'TAR_PATH',
};

const QualitySchema = z.enum(['screen', 'ebook', 'prepress', 'default']);

const ToolPathsSchema = z.object({
  pdftotext: z.string().min(1),
  gs: z.string().min(1),
  qpdf: z.string().min(1),
  zip: z.string().min(1),
  '7z': z.string().min(1),
  tar: z.string().min(1),
});

const SettingsSchema = z.object({
  inputDir: z.string().min(1).optional(),
  outputDir: z.string().min(1).optional(),
  quality: QualitySchema.optional(),
  tools: ToolPathsSchema.partial().optional(),
});

const ConfigSchema = z.object({
  tools: ToolPathsSchema,
  timeoutMs: z.number().int('Timeout must be a whole number of milliseconds').min(0),
  concurrency: z.number().int().min(1, 'Concurrency must be at least 1').max(64),
  quality: QualitySchema,
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
  logFile: z.string().min(1).optional(),
});

export type Settings = z.infer<typeof SettingsSchema>;

export interface Config {
  tools: ToolPaths;
  timeoutMs: number;
  concurrency: number;
  /** Default compression quality when no --quality flag is given */
  quality: QualityLevel;
  logLevel: string;
  logFile?: string;
}

export interface ConfigOverrides {
  tools?: Partial<ToolPaths>;
  timeoutMs?: number;
  concurrency?: number;
  quality?: QualityLevel;
}

type Env = Record<string, string | undefined>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`)
    .join('; ');
}

function envNumber(env: Env, key: string): number | undefined {
  const value = env[key];
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new ConfigError(`${key} must be a number, got "${value}"`);
  }
  return parsed;
}

export async function loadSettings(path: string): Promise<Settings> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return {};
    }
    throw new ConfigError(`Cannot read settings file ${path}: ${describeError(err)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Settings file ${path} is not valid JSON: ${describeError(err)}`);
  }

  const parsed = SettingsSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`Invalid settings in ${path}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export async function saveSettings(path: string, settings: Settings): Promise<void> {
  const parsed = SettingsSchema.safeParse(settings);
  if (!parsed.success) {
    throw new ConfigError(`Refusing to save invalid settings: ${formatIssues(parsed.error)}`);
  }
  await writeFile(path, JSON.stringify(parsed.data, null, 4) + '\n');
}

/**
 * Merge defaults, the settings file, the environment and CLI overrides
 * (lowest to highest precedence) and validate the result.
 */
export function resolveConfig(
  settings: Settings,
  env: Env = process.env,
  overrides: ConfigOverrides = {}
): Config {
  const envTools: Partial<ToolPaths> = {};
  for (const tool of TOOL_IDS) {
    const value = env[TOOL_ENV_KEYS[tool]];
    if (value) envTools[tool] = value;
  }

  const raw = {
    tools: { ...DEFAULT_TOOL_PATHS, ...settings.tools, ...envTools, ...overrides.tools },
    timeoutMs: overrides.timeoutMs ?? envNumber(env, 'PDFWORK_TIMEOUT_MS') ?? 300000,
    concurrency: overrides.concurrency ?? envNumber(env, 'PDFWORK_CONCURRENCY') ?? 1,
    quality: overrides.quality ?? settings.quality ?? 'ebook',
    logLevel: env.LOG_LEVEL || 'info',
    logFile: env.LOG_FILE || undefined,
  };

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export async function loadConfig(
  settingsPath = DEFAULT_SETTINGS_FILE,
  overrides: ConfigOverrides = {},
  env: Env = process.env
): Promise<{ config: Config; settings: Settings; settingsPath: string }> {
  const absPath = resolve(settingsPath);
  const settings = await loadSettings(absPath);
  return { config: resolveConfig(settings, env, overrides), settings, settingsPath: absPath };
}
