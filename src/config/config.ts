import path from 'node:path';
import fs from 'fs-extra';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../errors.js';
import type { LogLevel } from '../logger.js';
import type { PipelineOptions } from '../types/pipeline.js';

const UNITS: Record<string, number> = {
  b: 1,
  kb: 1024,
  mb: 1024 ** 2,
  gb: 1024 ** 3,
  tb: 1024 ** 4
};

/** Accepts a byte count or a size such as `"50GB"` / `"512 mb"`. */
export const parseByteSize = (value: string | number): number | undefined => {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? Math.floor(value) : undefined;
  }
  const match = /^\s*(\d+(?:\.\d+)?)\s*([kmgt]?i?b)?\s*$/i.exec(value);
  if (!match) {
    return undefined;
  }
  const unit = (match[2] ?? 'b').toLowerCase().replace('ib', 'b');
  const multiplier = UNITS[unit];
  return multiplier === undefined ? undefined : Math.floor(Number(match[1]) * multiplier);
};

const byteSize = z.union([z.number(), z.string()]).transform((value, ctx) => {
  const bytes = parseByteSize(value);
  if (bytes === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" is not a byte size` });
    return z.NEVER;
  }
  return bytes;
});

const positiveInt = z.number().int().positive();

const configSchema = z.object({
  baseDir: z.string().min(1).default('./migration-work'),
  sourceDir: z.string().min(1, 'sourceDir is required'),
  libraryDir: z.string().min(1, 'libraryDir is required'),
  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'verbose', 'debug']).default('info'),
      file: z.boolean().default(true)
    })
    .default({}),
  pipeline: z
    .object({
      concurrency: z
        .object({
          download: positiveInt.default(2),
          extract: positiveInt.default(1),
          metadata: positiveInt.default(4),
          upload: positiveInt.default(4)
        })
        .default({}),
      retry: z
        .object({
          maxAttempts: positiveInt.default(5),
          baseDelayMs: z.number().int().nonnegative().default(1000),
          maxDelayMs: z.number().int().nonnegative().default(60_000)
        })
        .default({}),
      disk: z
        .object({
          budgetBytes: byteSize.nullable().default(null),
          minFreeBytes: byteSize.default(1024 ** 3),
          refreshIntervalMs: z.number().int().nonnegative().default(5000),
          cleanupThreshold: z.number().min(0).max(1).default(0.9),
          pollIntervalMs: positiveInt.default(2000)
        })
        .default({}),
      metadata: z
        .object({
          preserveDates: z.boolean().default(true),
          preserveGps: z.boolean().default(true),
          preserveDescriptions: z.boolean().default(true),
          preserveAlbums: z.boolean().default(true)
        })
        .default({}),
      cleanupAfterUpload: z.boolean().default(true),
      pauseFailureRatio: z.number().min(0).max(1).default(0),
      journalCompactEvery: positiveInt.default(500)
    })
    .default({})
});

export interface MigrationConfig {
  baseDir: string;
  sourceDir: string;
  libraryDir: string;
  logging: { level: LogLevel; file: boolean };
  pipeline: PipelineOptions;
}

export type ConfigEnv = Record<string, string | undefined>;

/** Environment variables win over the file. */
const applyEnvOverrides = (raw: unknown, env: ConfigEnv): Record<string, unknown> => {
  const base: Record<string, unknown> =
    raw && typeof raw === 'object' && !Array.isArray(raw) ? { ...raw } : {};
  if (env.MIGRATION_BASE_DIR) base.baseDir = env.MIGRATION_BASE_DIR;
  if (env.MIGRATION_SOURCE_DIR) base.sourceDir = env.MIGRATION_SOURCE_DIR;
  if (env.MIGRATION_LIBRARY_DIR) base.libraryDir = env.MIGRATION_LIBRARY_DIR;
  if (env.MIGRATION_LOG_LEVEL) {
    const logging = base.logging && typeof base.logging === 'object' ? { ...base.logging } : {};
    base.logging = { ...logging, level: env.MIGRATION_LOG_LEVEL };
  }
  if (env.MIGRATION_DISK_BUDGET_BYTES) {
    const pipeline = base.pipeline && typeof base.pipeline === 'object' ? { ...base.pipeline } : {};
    const disk = 'disk' in pipeline && pipeline.disk && typeof pipeline.disk === 'object' ? { ...pipeline.disk } : {};
    base.pipeline = { ...pipeline, disk: { ...disk, budgetBytes: env.MIGRATION_DISK_BUDGET_BYTES } };
  }
  return base;
};

export const parseConfig = (raw: unknown, env: ConfigEnv = {}, relativeTo = process.cwd()): MigrationConfig => {
  const parsed = configSchema.safeParse(applyEnvOverrides(raw, env));
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  const config = parsed.data;
  return {
    ...config,
    baseDir: path.resolve(relativeTo, config.baseDir),
    sourceDir: path.resolve(relativeTo, config.sourceDir),
    libraryDir: path.resolve(relativeTo, config.libraryDir)
  };
};

/** Reads the YAML file at `configPath`; relative directories resolve against the file's location. */
export const loadConfig = async (configPath: string, env: ConfigEnv = process.env): Promise<MigrationConfig> => {
  let text: string;
  try {
    text = await fs.readFile(configPath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Unable to read configuration file ${configPath}: ${errorMessage(error)}`);
  }
  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Configuration file ${configPath} is not valid YAML: ${errorMessage(error)}`);
  }
  return parseConfig(raw ?? {}, env, path.dirname(path.resolve(configPath)));
};
