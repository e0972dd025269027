/**
 * Engine configuration
 * Environment variables (optionally from .env) validated with zod.
 */
import 'dotenv/config';
import * as path from 'path';
import { z } from 'zod';
import { PoolConfig } from '../spec/types';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

// Unrecognised logging values fall back to their defaults
export const LoggingConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
    .default('info')
    .catch('info'),
  TICKSCRIPT_LOG_SILENT: booleanFlag.catch(false),
});

export const EngineConfigSchema = LoggingConfigSchema.extend({
  TICKSCRIPT_POOL_INITIAL_SIZE: z.coerce.number().int().min(0).default(16),
  TICKSCRIPT_POOL_MAX_SIZE: z.coerce.number().int().min(0).default(1024),
  TICKSCRIPT_STREAM_WINDOW: z.coerce.number().int().positive().default(200),
  TICKSCRIPT_PACKAGE_PATH: z.string().optional(),
});

export interface LoggingConfig {
  logLevel: string;
  logSilent: boolean;
}

export interface EngineConfig extends LoggingConfig {
  pool: PoolConfig;
  streamWindow: number;
  /** Extra package search paths, from a path-delimited list */
  packagePaths: string[];
}

export function loadLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const parsed = LoggingConfigSchema.parse(env);
  return { logLevel: parsed.LOG_LEVEL, logSilent: parsed.TICKSCRIPT_LOG_SILENT };
}

/**
 * Read and validate configuration. Throws a ZodError on invalid engine values.
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = EngineConfigSchema.parse(env);
  return {
    logLevel: parsed.LOG_LEVEL,
    logSilent: parsed.TICKSCRIPT_LOG_SILENT,
    pool: {
      initialSize: parsed.TICKSCRIPT_POOL_INITIAL_SIZE,
      maxSize: parsed.TICKSCRIPT_POOL_MAX_SIZE,
    },
    streamWindow: parsed.TICKSCRIPT_STREAM_WINDOW,
    packagePaths: (parsed.TICKSCRIPT_PACKAGE_PATH ?? '')
      .split(path.delimiter)
      .map((p) => p.trim())
      .filter((p) => p.length > 0),
  };
}
