import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError } from '../errors/index.js';
import type { DownloadConfig, ResolvedDownloadConfig } from '../types/index.js';

export const APP_NAME = 'hlsfetch';

export const DEFAULT_MAX_WORKERS = 16;
export const MAX_WORKERS_LIMIT = 32;
export const DEFAULT_RETRIES = 3;
export const DEFAULT_RETRY_DELAY_MS = 1000;
export const DEFAULT_TIMEOUT_MS = 30000;

export function defaultCacheDir(): string {
  return path.join(os.homedir(), '.cache', APP_NAME);
}

const downloadConfigSchema = z.object({
  maxWorkers: z.coerce
    .number()
    .int('maxWorkers must be an integer')
    .min(1, 'maxWorkers must be at least 1')
    .max(MAX_WORKERS_LIMIT, `maxWorkers must be at most ${MAX_WORKERS_LIMIT}`),
  timeout: z.coerce.number().int('timeout must be an integer').positive('timeout must be positive'),
  retries: z.coerce
    .number()
    .int('retries must be an integer')
    .min(1, 'retries must be at least 1')
    .max(10, 'retries must be at most 10'),
  retryDelay: z.coerce.number().int('retryDelay must be an integer').nonnegative('retryDelay cannot be negative'),
  cacheDir: z.string().min(1, 'cacheDir cannot be empty'),
  ffmpegPath: z.string().min(1, 'ffmpegPath cannot be empty'),
  headers: z.record(z.string(), z.string()),
  logLevel: z.enum(['error', 'warn', 'info', 'debug']),
});

/**
 * Merges caller options over environment overrides and defaults, then validates.
 * Explicit options win over `HLSFETCH_*` variables.
 */
export function resolveConfig(
  input: DownloadConfig = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedDownloadConfig {
  const candidate = {
    maxWorkers: input.maxWorkers ?? env.HLSFETCH_WORKERS ?? DEFAULT_MAX_WORKERS,
    timeout: input.timeout ?? DEFAULT_TIMEOUT_MS,
    retries: input.retries ?? DEFAULT_RETRIES,
    retryDelay: input.retryDelay ?? DEFAULT_RETRY_DELAY_MS,
    cacheDir: input.cacheDir ?? env.HLSFETCH_CACHE_DIR ?? defaultCacheDir(),
    ffmpegPath: input.ffmpegPath ?? env.HLSFETCH_FFMPEG ?? 'ffmpeg',
    headers: input.headers ?? {},
    logLevel: input.logLevel ?? env.HLSFETCH_LOG_LEVEL ?? 'info',
  };

  const result = downloadConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    );
  }

  return { ...result.data, cacheDir: path.resolve(result.data.cacheDir) };
}
