/**
 * CLI Configuration
 * 
 * Environment loaded from the repository's `.env` (if any) and validated
 * with zod.
 */

import { config as dotenvConfig } from 'dotenv';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { ValidationError } from '@streamplan/core';
import { z } from 'zod';

const __dirname = dirname(fileURLToPath(import.meta.url));
const repoRoot = resolve(__dirname, '../../../..');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Media tools
  FFPROBE_PATH: z.string().min(1).default('ffprobe'),
  FFMPEG_PATH: z.string().min(1).default('ffmpeg'),

  // Original-language lookups
  RADARR_URL: z.string().url().default('http://localhost:7878'),
  RADARR_API_KEY: z.string().optional(),
  SONARR_URL: z.string().url().default('http://localhost:8989'),
  SONARR_API_KEY: z.string().optional(),
  LOOKUP_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
});

export interface CliConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: string;
  mediaTools: {
    ffprobe: string;
    ffmpeg: string;
  };
  radarr: { url: string; apiKey?: string };
  sonarr: { url: string; apiKey?: string };
  lookupTimeoutMs: number;
}

/**
 * Load `.env` from the repository root into `process.env`
 */
export function loadEnvFile(): void {
  dotenvConfig({ path: resolve(repoRoot, '.env') });
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const parseResult = envSchema.safeParse(env);
  if (!parseResult.success) {
    const issue = parseResult.error.issues[0];
    throw new ValidationError(issue?.path.join('.') ?? 'environment', issue?.message ?? 'invalid environment');
  }

  const parsed = parseResult.data;
  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    mediaTools: {
      ffprobe: parsed.FFPROBE_PATH,
      ffmpeg: parsed.FFMPEG_PATH,
    },
    radarr: { url: parsed.RADARR_URL, apiKey: parsed.RADARR_API_KEY },
    sonarr: { url: parsed.SONARR_URL, apiKey: parsed.SONARR_API_KEY },
    lookupTimeoutMs: parsed.LOOKUP_TIMEOUT_MS,
  };
}
