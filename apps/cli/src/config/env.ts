/**
 * CLI Environment
 *
 * Loads .env from the monorepo root before anything reads process.env.
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../..');

dotenvConfig({ path: resolve(monorepoRoot, '.env') });

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  FFMPEG_PATH: z.string().min(1).default('ffmpeg'),
  FFPROBE_PATH: z.string().min(1).default('ffprobe'),
  HLS_KIT_WORKERS: z.coerce.number().int().min(1).optional(),
});

export interface CliEnv {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: string;
  ffmpegPath: string;
  ffprobePath: string;
  workers?: number;
}

export function parseEnv(source: NodeJS.ProcessEnv): CliEnv {
  const parsed = envSchema.parse(source);
  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    ffmpegPath: parsed.FFMPEG_PATH,
    ffprobePath: parsed.FFPROBE_PATH,
    workers: parsed.HLS_KIT_WORKERS,
  };
}

const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Invalid environment configuration:');
  console.error(parseResult.error.format());
  process.exit(1);
}

export const env: CliEnv = parseEnv(process.env);
