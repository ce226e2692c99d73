/**
 * HLS Configuration
 * 
 * Encoding and packaging settings consumed by the converter.
 * Persisted as pretty-printed JSON.
 */

import { z } from 'zod';
import { safeReadFile, safeWriteFile } from '@hls-kit/utils';
import { ConfigFileError } from '../errors/index.js';
import { DEFAULT_AUDIO_BITRATE_KBPS } from '../types/rendition.js';

export const X264_PRESETS = [
  'ultrafast',
  'superfast',
  'veryfast',
  'faster',
  'fast',
  'medium',
  'slow',
  'slower',
  'veryslow',
] as const;

export type EncoderPreset = (typeof X264_PRESETS)[number];

export const renditionProfileSchema = z
  .object({
    // Used as the output directory and playlist URI
    name: z.string().regex(/^[A-Za-z0-9_-]+$/, 'name may only contain letters, digits, "_" and "-"'),
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    maxBitrateKbps: z.number().int().positive(),
    minBitrateKbps: z.number().int().positive(),
    audioBitrateKbps: z.number().int().positive().default(DEFAULT_AUDIO_BITRATE_KBPS),
  })
  .refine(p => p.minBitrateKbps <= p.maxBitrateKbps, {
    message: 'minBitrateKbps must not exceed maxBitrateKbps',
    path: ['minBitrateKbps'],
  });

export const hlsConfigSchema = z.object({
  // Output
  segmentDuration: z.number().int().min(1).default(2),
  playlistType: z.enum(['vod', 'event']).default('vod'),
  gopSize: z.number().int().min(1).default(48),

  // Processing
  maxWorkers: z.number().int().min(1).optional(),
  forceSoftwareEncoding: z.boolean().default(false),
  disableHwaccel: z.boolean().default(false),
  encoderThreads: z.number().int().min(1).optional(),
  encodeTimeoutMs: z.number().int().positive().optional(),

  // Quality
  preset: z.enum(X264_PRESETS).default('fast'),
  crf: z.number().int().min(0).max(51).default(23),

  // Subtitles
  convertSubtitles: z.boolean().default(true),
  skipBitmapSubtitles: z.boolean().default(true),
  subtitleTimeoutMs: z.number().int().positive().default(60000),

  // Replaces the adaptive ladder when non-empty
  bitrateProfiles: z
    .array(renditionProfileSchema)
    .superRefine((profiles, ctx) => {
      const seen = new Set<string>();
      profiles.forEach((profile, index) => {
        if (seen.has(profile.name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `duplicate profile name "${profile.name}"`,
            path: [index, 'name'],
          });
        }
        seen.add(profile.name);
      });
    })
    .optional(),
});

export type HlsConfig = z.infer<typeof hlsConfigSchema>;
export type HlsConfigInput = z.input<typeof hlsConfigSchema>;

export function defaultConfig(): HlsConfig {
  return hlsConfigSchema.parse({});
}

/**
 * Validate a plain object (e.g. parsed JSON) into a full configuration
 */
export function parseConfig(input: unknown): HlsConfig {
  return hlsConfigSchema.parse(input);
}

export function serializeConfig(config: HlsConfig): string {
  return JSON.stringify(config, null, 2);
}

/**
 * Load a configuration file. Missing keys take their defaults.
 */
export async function loadConfigFile(filePath: string): Promise<HlsConfig> {
  const content = await safeReadFile(filePath);
  if (content === null) {
    throw new ConfigFileError(filePath, 'file not found');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigFileError(filePath, 'not valid JSON', error);
  }

  const parsed = hlsConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigFileError(filePath, issues, parsed.error);
  }

  return parsed.data;
}

export async function saveConfigFile(filePath: string, config: HlsConfig): Promise<void> {
  await safeWriteFile(filePath, serializeConfig(config));
}
