/**
 * Command-line overrides on top of the file (or default) configuration
 */

import {
  ConfigFileError,
  ValidationError,
  defaultConfig,
  hlsConfigSchema,
  loadConfigFile,
  type HlsConfig,
  type EncoderPreset,
  type HlsConfigInput,
} from '@hls-kit/core';
import { printWarning } from '../lib/output.js';

export interface ConvertFlags {
  output?: string;
  resolutions?: string;
  preset?: EncoderPreset;
  crf?: number;
  workers?: number;
  segmentDuration?: number;
  gopSize?: number;
  /** false with --no-subtitles */
  subtitles?: boolean;
  includeBitmapSubtitles?: boolean;
  config?: string;
  saveConfig?: string;
  softwareOnly?: boolean;
  /** false with --no-hwaccel */
  hwaccel?: boolean;
  threads?: number;
  /** Seconds */
  encodeTimeout?: number;
  json?: boolean;
}

/**
 * Merge flags into `base`. Flags win over HLS_KIT_WORKERS, which wins over
 * the file. The result is validated again.
 */
export function buildConfig(base: HlsConfig, flags: ConvertFlags, envWorkers?: number): HlsConfig {
  const merged: HlsConfigInput = { ...base };

  if (flags.preset !== undefined) merged.preset = flags.preset;
  if (flags.crf !== undefined) merged.crf = flags.crf;
  if (flags.segmentDuration !== undefined) merged.segmentDuration = flags.segmentDuration;
  if (flags.gopSize !== undefined) merged.gopSize = flags.gopSize;
  if (flags.threads !== undefined) merged.encoderThreads = flags.threads;
  if (flags.encodeTimeout !== undefined) merged.encodeTimeoutMs = flags.encodeTimeout * 1000;

  const workers = flags.workers ?? envWorkers;
  if (workers !== undefined) merged.maxWorkers = workers;

  if (flags.subtitles === false) merged.convertSubtitles = false;
  if (flags.includeBitmapSubtitles) merged.skipBitmapSubtitles = false;
  if (flags.softwareOnly) merged.forceSoftwareEncoding = true;
  if (flags.hwaccel === false) merged.disableHwaccel = true;

  const result = hlsConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError('config', issues.join('; '));
  }
  return result.data;
}

/**
 * File configuration, or defaults with a warning when it can't be used
 */
export async function loadBaseConfig(filePath?: string): Promise<HlsConfig> {
  if (!filePath) return defaultConfig();

  try {
    return await loadConfigFile(filePath);
  } catch (error) {
    if (error instanceof ConfigFileError) {
      printWarning(`${error.message}, using defaults`);
      return defaultConfig();
    }
    throw error;
  }
}
