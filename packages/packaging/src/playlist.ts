/**
 * Master playlist
 *
 * Audio renditions first, in discovery order, then one variant per video
 * rendition in ladder order. Every variant references the shared audio group.
 */

import { join } from 'node:path';
import { ManifestWriteError } from '@hls-kit/core';
import { createLogger, safeWriteFile } from '@hls-kit/utils';

const logger = createLogger({ component: 'playlist' });

export const MASTER_PLAYLIST_FILENAME = 'master.m3u8';
export const VIDEO_CODECS = 'avc1.640029';
export const AUDIO_GROUP_ID = 'audio';

export interface MasterAudioEntry {
  /** Unique rendition label, used for NAME and the directory */
  label: string;
  directory: string;
  track: { language: string };
}

export interface MasterVariantEntry {
  name: string;
  width: number;
  height: number;
  maxBitrateKbps: number;
}

export function renderMasterPlaylist(
  variants: readonly MasterVariantEntry[],
  audio: readonly MasterAudioEntry[]
): string {
  const lines = ['#EXTM3U'];

  audio.forEach((entry, i) => {
    lines.push(
      `#EXT-X-MEDIA:TYPE=AUDIO,GROUP-ID="${AUDIO_GROUP_ID}",NAME="${entry.label}",` +
      `DEFAULT=${i === 0 ? 'YES' : 'NO'},AUTOSELECT=YES,LANGUAGE="${entry.track.language}",` +
      `URI="${entry.directory}/playlist.m3u8"`
    );
  });

  for (const variant of variants) {
    lines.push(
      `#EXT-X-STREAM-INF:BANDWIDTH=${variant.maxBitrateKbps * 1000},` +
      `RESOLUTION=${variant.width}x${variant.height},CODECS="${VIDEO_CODECS}",AUDIO="${AUDIO_GROUP_ID}"`,
      `${variant.name}/playlist.m3u8`
    );
  }

  return lines.join('\n');
}

/**
 * Write master.m3u8 into `outputDir` and return its path
 */
export async function buildMasterPlaylist(
  outputDir: string,
  variants: readonly MasterVariantEntry[],
  audio: readonly MasterAudioEntry[]
): Promise<string> {
  const filePath = join(outputDir, MASTER_PLAYLIST_FILENAME);
  try {
    await safeWriteFile(filePath, renderMasterPlaylist(variants, audio));
  } catch (error) {
    throw new ManifestWriteError(filePath, error);
  }
  logger.info({ filePath, variants: variants.length, audio: audio.length }, 'Master playlist written');
  return filePath;
}
