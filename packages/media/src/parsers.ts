/**
 * ffprobe field parsing
 * 
 * ffprobe reports most numbers as strings ("30000/1001", "128000", "N/A").
 * Anything that does not parse is treated as absent or zero, never as an error.
 */

import { isDigitString } from '@hls-kit/utils';
import type { RawStream } from './probes/ffprobe.js';
import type { AudioTrackInfo, SubtitleTrackInfo, VideoStreamInfo } from './types.js';

function toFloat(value: string | undefined): number | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  if (trimmed === '') return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Parse "num/den" (or a plain number) into frames per second
 */
export function parseFrameRate(value: string | undefined): number {
  const raw = value ?? '0/1';

  if (raw.includes('/')) {
    const parts = raw.split('/');
    if (parts.length !== 2) return 0;
    const num = toFloat(parts[0]);
    const den = toFloat(parts[1]);
    if (num === null || den === null || den === 0) return 0;
    return num / den;
  }

  return toFloat(raw) ?? 0;
}

/**
 * bits/s string -> kbps (integer division), or undefined
 */
export function parseKbps(value: string | undefined): number | undefined {
  if (!isDigitString(value)) return undefined;
  return Math.floor(parseInt(value, 10) / 1000);
}

export function parseSeconds(value: string | undefined): number | undefined {
  return toFloat(value) ?? undefined;
}

export function parseVideoStream(stream: RawStream): VideoStreamInfo {
  return {
    width: Math.trunc(stream.width ?? 0),
    height: Math.trunc(stream.height ?? 0),
    duration: parseSeconds(stream.duration) ?? 0,
    fps: parseFrameRate(stream.avg_frame_rate),
    bitrate: parseKbps(stream.bit_rate),
    codec: stream.codec_name,
  };
}

export function parseAudioStream(stream: RawStream, index: number): AudioTrackInfo {
  return {
    index,
    language: stream.tags?.['language'] ?? `und_${index}`,
    codec: stream.codec_name,
    bitrate: parseKbps(stream.bit_rate),
    sampleRate: isDigitString(stream.sample_rate) ? parseInt(stream.sample_rate, 10) : undefined,
    channels: stream.channels,
  };
}

export function parseSubtitleStream(stream: RawStream, index: number): SubtitleTrackInfo {
  return {
    index,
    language: stream.tags?.['language'] ?? `und_${index}`,
    codec: stream.codec_name ?? '',
  };
}
