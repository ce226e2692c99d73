/**
 * Rendition Types
 */

export const DEFAULT_AUDIO_BITRATE_KBPS = 160;

export interface RenditionProfile {
  /** Rendition name, also the output sub-directory ("720p") */
  name: string;
  width: number;
  height: number;
  maxBitrateKbps: number;
  minBitrateKbps: number;
  audioBitrateKbps: number;
}

export function resolutionLabel(profile: Pick<RenditionProfile, 'height'>): string {
  return `${profile.height}p`;
}

/**
 * ffmpeg scale filter argument ("1280:720")
 */
export function scaleFilter(profile: Pick<RenditionProfile, 'width' | 'height'>): string {
  return `${profile.width}:${profile.height}`;
}

export function pixelCount(profile: Pick<RenditionProfile, 'width' | 'height'>): number {
  return profile.width * profile.height;
}
