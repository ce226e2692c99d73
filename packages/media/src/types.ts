/**
 * Media Types
 * 
 * What the converter needs to know about an input file.
 * Built once per conversion by the analyzer and never mutated afterwards.
 */

export interface VideoStreamInfo {
  readonly width: number;
  readonly height: number;
  readonly duration: number; // seconds
  readonly fps: number;
  readonly bitrate?: number; // kbps
  readonly codec?: string;
}

export interface AudioTrackInfo {
  /** Ordinal among audio streams, in the order ffprobe lists them */
  readonly index: number;
  readonly language: string;
  readonly codec?: string;
  readonly bitrate?: number; // kbps
  readonly sampleRate?: number; // Hz
  readonly channels?: number;
}

export interface SubtitleTrackInfo {
  /** Ordinal among subtitle streams */
  readonly index: number;
  readonly language: string;
  readonly codec: string;
}

export interface MediaDescriptor {
  readonly video?: VideoStreamInfo;
  readonly audioTracks: readonly AudioTrackInfo[];
  readonly subtitleTracks: readonly SubtitleTrackInfo[];
  readonly formatName?: string;
  /** Container duration in seconds, when ffprobe reports one */
  readonly formatDuration?: number;
  readonly fileSize?: number; // bytes
}

// Image-based subtitles cannot be converted to text without OCR
export const BITMAP_SUBTITLE_CODECS: ReadonlySet<string> = new Set([
  'hdmv_pgs_subtitle',
  'dvd_subtitle',
  'dvb_subtitle',
]);

export function isBitmapSubtitle(track: Pick<SubtitleTrackInfo, 'codec'>): boolean {
  return BITMAP_SUBTITLE_CODECS.has(track.codec.toLowerCase());
}

export function aspectRatio(video: Pick<VideoStreamInfo, 'width' | 'height'>): number {
  return video.height > 0 ? video.width / video.height : 1.0;
}

/**
 * Duration used for progress reporting: the video stream's, else the container's
 */
export function mediaDuration(descriptor: MediaDescriptor): number {
  const videoDuration = descriptor.video?.duration ?? 0;
  if (videoDuration > 0) return videoDuration;
  return descriptor.formatDuration ?? 0;
}
