/**
 * @hls-kit/media
 * 
 * Media analysis layer.
 * 
 * Responsibilities:
 * - Probe files with ffprobe (format and streams)
 * - Build an immutable MediaDescriptor
 * - Recommend a resolution ladder for the source
 */

// Probing
export {
  FFProbe,
  rawFormatSchema,
  rawStreamSchema,
  type FFProbeOptions,
  type RawFormat,
  type RawStream,
} from './probes/ffprobe.js';

// Field parsing
export {
  parseFrameRate,
  parseKbps,
  parseSeconds,
  parseVideoStream,
  parseAudioStream,
  parseSubtitleStream,
} from './parsers.js';

// Analyzer
export { MediaAnalyzer, type MediaAnalyzerOptions } from './analyzer.js';
export { getOptimalResolutions } from './resolutions.js';

// Types
export {
  BITMAP_SUBTITLE_CODECS,
  isBitmapSubtitle,
  aspectRatio,
  mediaDuration,
  type VideoStreamInfo,
  type AudioTrackInfo,
  type SubtitleTrackInfo,
  type MediaDescriptor,
} from './types.js';
