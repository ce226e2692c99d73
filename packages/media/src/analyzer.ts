/**
 * Media Analyzer
 * 
 * Turns ffprobe output into a MediaDescriptor. Probe failures are logged and
 * degrade to "no information" so a conversion can still go ahead with defaults.
 */

import { createLogger, getFileSizeBytes, type Logger } from '@hls-kit/utils';
import { ProbeError } from '@hls-kit/core';
import { FFProbe, type RawFormat, type RawStream } from './probes/ffprobe.js';
import {
  parseAudioStream,
  parseSeconds,
  parseSubtitleStream,
  parseVideoStream,
} from './parsers.js';
import { getOptimalResolutions } from './resolutions.js';
import type { MediaDescriptor, VideoStreamInfo } from './types.js';

export interface MediaAnalyzerOptions {
  ffprobe?: FFProbe;
  logger?: Logger;
}

export class MediaAnalyzer {
  private readonly ffprobe: FFProbe;
  private readonly logger: Logger;

  constructor(options: MediaAnalyzerOptions = {}) {
    this.ffprobe = options.ffprobe ?? new FFProbe();
    this.logger = options.logger ?? createLogger({ component: 'media-analyzer' });
  }

  /**
   * Probe a file and build its descriptor
   */
  async analyze(filePath: string): Promise<MediaDescriptor> {
    const [format, streams, fileSize] = await Promise.all([
      this.degrade(this.ffprobe.probeFormat(filePath), {}),
      this.degrade(this.ffprobe.probeStreams(filePath), []),
      getFileSizeBytes(filePath),
    ]);

    const descriptor = this.buildDescriptor(format, streams, fileSize);
    this.logAnalysis(filePath, descriptor);
    return descriptor;
  }

  /**
   * Recommended ladder labels for a video stream
   */
  getOptimalResolutions(video: VideoStreamInfo | undefined): string[] {
    return getOptimalResolutions(video);
  }

  private buildDescriptor(
    format: RawFormat,
    streams: RawStream[],
    fileSize: number | null
  ): MediaDescriptor {
    const videoStream = streams.find(s => s.codec_type === 'video');
    const audioTracks = streams
      .filter(s => s.codec_type === 'audio')
      .map((s, index) => parseAudioStream(s, index));
    const subtitleTracks = streams
      .filter(s => s.codec_type === 'subtitle')
      .map((s, index) => parseSubtitleStream(s, index));

    return Object.freeze({
      video: videoStream ? parseVideoStream(videoStream) : undefined,
      audioTracks: Object.freeze(audioTracks),
      subtitleTracks: Object.freeze(subtitleTracks),
      formatName: format.format_name,
      formatDuration: parseSeconds(format.duration),
      fileSize: fileSize ?? undefined,
    });
  }

  private async degrade<T>(query: Promise<T>, fallback: T): Promise<T> {
    try {
      return await query;
    } catch (error) {
      if (error instanceof ProbeError) {
        this.logger.warn({ err: error }, 'Probe query failed, continuing without its data');
        return fallback;
      }
      throw error;
    }
  }

  private logAnalysis(filePath: string, descriptor: MediaDescriptor): void {
    const { video } = descriptor;
    this.logger.info({
      filePath,
      format: descriptor.formatName,
      video: video
        ? `${video.width}x${video.height} @ ${video.fps.toFixed(2)}fps${video.bitrate ? `, ${video.bitrate}kbps` : ''}`
        : null,
      audioTracks: descriptor.audioTracks.map(t => t.language),
      subtitleTracks: descriptor.subtitleTracks.map(t => `${t.language}(${t.codec})`),
    }, 'Media analysis complete');
  }
}
