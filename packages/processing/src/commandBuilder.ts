/**
 * FFmpeg Command Builder
 *
 * Fluent API for building the ffmpeg invocations behind each HLS rendition.
 * Also builds the WebVTT extraction command for subtitle tracks.
 */

import { join } from 'node:path';
import {
  DEFAULT_AUDIO_BITRATE_KBPS,
  ValidationError,
  scaleFilter,
  type HlsConfig,
  type RenditionProfile,
} from '@hls-kit/core';
import type { AudioTrackInfo } from '@hls-kit/media';
import { formatCommand } from '@hls-kit/utils';

export interface InputOptions {
  hwaccel?: string;       // -hwaccel
  extraArgs?: string[];   // Additional input args
}

export interface StreamMapping {
  inputIndex: number;
  streamSpec: string;     // e.g., 'v:0', 'a:1', 's:0'
}

export interface VideoCodecOptions {
  codec: string;
  /** Encoder-specific tuning, emitted right after -c:v */
  extraArgs?: string[];
  bitrate?: string;
  maxrate?: string;
  bufsize?: string;
  gopSize?: number;       // -g and -keyint_min
  scThreshold?: number;
}

export interface AudioCodecOptions {
  codec: string;
  bitrate?: string;
  sampleRate?: number;
  extraArgs?: string[];
}

export interface SubtitleOptions {
  codec: string;
}

export interface HlsOutputOptions {
  segmentDuration: number;
  playlistType: 'vod' | 'event';
  flags?: string;
  segmentFilename: string;
}

export class FFmpegCommandBuilder {
  private globalArgs: string[] = [];
  private inputs: { file: string; options: InputOptions }[] = [];
  private mappings: StreamMapping[] = [];
  private videoFilters: string[] = [];
  private videoCodec: VideoCodecOptions | null = null;
  private audioCodec: AudioCodecOptions | null = null;
  private subtitleCodec: SubtitleOptions | null = null;
  private threads: number | null = null;
  private excluded = { video: false, audio: false, subtitles: false };
  private hls: HlsOutputOptions | null = null;
  private outputFile = '';

  /**
   * Add global arguments (before inputs)
   */
  addGlobalArg(...args: string[]): this {
    this.globalArgs.push(...args);
    return this;
  }

  /**
   * Add input file
   */
  addInput(file: string, options: InputOptions = {}): this {
    this.inputs.push({ file, options });
    return this;
  }

  /**
   * Map a stream from an input
   */
  map(inputIndex: number, streamSpec: string): this {
    this.mappings.push({ inputIndex, streamSpec });
    return this;
  }

  mapAudio(inputIndex: number, streamIndex: number): this {
    return this.map(inputIndex, `a:${streamIndex}`);
  }

  mapSubtitles(inputIndex: number, streamIndex: number): this {
    return this.map(inputIndex, `s:${streamIndex}`);
  }

  addVideoFilter(filter: string): this {
    this.videoFilters.push(filter);
    return this;
  }

  setVideoCodec(options: VideoCodecOptions): this {
    this.videoCodec = options;
    return this;
  }

  setAudioCodec(options: AudioCodecOptions): this {
    this.audioCodec = options;
    return this;
  }

  setSubtitleCodec(options: SubtitleOptions): this {
    this.subtitleCodec = options;
    return this;
  }

  setThreads(threads: number): this {
    this.threads = threads;
    return this;
  }

  /**
   * Drop whole stream types from the output (-vn / -an / -sn)
   */
  exclude(...types: ('video' | 'audio' | 'subtitles')[]): this {
    for (const type of types) {
      this.excluded[type] = true;
    }
    return this;
  }

  /**
   * Write an HLS playlist with MPEG-TS segments
   */
  setHlsOutput(options: HlsOutputOptions): this {
    this.hls = options;
    return this;
  }

  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    const args: string[] = [...this.globalArgs];

    // Inputs
    for (const input of this.inputs) {
      if (input.options.hwaccel) {
        args.push('-hwaccel', input.options.hwaccel);
      }
      if (input.options.extraArgs) {
        args.push(...input.options.extraArgs);
      }
      args.push('-i', input.file);
    }

    // Mappings
    for (const mapping of this.mappings) {
      args.push('-map', `${mapping.inputIndex}:${mapping.streamSpec}`);
    }

    if (this.videoFilters.length > 0) {
      args.push('-vf', this.videoFilters.join(','));
    }

    // Video codec
    if (this.videoCodec) {
      const video = this.videoCodec;
      args.push('-c:v', video.codec);
      if (video.extraArgs) args.push(...video.extraArgs);
      if (video.bitrate) args.push('-b:v', video.bitrate);
      if (video.maxrate) args.push('-maxrate', video.maxrate);
      if (video.bufsize) args.push('-bufsize', video.bufsize);
      if (video.gopSize !== undefined) {
        args.push('-g', video.gopSize.toString(), '-keyint_min', video.gopSize.toString());
      }
      if (video.scThreshold !== undefined) args.push('-sc_threshold', video.scThreshold.toString());
    }

    // Audio codec
    if (this.audioCodec) {
      const audio = this.audioCodec;
      args.push('-c:a', audio.codec);
      if (audio.bitrate) args.push('-b:a', audio.bitrate);
      if (audio.sampleRate) args.push('-ar', audio.sampleRate.toString());
      if (audio.extraArgs) args.push(...audio.extraArgs);
    }

    if (this.threads !== null) {
      args.push('-threads', this.threads.toString());
    }

    if (this.excluded.video) args.push('-vn');
    if (this.excluded.audio) args.push('-an');
    if (this.excluded.subtitles) args.push('-sn');

    // Subtitle codec
    if (this.subtitleCodec) {
      args.push('-c:s', this.subtitleCodec.codec);
    }

    if (this.hls) {
      args.push(
        '-hls_time', this.hls.segmentDuration.toString(),
        '-hls_playlist_type', this.hls.playlistType,
      );
      if (this.hls.flags) args.push('-hls_flags', this.hls.flags);
      args.push('-hls_segment_filename', this.hls.segmentFilename);
    }

    if (!this.outputFile) {
      throw new ValidationError('output', 'output file not specified');
    }
    args.push(this.outputFile);

    return args;
  }

  /**
   * Build command as string for logging
   */
  buildString(binary: string = 'ffmpeg'): string {
    return formatCommand(binary, this.build());
  }
}

// ============================================
// Rendition commands
// ============================================

export const PLAYLIST_FILENAME = 'playlist.m3u8';
export const SEGMENT_PATTERN = 'chunk_%03d.ts';
export const HLS_FLAGS = 'independent_segments+temp_file';
export const AUDIO_SAMPLE_RATE = 48000;
export const MAX_AUDIO_BITRATE_KBPS = 320;

export type RenditionCommandConfig = Pick<
  HlsConfig,
  'segmentDuration' | 'playlistType' | 'gopSize' | 'preset' | 'crf' | 'disableHwaccel'
>;

export interface RenditionCommandContext {
  inputFile: string;
  config: RenditionCommandConfig;
  threads: number;
}

/**
 * Tuning flags for encoders that need them
 */
export function encoderTuningArgs(codec: string, config: Pick<HlsConfig, 'preset' | 'crf'>): string[] {
  switch (codec) {
    case 'h264_videotoolbox':
      return ['-allow_sw', '1'];
    case 'h264_nvenc':
      return ['-preset', config.preset, '-rc', 'vbr'];
    case 'libx264':
      return ['-preset', config.preset, '-crf', config.crf.toString()];
    case 'h264_qsv':
      return ['-preset', config.preset];
    default:
      return [];
  }
}

/**
 * Streaming bitrate for an audio track: the source rate capped at 320k, else the default
 */
export function audioBitrateKbps(track: Pick<AudioTrackInfo, 'bitrate'>): number {
  return track.bitrate ? Math.min(track.bitrate, MAX_AUDIO_BITRATE_KBPS) : DEFAULT_AUDIO_BITRATE_KBPS;
}

function createHlsCommand(context: RenditionCommandContext, playlistDir: string): FFmpegCommandBuilder {
  const { config } = context;

  return new FFmpegCommandBuilder()
    .addGlobalArg('-y', '-hide_banner', '-nostats', '-loglevel', 'error', '-progress', 'pipe:2')
    .addInput(context.inputFile, config.disableHwaccel ? {} : { hwaccel: 'auto' })
    .setThreads(context.threads)
    .setHlsOutput({
      segmentDuration: config.segmentDuration,
      playlistType: config.playlistType,
      flags: HLS_FLAGS,
      segmentFilename: join(playlistDir, SEGMENT_PATTERN),
    })
    .setOutput(join(playlistDir, PLAYLIST_FILENAME));
}

/**
 * One scaled video rendition, no audio or subtitles
 */
export function createVideoRenditionCommand(
  context: RenditionCommandContext,
  profile: RenditionProfile,
  encoder: string,
  playlistDir: string
): FFmpegCommandBuilder {
  const maxKbps = profile.maxBitrateKbps;

  return createHlsCommand(context, playlistDir)
    .addVideoFilter(`scale=${scaleFilter(profile)}`)
    .setVideoCodec({
      codec: encoder,
      extraArgs: encoderTuningArgs(encoder, context.config),
      bitrate: `${maxKbps}k`,
      maxrate: `${Math.trunc(maxKbps * 1.2)}k`,
      bufsize: `${maxKbps * 2}k`,
      gopSize: context.config.gopSize,
      scThreshold: 0,
    })
    .exclude('audio', 'subtitles');
}

/**
 * One audio track resampled to 48 kHz, no video or subtitles
 */
export function createAudioRenditionCommand(
  context: RenditionCommandContext,
  track: AudioTrackInfo,
  encoder: string,
  playlistDir: string
): FFmpegCommandBuilder {
  return createHlsCommand(context, playlistDir)
    .mapAudio(0, track.index)
    .setAudioCodec({
      codec: encoder,
      bitrate: `${audioBitrateKbps(track)}k`,
      sampleRate: AUDIO_SAMPLE_RATE,
    })
    .exclude('video', 'subtitles');
}

/**
 * Extract one subtitle stream as WebVTT
 */
export function createSubtitleCommand(
  inputFile: string,
  subtitleIndex: number,
  outputFile: string
): FFmpegCommandBuilder {
  return new FFmpegCommandBuilder()
    .addGlobalArg('-y')
    .addInput(inputFile)
    .mapSubtitles(0, subtitleIndex)
    .exclude('video', 'audio')
    .setSubtitleCodec({ codec: 'webvtt' })
    .setOutput(outputFile);
}
