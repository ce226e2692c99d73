/**
 * HLS Converter
 *
 * Drives one conversion end to end: encoder detection, media analysis,
 * ladder planning, the rendition pipeline and the master playlist.
 * Rendition failures end up in the report; only missing input, unusable
 * output directories and playlist write failures are thrown.
 */

import {
  InputNotFoundError,
  getBinaryPath,
  type HlsConfig,
  type RenditionProfile,
} from '@hls-kit/core';
import {
  FFProbe,
  MediaAnalyzer,
  getOptimalResolutions,
  mediaDuration,
  type MediaDescriptor,
} from '@hls-kit/media';
import { buildMasterPlaylist } from '@hls-kit/packaging';
import {
  EncoderCatalog,
  JobExecutor,
  RenditionPipeline,
  SubtitleConverter,
  createAdaptiveProfiles,
  filterByLabels,
  resolveWorkerCount,
  selectProfiles,
  type EncoderSelection,
  type PipelineResult,
} from '@hls-kit/processing';
import { createLogger, ensureDir, isFile, type Logger } from '@hls-kit/utils';
import type { ConversionOptions, ConversionReport, StepTimings } from './types.js';

export type EncoderDetector = Pick<EncoderCatalog, 'detect'>;
export type MediaProbe = Pick<MediaAnalyzer, 'analyze'>;
export type RenditionRunner = Pick<RenditionPipeline, 'run' | 'cancel'>;

export interface HlsConverterOptions {
  ffmpegPath?: string;
  ffprobePath?: string;
  /** Used for every conversion; otherwise one catalog per software-only setting */
  catalog?: EncoderDetector;
  analyzer?: MediaProbe;
  pipeline?: RenditionRunner;
  logger?: Logger;
}

export class HlsConverter {
  private readonly ffmpegPath: string;
  private readonly catalog?: EncoderDetector;
  private readonly catalogs = new Map<boolean, EncoderCatalog>();
  private readonly analyzer: MediaProbe;
  private readonly pipeline: RenditionRunner;
  private readonly logger: Logger;

  constructor(options: HlsConverterOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? getBinaryPath('ffmpeg');
    this.catalog = options.catalog;
    this.analyzer = options.analyzer ?? new MediaAnalyzer({
      ffprobe: new FFProbe({ ffprobePath: options.ffprobePath ?? getBinaryPath('ffprobe') }),
    });
    this.pipeline = options.pipeline ?? new RenditionPipeline({
      executor: new JobExecutor({ ffmpegPath: this.ffmpegPath }),
      subtitleConverter: new SubtitleConverter({ ffmpegPath: this.ffmpegPath }),
    });
    this.logger = options.logger ?? createLogger({ component: 'converter' });
  }

  /**
   * Encoder selection for a configuration, cached per catalog
   */
  detectEncoders(config: Pick<HlsConfig, 'forceSoftwareEncoding'>): Promise<EncoderSelection> {
    return this.catalogFor(config.forceSoftwareEncoding).detect();
  }

  async convert(inputFile: string, outputDir: string, options: ConversionOptions): Promise<ConversionReport> {
    const startTime = Date.now();
    const { config } = options;

    if (!(await isFile(inputFile))) {
      throw new InputNotFoundError(inputFile);
    }
    await ensureDir(outputDir);

    this.logger.info({ inputFile, outputDir }, 'Starting HLS conversion');

    let stepStart = Date.now();
    const lap = (): number => {
      const now = Date.now();
      const elapsed = now - stepStart;
      stepStart = now;
      return elapsed;
    };

    const encoders = await this.detectEncoders(config);
    const encoderDetectionMs = lap();

    const descriptor = await this.analyzer.analyze(inputFile);
    const mediaAnalysisMs = lap();

    const profiles = this.planProfiles(descriptor, config, options.resolutions);
    const workers = resolveWorkerCount(config.maxWorkers);
    const durationSeconds = mediaDuration(descriptor);
    this.logger.info({
      renditions: profiles.map(p => p.name),
      audioTracks: descriptor.audioTracks.length,
      subtitleTracks: descriptor.subtitleTracks.length,
      workers,
      durationSeconds,
    }, 'Conversion planned');
    const configurationMs = lap();

    const result = await this.pipeline.run({
      inputFile,
      outputDir,
      profiles,
      audioTracks: descriptor.audioTracks,
      subtitleTracks: descriptor.subtitleTracks,
      encoders,
      config,
      durationSeconds,
      workers,
      onProgress: options.onProgress,
      onJobComplete: options.onJobComplete,
    });
    const streamProcessingMs = lap();

    const { variants, audio } = playlistEntries(profiles, result);
    const masterPlaylist = await buildMasterPlaylist(outputDir, variants, audio);
    const playlistCreationMs = lap();

    const stepTimings: StepTimings = {
      encoderDetectionMs,
      mediaAnalysisMs,
      configurationMs,
      streamProcessingMs,
      playlistCreationMs,
    };
    const totalDurationMs = Date.now() - startTime;

    const jobs = [...result.video, ...result.audio];
    const failed = jobs.filter(job => job.status === 'error');
    const report: ConversionReport = {
      success: jobs.length === 0 || failed.length < jobs.length,
      outcome: failed.length > 0 ? 'partial' : 'complete',
      inputFile,
      outputDir,
      masterPlaylist,
      createdResolutions: variants.map(v => v.name),
      failedRenditions: failed.map(job => `${job.kind}:${job.name}`),
      audioTrackCount: audio.length,
      subtitleTrackCount: result.subtitles.filter(s => s.status === 'success').length,
      encoders: { video: encoders.video, audio: encoders.audio },
      jobs,
      subtitles: result.subtitles,
      stepTimings,
      totalDurationMs,
      inputSizeBytes: descriptor.fileSize,
      processingSpeedMBps: processingSpeed(descriptor.fileSize, totalDurationMs),
    };

    const summary = {
      outcome: report.outcome,
      resolutions: report.createdResolutions,
      failed: report.failedRenditions,
      totalDurationMs,
    };
    if (failed.length > 0) {
      this.logger.warn(summary, 'HLS conversion finished with failed renditions');
    } else {
      this.logger.info(summary, 'HLS conversion finished');
    }

    return report;
  }

  /**
   * Stop every running encode of the current conversion
   */
  cancel(): Promise<number> {
    return this.pipeline.cancel();
  }

  private planProfiles(
    descriptor: MediaDescriptor,
    config: HlsConfig,
    requested?: readonly string[]
  ): RenditionProfile[] {
    const { video } = descriptor;
    if (!video) {
      this.logger.warn('No video stream found, producing audio renditions only');
      return [];
    }

    if (config.bitrateProfiles && config.bitrateProfiles.length > 0) {
      if (requested && requested.length > 0) {
        this.logger.warn('Custom bitrate profiles configured, ignoring requested resolutions');
      }
      return config.bitrateProfiles.map(profile => ({ ...profile }));
    }

    const adaptive = createAdaptiveProfiles(video.width, video.height, video.bitrate);
    if (requested && requested.length > 0) {
      return selectProfiles(adaptive, requested);
    }
    return filterByLabels(adaptive, getOptimalResolutions(video));
  }

  private catalogFor(forceSoftware: boolean): EncoderDetector {
    if (this.catalog) return this.catalog;

    let catalog = this.catalogs.get(forceSoftware);
    if (!catalog) {
      catalog = new EncoderCatalog({ ffmpegPath: this.ffmpegPath, forceSoftware });
      this.catalogs.set(forceSoftware, catalog);
    }
    return catalog;
  }
}

/**
 * Only renditions whose encode succeeded go into the master playlist
 */
function playlistEntries(profiles: readonly RenditionProfile[], result: PipelineResult) {
  const succeeded = (kind: 'video' | 'audio') => new Set(
    (kind === 'video' ? result.video : result.audio)
      .filter(job => job.status === 'success')
      .map(job => job.name)
  );
  const videoOk = succeeded('video');
  const audioOk = succeeded('audio');

  return {
    variants: profiles.filter(profile => videoOk.has(profile.name)),
    audio: result.audioRenditions.filter(rendition => audioOk.has(rendition.label)),
  };
}

function processingSpeed(fileSize: number | undefined, totalDurationMs: number): number | null {
  if (fileSize === undefined || totalDurationMs <= 0) return null;
  return fileSize / (1024 * 1024) / (totalDurationMs / 1000);
}
