/**
 * Rendition Pipeline
 *
 * Runs every encode for one conversion: all video renditions on a bounded
 * pool, then all audio renditions on the same pool size, then the subtitle
 * tracks one by one. Individual failures are recorded, never thrown.
 */

import { join } from 'node:path';
import type { RenditionProfile } from '@hls-kit/core';
import type { AudioTrackInfo } from '@hls-kit/media';
import { createLogger, ensureDir, sanitizeFilename, type Logger } from '@hls-kit/utils';
import {
  createAudioRenditionCommand,
  createVideoRenditionCommand,
  type RenditionCommandContext,
} from './commandBuilder.js';
import { JobExecutor } from './jobExecutor.js';
import { SubtitleConverter } from './subtitles.js';
import { runWithConcurrency, threadsPerJob } from './workerPool.js';
import type {
  AudioRendition,
  JobProgress,
  PipelinePlan,
  PipelineResult,
  RenditionJobResult,
  RenditionJobSpec,
  RenditionKind,
} from './types.js';

/**
 * Unique, file-safe rendition names for audio tracks. Tracks sharing a
 * language tag get numbered: audio_eng, audio_eng_1.
 */
export function assignAudioRenditions(tracks: readonly AudioTrackInfo[]): AudioRendition[] {
  const used = new Set<string>();

  return tracks.map(track => {
    const base = sanitizeFilename(track.language) || `und_${track.index}`;
    let label = base;
    for (let n = 1; used.has(label); n++) {
      label = `${base}_${n}`;
    }
    used.add(label);
    return { track, label, directory: `audio_${label}` };
  });
}

export interface RenditionPipelineOptions {
  executor?: JobExecutor;
  subtitleConverter?: SubtitleConverter;
  logger?: Logger;
}

export class RenditionPipeline {
  private readonly executor: JobExecutor;
  private readonly subtitleConverter: SubtitleConverter;
  private readonly logger: Logger;

  constructor(options: RenditionPipelineOptions = {}) {
    this.executor = options.executor ?? new JobExecutor();
    this.subtitleConverter = options.subtitleConverter ?? new SubtitleConverter();
    this.logger = options.logger ?? createLogger({ component: 'rendition-pipeline' });
  }

  /**
   * Run a single job
   */
  runJob(spec: RenditionJobSpec): Promise<RenditionJobResult> {
    return this.executor.runJob(spec);
  }

  /**
   * Stop all running encodes
   */
  cancel(): Promise<number> {
    return this.executor.cancelAll();
  }

  async run(plan: PipelinePlan): Promise<PipelineResult> {
    const { config, outputDir } = plan;
    const context: RenditionCommandContext = {
      inputFile: plan.inputFile,
      config,
      threads: threadsPerJob(plan.workers, config.encoderThreads),
    };

    const forwardProgress = (progress: JobProgress): void => plan.onProgress?.(progress);
    this.executor.on('progress', forwardProgress);

    try {
      this.logger.info({
        renditions: plan.profiles.map(p => p.name),
        workers: plan.workers,
        threads: context.threads,
        encoder: plan.encoders.video.codec,
      }, 'Processing video renditions');

      const video = await runWithConcurrency(
        plan.profiles,
        plan.workers,
        (profile: RenditionProfile) => {
          const dir = join(outputDir, profile.name);
          return this.prepareAndRun(profile.name, 'video', dir, plan, () =>
            createVideoRenditionCommand(context, profile, plan.encoders.video.codec, dir).build()
          );
        },
        plan.onJobComplete
      );

      const audioRenditions = assignAudioRenditions(plan.audioTracks);
      this.logger.info({
        tracks: audioRenditions.map(r => r.label),
        encoder: plan.encoders.audio.codec,
      }, 'Processing audio renditions');

      const audio = await runWithConcurrency(
        audioRenditions,
        plan.workers,
        (rendition: AudioRendition) => {
          const dir = join(outputDir, rendition.directory);
          return this.prepareAndRun(rendition.label, 'audio', dir, plan, () =>
            createAudioRenditionCommand(context, rendition.track, plan.encoders.audio.codec, dir).build()
          );
        },
        plan.onJobComplete
      );

      const subtitles = config.convertSubtitles
        ? await this.subtitleConverter.convertAll(plan.inputFile, outputDir, plan.subtitleTracks, config)
        : [];

      return { video, audio, audioRenditions, subtitles };
    } finally {
      this.executor.off('progress', forwardProgress);
    }
  }

  private async prepareAndRun(
    name: string,
    kind: RenditionKind,
    dir: string,
    plan: PipelinePlan,
    buildArgs: () => string[]
  ): Promise<RenditionJobResult> {
    const startTime = Date.now();
    let args: string[];
    try {
      await ensureDir(dir);
      args = buildArgs();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error({ job: name, kind, err: error }, 'Could not prepare rendition job');
      return { status: 'error', name, kind, durationMs: Date.now() - startTime, error: message, exitCode: null };
    }

    return this.executor.runJob({
      name,
      kind,
      args,
      durationSeconds: plan.durationSeconds,
      timeoutMs: plan.config.encodeTimeoutMs,
    });
  }
}
