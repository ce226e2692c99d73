/**
 * Job Executor
 *
 * Supervises one ffmpeg process per rendition: spawns it, streams its stderr
 * through the progress parser, enforces the optional timeout and turns the
 * exit into a RenditionJobResult. Never throws; every failure becomes an
 * error result.
 */

import { spawn } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { JobError } from '@hls-kit/core';
import { createLogger, formatCommand, type Logger } from '@hls-kit/utils';
import {
  FFmpegProgressParser,
  estimateRemainingMs,
  type ProgressEvent,
} from './progressParser.js';
import type {
  FailedJobResult,
  JobProgress,
  RenditionJobResult,
  RenditionJobSpec,
} from './types.js';

/**
 * The part of a child process the executor relies on
 */
export interface SupervisedProcess extends EventEmitter {
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type ProcessSpawner = (command: string, args: string[]) => SupervisedProcess;

type ExitOutcome =
  | { kind: 'exit'; code: number | null; signal: NodeJS.Signals | null }
  | { kind: 'error'; error: Error };

const spawnFFmpeg: ProcessSpawner = (command, args) =>
  spawn(command, args, { stdio: ['ignore', 'ignore', 'pipe'] });

export interface JobExecutorOptions {
  ffmpegPath?: string;
  spawnProcess?: ProcessSpawner;
  /** Wait between SIGTERM and SIGKILL */
  killGraceMs?: number;
  progressLogIntervalMs?: number;
  /** Diagnostic stderr lines kept for the error message */
  maxErrorLines?: number;
  logger?: Logger;
}

export class JobExecutor extends EventEmitter {
  private readonly ffmpegPath: string;
  private readonly spawnProcess: ProcessSpawner;
  private readonly killGraceMs: number;
  private readonly progressLogIntervalMs: number;
  private readonly maxErrorLines: number;
  private readonly logger: Logger;

  private activeJobs: Map<string, {
    process: SupervisedProcess;
    exit: Promise<ExitOutcome>;
    cancelled: boolean;
  }> = new Map();

  constructor(options: JobExecutorOptions = {}) {
    super();
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.spawnProcess = options.spawnProcess ?? spawnFFmpeg;
    this.killGraceMs = options.killGraceMs ?? 5000;
    this.progressLogIntervalMs = options.progressLogIntervalMs ?? 3000;
    this.maxErrorLines = options.maxErrorLines ?? 20;
    this.logger = options.logger ?? createLogger({ component: 'job-executor' });
  }

  /**
   * Run one rendition job to completion
   */
  async runJob(spec: RenditionJobSpec): Promise<RenditionJobResult> {
    const startTime = Date.now();
    const jobId = `${spec.kind}:${spec.name}`;
    const targetResolution = targetResolutionOf(spec.args);
    const jobLogger = this.logger.child({ job: spec.name, kind: spec.kind });

    jobLogger.info({ target: targetResolution }, 'Starting rendition job');
    jobLogger.debug({ command: formatCommand(this.ffmpegPath, spec.args) }, 'FFmpeg command');

    let child: SupervisedProcess;
    try {
      child = this.spawnProcess(this.ffmpegPath, spec.args);
    } catch (error) {
      return this.fail(spec, startTime, targetResolution, new JobError(spec.name, errorMessage(error), null, error));
    }

    const exit = waitForExit(child);
    const job = { process: child, exit, cancelled: false };
    this.activeJobs.set(jobId, job);

    const parser = new FFmpegProgressParser(spec.durationSeconds);
    let lastLogTime = startTime;
    parser.on('progress', (event: ProgressEvent) => {
      const progress = this.toJobProgress(spec, event, startTime);
      this.emit('progress', progress);

      const now = Date.now();
      if (now - lastLogTime >= this.progressLogIntervalMs) {
        lastLogTime = now;
        jobLogger.debug(progress, 'Rendition progress');
      }
    });

    const diagnostics: string[] = [];
    let timedOut = false;
    let timeoutId: NodeJS.Timeout | null = null;
    if (spec.timeoutMs) {
      const timeoutMs = spec.timeoutMs;
      timeoutId = setTimeout(() => {
        timedOut = true;
        jobLogger.warn({ timeoutMs }, 'Rendition job timed out, terminating');
        this.terminate(child, exit).catch((error: unknown) => {
          jobLogger.error({ err: error }, 'Failed to terminate timed out job');
        });
      }, timeoutMs);
    }

    try {
      if (child.stderr) {
        const lines = createInterface({ input: child.stderr, crlfDelay: Infinity });
        for await (const line of lines) {
          if (parser.parseLine(line)) continue;
          const text = line.trim();
          if (text === '') continue;
          diagnostics.push(text);
          if (diagnostics.length > this.maxErrorLines) diagnostics.shift();
        }
      }

      const outcome = await exit;
      const durationMs = Date.now() - startTime;

      if (outcome.kind === 'error') {
        return this.fail(spec, startTime, targetResolution, new JobError(spec.name, outcome.error.message, null, outcome.error));
      }
      if (job.cancelled) {
        return this.fail(spec, startTime, targetResolution, new JobError(spec.name, 'Cancelled', outcome.code));
      }
      if (timedOut) {
        const detail = diagnostics.length > 0 ? `: ${diagnostics.join('\n')}` : '';
        return this.fail(spec, startTime, targetResolution, new JobError(spec.name, `Timed out after ${spec.timeoutMs}ms${detail}`, outcome.code));
      }
      if (outcome.code !== 0) {
        const message = diagnostics.length > 0
          ? diagnostics.join('\n')
          : outcome.code === null
            ? `Process terminated by ${outcome.signal ?? 'signal'}`
            : `Process exited with code ${outcome.code}`;
        return this.fail(spec, startTime, targetResolution, new JobError(spec.name, message, outcome.code));
      }

      const state = parser.state;
      const result: RenditionJobResult = {
        status: 'success',
        name: spec.name,
        kind: spec.kind,
        durationMs,
        telemetry: {
          speed: state.speed,
          speedMultiplier: parser.speedMultiplier(),
          framesProcessed: state.frame,
          avgFps: durationMs > 0 ? state.frame / (durationMs / 1000) : 0,
          finalBitrate: state.bitrate,
          outputSize: state.totalSize,
          quality: state.q,
          targetResolution,
        },
      };
      jobLogger.info({ durationMs, speed: state.speed, frames: state.frame }, 'Rendition job complete');
      return result;
    } catch (error) {
      await this.terminate(child, exit);
      return this.fail(spec, startTime, targetResolution, new JobError(spec.name, errorMessage(error), null, error));
    } finally {
      if (timeoutId) clearTimeout(timeoutId);
      this.activeJobs.delete(jobId);
    }
  }

  /**
   * Terminate every running job. Their results report "Cancelled".
   */
  async cancelAll(): Promise<number> {
    const jobs = Array.from(this.activeJobs.entries());
    await Promise.all(jobs.map(async ([jobId, job]) => {
      this.logger.info({ jobId }, 'Cancelling job');
      job.cancelled = true;
      await this.terminate(job.process, job.exit);
    }));
    return jobs.length;
  }

  /**
   * Get all active jobs
   */
  getActiveJobs(): string[] {
    return Array.from(this.activeJobs.keys());
  }

  /**
   * SIGTERM, wait for the grace period, then SIGKILL
   */
  private async terminate(child: SupervisedProcess, exit: Promise<ExitOutcome>): Promise<void> {
    if (child.exitCode !== null) return;

    child.kill('SIGTERM');

    let graceTimer: NodeJS.Timeout | undefined;
    const grace = new Promise<boolean>(resolve => {
      graceTimer = setTimeout(() => resolve(false), this.killGraceMs);
    });
    const exited = await Promise.race([exit.then(() => true), grace]);
    clearTimeout(graceTimer);

    if (!exited) {
      this.logger.warn('Process ignored SIGTERM, sending SIGKILL');
      child.kill('SIGKILL');
    }
  }

  private toJobProgress(spec: RenditionJobSpec, event: ProgressEvent, startTime: number): JobProgress {
    const elapsedMs = Date.now() - startTime;
    return {
      name: spec.name,
      kind: spec.kind,
      outTime: event.state.outTime,
      percent: event.percent,
      fps: event.state.fps,
      speed: event.state.speed,
      bitrate: event.state.bitrate,
      frames: event.state.frame,
      totalSize: event.state.totalSize,
      elapsedMs,
      etaMs: estimateRemainingMs(elapsedMs, event.percent),
    };
  }

  private fail(
    spec: RenditionJobSpec,
    startTime: number,
    targetResolution: string,
    error: JobError
  ): FailedJobResult {
    this.logger.error({ job: spec.name, kind: spec.kind, err: error }, 'Rendition job failed');
    return {
      status: 'error',
      name: spec.name,
      kind: spec.kind,
      durationMs: Date.now() - startTime,
      error: error.message,
      exitCode: error.exitCode,
      targetResolution,
    };
  }
}

function waitForExit(child: SupervisedProcess): Promise<ExitOutcome> {
  return new Promise(resolve => {
    child.once('error', (error: Error) => resolve({ kind: 'error', error }));
    child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
      resolve({ kind: 'exit', code, signal });
    });
  });
}

/**
 * "1280:720" from a `-vf scale=1280:720` argument, "Unknown" otherwise
 */
export function targetResolutionOf(args: readonly string[]): string {
  const filterIndex = args.indexOf('-vf');
  const filter = filterIndex >= 0 ? args[filterIndex + 1] : undefined;
  if (!filter?.includes('scale=')) return 'Unknown';
  return filter.split('scale=')[1]?.split(',')[0] ?? 'Unknown';
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
