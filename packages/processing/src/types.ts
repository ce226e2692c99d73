/**
 * Processing Types
 */

import type { HlsConfig, RenditionProfile } from '@hls-kit/core';
import type { AudioTrackInfo, SubtitleTrackInfo } from '@hls-kit/media';

// ============================================
// Encoders
// ============================================

export type EncoderKind = 'video' | 'audio';
export type EncoderAcceleration = 'hardware' | 'software';

export interface EncoderCandidate {
  readonly codec: string;
  readonly name: string;
  readonly kind: EncoderKind;
  readonly acceleration: EncoderAcceleration;
}

export interface EncoderTestResult extends EncoderCandidate {
  readonly available: boolean;
}

export interface EncoderChoice {
  readonly codec: string;
  readonly name: string;
  /** True when nothing passed detection and the choice is an unverified default */
  readonly fallback: boolean;
}

export interface EncoderGroups {
  readonly hardware: readonly EncoderCandidate[];
  readonly software: readonly EncoderCandidate[];
}

export interface EncoderSelection {
  readonly video: EncoderChoice;
  readonly audio: EncoderChoice;
  /** Candidates that passed detection */
  readonly available: {
    readonly video: EncoderGroups;
    readonly audio: EncoderGroups;
  };
  /** Every candidate tried, in test order */
  readonly tested: readonly EncoderTestResult[];
}

// ============================================
// Jobs
// ============================================

export type RenditionKind = 'video' | 'audio';

export interface RenditionJobSpec {
  name: string;
  kind: RenditionKind;
  /** ffmpeg arguments, without the binary */
  args: string[];
  /** Media duration in seconds, 0 when unknown */
  durationSeconds: number;
  timeoutMs?: number;
}

export interface TelemetrySnapshot {
  speed: string;
  speedMultiplier: number;
  framesProcessed: number;
  avgFps: number;
  finalBitrate: string;
  outputSize: string;
  quality: string;
  targetResolution: string;
}

interface JobResultBase {
  name: string;
  kind: RenditionKind;
  durationMs: number;
}

export interface SuccessfulJobResult extends JobResultBase {
  status: 'success';
  telemetry: TelemetrySnapshot;
}

export interface FailedJobResult extends JobResultBase {
  status: 'error';
  error: string;
  exitCode: number | null;
  targetResolution?: string;
}

export type RenditionJobResult = SuccessfulJobResult | FailedJobResult;

export interface JobProgress {
  name: string;
  kind: RenditionKind;
  /** Current output position, "HH:MM:SS.micro" as ffmpeg prints it */
  outTime: string;
  /** 0-100, null when the duration is unknown */
  percent: number | null;
  fps: number;
  speed: string;
  bitrate: string;
  frames: number;
  totalSize: string;
  elapsedMs: number;
  etaMs: number | null;
}

// ============================================
// Subtitles
// ============================================

export type SubtitleResult =
  | { status: 'success'; index: number; language: string; outputFile: string; durationMs: number }
  | { status: 'skipped'; index: number; language: string; reason: string }
  | { status: 'error'; index: number; language: string; error: string; durationMs: number };

// ============================================
// Pipeline
// ============================================

export interface AudioRendition {
  track: AudioTrackInfo;
  /** Unique label used as the playlist NAME ("eng", "eng_1") */
  label: string;
  /** Output directory relative to the package root ("audio_eng") */
  directory: string;
}

export interface PipelinePlan {
  inputFile: string;
  outputDir: string;
  profiles: readonly RenditionProfile[];
  audioTracks: readonly AudioTrackInfo[];
  subtitleTracks: readonly SubtitleTrackInfo[];
  encoders: EncoderSelection;
  config: HlsConfig;
  durationSeconds: number;
  workers: number;
  onProgress?: (progress: JobProgress) => void;
  onJobComplete?: (result: RenditionJobResult) => void;
}

export interface PipelineResult {
  video: RenditionJobResult[];
  audio: RenditionJobResult[];
  audioRenditions: AudioRendition[];
  subtitles: SubtitleResult[];
}
