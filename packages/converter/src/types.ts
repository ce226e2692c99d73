import type { HlsConfig } from '@hls-kit/core';
import type {
  EncoderChoice,
  JobProgress,
  RenditionJobResult,
  SubtitleResult,
} from '@hls-kit/processing';

export interface ConversionOptions {
  config: HlsConfig;
  /** Explicit ladder labels ("720p"); adaptive selection when omitted */
  resolutions?: readonly string[];
  onProgress?: (progress: JobProgress) => void;
  onJobComplete?: (result: RenditionJobResult) => void;
}

export type ConversionOutcome = 'complete' | 'partial';

export interface StepTimings {
  encoderDetectionMs: number;
  mediaAnalysisMs: number;
  configurationMs: number;
  streamProcessingMs: number;
  playlistCreationMs: number;
}

export interface ConversionReport {
  /** False only when renditions were planned and every one failed */
  success: boolean;
  outcome: ConversionOutcome;
  inputFile: string;
  outputDir: string;
  masterPlaylist: string;
  createdResolutions: string[];
  failedRenditions: string[];
  audioTrackCount: number;
  subtitleTrackCount: number;
  encoders: { video: EncoderChoice; audio: EncoderChoice };
  jobs: RenditionJobResult[];
  subtitles: SubtitleResult[];
  stepTimings: StepTimings;
  totalDurationMs: number;
  inputSizeBytes?: number;
  /** MB/s of input over total wall time, null when the size is unknown */
  processingSpeedMBps: number | null;
}
