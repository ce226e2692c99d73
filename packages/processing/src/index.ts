/**
 * @hls-kit/processing
 *
 * Encoding layer.
 *
 * Responsibilities:
 * - Detect usable hardware and software encoders
 * - Plan the bitrate ladder for a source
 * - Build and supervise one ffmpeg process per rendition
 * - Convert text subtitles to WebVTT
 * - Log every FFmpeg command executed
 */

// Command Builder
export {
  FFmpegCommandBuilder,
  createVideoRenditionCommand,
  createAudioRenditionCommand,
  createSubtitleCommand,
  encoderTuningArgs,
  audioBitrateKbps,
  PLAYLIST_FILENAME,
  SEGMENT_PATTERN,
  HLS_FLAGS,
  AUDIO_SAMPLE_RATE,
  MAX_AUDIO_BITRATE_KBPS,
  type InputOptions,
  type StreamMapping,
  type VideoCodecOptions,
  type AudioCodecOptions,
  type SubtitleOptions,
  type HlsOutputOptions,
  type RenditionCommandConfig,
  type RenditionCommandContext,
} from './commandBuilder.js';

// Progress Parser
export {
  FFmpegProgressParser,
  parseFFmpegTime,
  estimateRemainingMs,
  formatProgress,
  type TelemetryState,
  type ProgressEvent,
} from './progressParser.js';

// Encoders
export {
  EncoderCatalog,
  VIDEO_ENCODER_CANDIDATES,
  AUDIO_ENCODER_CANDIDATES,
  type EncoderCatalogOptions,
  type DetectOptions,
} from './encoderCatalog.js';

// Ladder
export {
  BASE_LADDER,
  createAdaptiveProfiles,
  selectProfiles,
  filterByLabels,
} from './ladder.js';

// Job Executor
export {
  JobExecutor,
  targetResolutionOf,
  type SupervisedProcess,
  type ProcessSpawner,
  type JobExecutorOptions,
} from './jobExecutor.js';

// Worker pool
export { runWithConcurrency, resolveWorkerCount, threadsPerJob } from './workerPool.js';

// Subtitles
export {
  SubtitleConverter,
  normalizeLanguage,
  type SubtitleConverterConfig,
  type SubtitleConverterOptions,
} from './subtitles.js';

// Pipeline
export {
  RenditionPipeline,
  assignAudioRenditions,
  type RenditionPipelineOptions,
} from './renditionPipeline.js';

// Types
export type {
  EncoderKind,
  EncoderAcceleration,
  EncoderCandidate,
  EncoderTestResult,
  EncoderChoice,
  EncoderGroups,
  EncoderSelection,
  RenditionKind,
  RenditionJobSpec,
  TelemetrySnapshot,
  SuccessfulJobResult,
  FailedJobResult,
  RenditionJobResult,
  JobProgress,
  SubtitleResult,
  AudioRendition,
  PipelinePlan,
  PipelineResult,
} from './types.js';
