/**
 * @hls-kit/core
 * 
 * Core package containing:
 * - Error taxonomy
 * - External binary resolution
 * - HLS configuration schema and persistence
 * - Ladder primitives and rendition types
 */

// Errors
export {
  HlsKitError,
  ValidationError,
  InputNotFoundError,
  ProbeError,
  EncoderUnavailableError,
  JobError,
  ManifestWriteError,
  ConfigFileError,
} from './errors/index.js';

// Binaries
export {
  getBinariesConfig,
  binaries,
  getBinaryPath,
  isBinaryAvailable,
  type BinaryConfig,
  type BinariesConfig,
} from './config/binaries.js';

// Configuration
export {
  X264_PRESETS,
  renditionProfileSchema,
  hlsConfigSchema,
  defaultConfig,
  parseConfig,
  serializeConfig,
  loadConfigFile,
  saveConfigFile,
  type EncoderPreset,
  type HlsConfig,
  type HlsConfigInput,
} from './config/hlsConfig.js';

// Ladder
export {
  UPSCALE_TOLERANCE,
  RESOLUTION_LABELS,
  fitsWithinUpscaleTolerance,
  isResolutionLabel,
  labelHeight,
  type ResolutionLabel,
} from './ladder.js';

// Types
export {
  DEFAULT_AUDIO_BITRATE_KBPS,
  resolutionLabel,
  scaleFilter,
  pixelCount,
  type RenditionProfile,
} from './types/rendition.js';
