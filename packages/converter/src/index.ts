/**
 * @hls-kit/converter
 *
 * Turns one media file into an HLS package and reports what was produced.
 */

export {
  HlsConverter,
  type HlsConverterOptions,
  type EncoderDetector,
  type MediaProbe,
  type RenditionRunner,
} from './converter.js';

export type {
  ConversionOptions,
  ConversionOutcome,
  ConversionReport,
  StepTimings,
} from './types.js';
