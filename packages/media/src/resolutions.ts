/**
 * Resolution ladder recommendation from the source height.
 */

import {
  RESOLUTION_LABELS,
  fitsWithinUpscaleTolerance,
  labelHeight,
  type ResolutionLabel,
} from '@hls-kit/core';
import type { VideoStreamInfo } from './types.js';

/**
 * Every standard label whose height fits the source (10% upscaling allowed),
 * ascending. Adaptive streaming needs at least two, so small or missing sources
 * get a fixed pair.
 */
export function getOptimalResolutions(video: Pick<VideoStreamInfo, 'height'> | undefined): ResolutionLabel[] {
  if (!video) {
    return ['480p', '720p'];
  }

  const inputHeight = video.height;
  const suitable = RESOLUTION_LABELS.filter(label =>
    fitsWithinUpscaleTolerance(labelHeight(label), inputHeight)
  );

  if (suitable.length < 2) {
    return inputHeight >= 720 ? ['480p', '720p'] : ['360p', '480p'];
  }

  return suitable;
}
