/**
 * Option value parsers
 */

import { InvalidArgumentError } from 'commander';
import { RESOLUTION_LABELS, ValidationError, isResolutionLabel } from '@hls-kit/core';

/**
 * Commander coercion for positive integer options
 */
export function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Not a whole number.');
  }
  const parsed = parseInt(value, 10);
  if (parsed < 1) {
    throw new InvalidArgumentError('Must be at least 1.');
  }
  return parsed;
}

/**
 * Commander coercion for integers that may be 0 (--crf)
 */
export function parseNonNegativeInt(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Not a whole number.');
  }
  return parseInt(value, 10);
}

/**
 * "720p, 1080p" -> ["720p", "1080p"]
 */
export function parseResolutions(value: string): string[] {
  const labels = value
    .split(',')
    .map(label => label.trim().toLowerCase())
    .filter(label => label.length > 0);

  const invalid = labels.filter(label => !isResolutionLabel(label));
  if (invalid.length > 0) {
    throw new ValidationError(
      'resolutions',
      `invalid resolution(s) ${invalid.join(', ')}; valid options: ${RESOLUTION_LABELS.join(', ')}`
    );
  }
  if (labels.length === 0) {
    throw new ValidationError('resolutions', 'no resolutions given');
  }
  return labels;
}
