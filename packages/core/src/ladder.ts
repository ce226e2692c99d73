/**
 * Ladder primitives shared by the resolution picker and the bitrate planner.
 */

/**
 * How far above the source a rendition may go (10% upscaling)
 */
export const UPSCALE_TOLERANCE = 1.1;

/**
 * Single source of truth for "does this rung fit the input".
 * Works on heights or on pixel counts, as long as both sides use the same unit.
 */
export function fitsWithinUpscaleTolerance(candidate: number, reference: number): boolean {
  return candidate <= reference * UPSCALE_TOLERANCE;
}

export const RESOLUTION_LABELS = [
  '144p',
  '240p',
  '360p',
  '480p',
  '720p',
  '1080p',
  '1440p',
  '2160p',
] as const;

export type ResolutionLabel = (typeof RESOLUTION_LABELS)[number];

export function isResolutionLabel(value: string): value is ResolutionLabel {
  return RESOLUTION_LABELS.some(label => label === value);
}

/**
 * Height in pixels encoded in a label ("720p" -> 720)
 */
export function labelHeight(label: ResolutionLabel): number {
  return parseInt(label, 10);
}
