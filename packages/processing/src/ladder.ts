/**
 * Bitrate Ladder
 *
 * Picks the renditions to produce for a source and scales their bitrates to
 * what the source can actually carry.
 */

import {
  DEFAULT_AUDIO_BITRATE_KBPS,
  ValidationError,
  RESOLUTION_LABELS,
  fitsWithinUpscaleTolerance,
  isResolutionLabel,
  pixelCount,
  type RenditionProfile,
} from '@hls-kit/core';

function rung(name: string, width: number, height: number, max: number, min: number): RenditionProfile {
  return {
    name,
    width,
    height,
    maxBitrateKbps: max,
    minBitrateKbps: min,
    audioBitrateKbps: DEFAULT_AUDIO_BITRATE_KBPS,
  };
}

/**
 * Standard ladder, ascending
 */
export const BASE_LADDER: readonly Readonly<RenditionProfile>[] = Object.freeze([
  rung('144p', 256, 144, 300, 200),
  rung('240p', 426, 240, 500, 350),
  rung('360p', 640, 360, 800, 600),
  rung('480p', 854, 480, 1200, 900),
  rung('720p', 1280, 720, 2500, 1800),
  rung('1080p', 1920, 1080, 5000, 3500),
  rung('1440p', 2560, 1440, 8000, 6000),
  rung('2160p', 3840, 2160, 16000, 12000),
]);

/**
 * Profiles synthesized for explicitly requested resolutions the adaptive
 * ladder left out. Never rescaled to the source bitrate.
 */
const FALLBACK_PROFILES: ReadonlyMap<string, Readonly<RenditionProfile>> = new Map(
  BASE_LADDER.map(profile => [profile.name, profile])
);

const BITRATE_HEADROOM = 1.2;
const MIN_BITRATE_RATIO = 0.7;

/**
 * Ladder for a source of the given size. With a known source bitrate (kbps)
 * each rung's bitrate is scaled by its share of the source pixels.
 * The minimum is 70% of the max after it is raised to the rung's base
 * minimum, not before, so it never drops to 0 for low-bitrate sources.
 */
export function createAdaptiveProfiles(
  inputWidth: number,
  inputHeight: number,
  inputBitrateKbps?: number
): RenditionProfile[] {
  const inputPixels = inputWidth * inputHeight;
  const profiles: RenditionProfile[] = [];

  for (const base of BASE_LADDER) {
    const rungPixels = pixelCount(base);
    if (!fitsWithinUpscaleTolerance(rungPixels, inputPixels)) continue;

    if (inputBitrateKbps) {
      const adjustedMax = Math.min(
        base.maxBitrateKbps,
        Math.floor(inputBitrateKbps * (rungPixels / inputPixels) * BITRATE_HEADROOM)
      );
      const maxBitrateKbps = Math.max(adjustedMax, base.minBitrateKbps);
      profiles.push({
        ...base,
        maxBitrateKbps,
        minBitrateKbps: Math.floor(maxBitrateKbps * MIN_BITRATE_RATIO),
      });
    } else {
      profiles.push({ ...base });
    }
  }

  if (profiles.length === 0) {
    const [lowest] = BASE_LADDER;
    if (lowest) profiles.push({ ...lowest });
  }

  return profiles;
}

/**
 * Restrict a ladder to explicitly requested labels. Labels the ladder does not
 * contain are filled from the standard table, so scaled and unscaled profiles
 * can sit side by side. Result is ascending by height.
 */
export function selectProfiles(
  adaptive: readonly RenditionProfile[],
  requested: readonly string[]
): RenditionProfile[] {
  const wanted = new Set<string>();
  for (const label of requested) {
    if (!isResolutionLabel(label)) {
      throw new ValidationError(
        'resolutions',
        `unknown resolution "${label}", expected one of ${RESOLUTION_LABELS.join(', ')}`
      );
    }
    wanted.add(label);
  }

  const selected = adaptive.filter(profile => wanted.has(profile.name));
  const present = new Set(selected.map(profile => profile.name));

  for (const label of wanted) {
    if (present.has(label)) continue;
    const fallback = FALLBACK_PROFILES.get(label);
    if (fallback) selected.push({ ...fallback });
  }

  return selected.sort((a, b) => a.height - b.height);
}

/**
 * Implicit selection: keep the ladder rungs whose labels fit the source, or
 * the whole ladder when none match.
 */
export function filterByLabels(
  adaptive: readonly RenditionProfile[],
  labels: readonly string[]
): RenditionProfile[] {
  const allowed = new Set(labels);
  const filtered = adaptive.filter(profile => allowed.has(profile.name));
  return filtered.length > 0 ? filtered : [...adaptive];
}

