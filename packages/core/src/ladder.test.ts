import { describe, it, expect } from 'vitest';
import { fitsWithinUpscaleTolerance, isResolutionLabel, labelHeight } from './ladder.js';
import { resolutionLabel, scaleFilter } from './types/rendition.js';

describe('fitsWithinUpscaleTolerance', () => {
  it('allows up to 10% above the reference', () => {
    expect(fitsWithinUpscaleTolerance(1100, 1000)).toBe(true);
    expect(fitsWithinUpscaleTolerance(1101, 1000)).toBe(false);
    expect(fitsWithinUpscaleTolerance(720, 1080)).toBe(true);
  });
});

describe('resolution labels', () => {
  it('recognises the eight ladder labels only', () => {
    expect(isResolutionLabel('1080p')).toBe(true);
    expect(isResolutionLabel('1080')).toBe(false);
    expect(isResolutionLabel('4k')).toBe(false);
  });

  it('extracts heights', () => {
    expect(labelHeight('2160p')).toBe(2160);
  });

  it('derives labels and scale filters from profiles', () => {
    expect(resolutionLabel({ height: 720 })).toBe('720p');
    expect(scaleFilter({ width: 1280, height: 720 })).toBe('1280:720');
  });
});
