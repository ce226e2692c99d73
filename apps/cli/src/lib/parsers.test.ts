import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { ValidationError } from '@hls-kit/core';
import { parseNonNegativeInt, parsePositiveInt, parseResolutions } from './parsers.js';

describe('parseResolutions', () => {
  it('splits, trims and lower-cases labels', () => {
    expect(parseResolutions(' 720P, 1080p ,,')).toEqual(['720p', '1080p']);
  });

  it('names every invalid label', () => {
    expect(() => parseResolutions('720p,900p,4k')).toThrow(
      'Validation failed for resolutions: invalid resolution(s) 900p, 4k; valid options: 144p, 240p, 360p, 480p, 720p, 1080p, 1440p, 2160p'
    );
  });

  it('rejects an empty list', () => {
    expect(() => parseResolutions(' , ')).toThrow(ValidationError);
  });
});

describe('integer options', () => {
  it('parses positive integers', () => {
    expect(parsePositiveInt('4')).toBe(4);
    expect(() => parsePositiveInt('0')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('2.5')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('abc')).toThrow(InvalidArgumentError);
  });

  it('allows zero where it is meaningful', () => {
    expect(parseNonNegativeInt('0')).toBe(0);
    expect(() => parseNonNegativeInt('-1')).toThrow(InvalidArgumentError);
  });
});
