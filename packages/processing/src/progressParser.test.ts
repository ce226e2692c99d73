import { describe, it, expect, vi } from 'vitest';
import { FFmpegProgressParser, estimateRemainingMs, formatProgress, parseFFmpegTime, type ProgressEvent } from './progressParser.js';

describe('FFmpegProgressParser', () => {
  it('accumulates key=value telemetry across lines', () => {
    const parser = new FFmpegProgressParser(10);

    expect(parser.parseLine('frame=120 fps=24.5 stream_0_0_q=28.0')).toBe(true);
    expect(parser.parseLine('bitrate=2400.1kbits/s total_size=1048576')).toBe(true);
    expect(parser.parseLine('out_time=00:00:05.000000 speed=2.01x q=27.0')).toBe(true);

    expect(parser.state).toEqual({
      speed: '2.01x',
      outTime: '00:00:05.000000',
      progressSeconds: 5,
      frame: 120,
      fps: 24.5,
      bitrate: '2400.1kbits/s',
      totalSize: '1048576',
      q: '27.0',
    });
    expect(parser.percent()).toBe(50);
    expect(parser.speedMultiplier()).toBe(2.01);
  });

  it('classifies free text as diagnostic output', () => {
    const parser = new FFmpegProgressParser(0);

    expect(parser.parseLine('Error while opening encoder for output stream #0:0')).toBe(false);
    expect(parser.parseLine('   ')).toBe(false);
    expect(parser.state.frame).toBe(0);
  });

  it('keeps previous values when a field does not parse', () => {
    const parser = new FFmpegProgressParser(0);
    parser.parseLine('frame=10 fps=30');
    parser.parseLine('frame=N/A fps=N/A out_time=N/A speed=N/A');

    expect(parser.state.frame).toBe(10);
    expect(parser.state.fps).toBe(30);
    expect(parser.state.progressSeconds).toBe(0);
    expect(parser.speedMultiplier()).toBe(0);
    expect(parser.percent()).toBeNull();
  });

  it('emits a progress event at the end of each block', () => {
    const parser = new FFmpegProgressParser(20);
    const listener = vi.fn<(event: ProgressEvent) => void>();
    parser.on('progress', listener);

    parser.parseLine('out_time=00:00:05.000000');
    parser.parseLine('progress=continue');
    parser.parseLine('out_time=00:00:20.000000');
    parser.parseLine('progress=end');

    expect(listener).toHaveBeenCalledTimes(2);
    expect(listener.mock.calls[0]?.[0]).toMatchObject({ percent: 25, phase: 'running' });
    expect(listener.mock.calls[1]?.[0]).toMatchObject({ percent: 100, phase: 'complete' });
  });
});

describe('parseFFmpegTime', () => {
  it('parses HH:MM:SS.micro', () => {
    expect(parseFFmpegTime('01:02:03.500000')).toBe(3723.5);
    expect(parseFFmpegTime('N/A')).toBeNull();
    expect(parseFFmpegTime('aa:00:00')).toBeNull();
  });
});

describe('estimateRemainingMs', () => {
  it('extrapolates from the elapsed share', () => {
    expect(estimateRemainingMs(10000, 25)).toBe(30000);
    expect(estimateRemainingMs(10000, null)).toBeNull();
    expect(estimateRemainingMs(10000, 100)).toBeNull();
  });
});

describe('formatProgress', () => {
  it('renders the known fields', () => {
    expect(formatProgress({
      name: '720p',
      kind: 'video',
      outTime: '00:00:05.000000',
      percent: 50,
      fps: 24.5,
      speed: '2.01x',
      bitrate: '2400.1kbits/s',
      frames: 120,
      totalSize: '1048576',
      elapsedMs: 2000,
      etaMs: 2000,
    })).toBe('video 720p: 00:00:05.000000 (50.0%) 24.5fps 2400.1kbits/s 2.01x 120 frames ETA 2s');
  });
});
