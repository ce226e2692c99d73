/**
 * Progress Parser
 *
 * Parses the `key=value` telemetry ffmpeg writes with `-progress pipe:2`.
 * Telemetry shares stderr with diagnostic output, so each line is classified:
 * a line made only of key=value tokens is telemetry, anything else is
 * diagnostic text the caller keeps for error reporting.
 */

import { EventEmitter } from 'node:events';
import { formatDuration } from '@hls-kit/utils';
import type { JobProgress } from './types.js';

export interface TelemetryState {
  speed: string;         // "2.01x"
  outTime: string;       // "00:00:42.000000"
  progressSeconds: number;
  frame: number;
  fps: number;
  bitrate: string;       // "2400.1kbits/s"
  totalSize: string;
  q: string;
}

export interface ProgressEvent {
  state: TelemetryState;
  /** 0-100, null when the duration is unknown or nothing was encoded yet */
  percent: number | null;
  phase: 'running' | 'complete';
}

const TOKEN = /^(\w+)=(.*)$/;
const INTEGER = /^[+-]?\d+$/;

function initialState(): TelemetryState {
  return {
    speed: '0x',
    outTime: '00:00:00',
    progressSeconds: 0,
    frame: 0,
    fps: 0,
    bitrate: '0kbits/s',
    totalSize: '0kB',
    q: '0.0',
  };
}

export class FFmpegProgressParser extends EventEmitter {
  private readonly durationSeconds: number;
  private current: TelemetryState = initialState();

  constructor(durationSeconds: number) {
    super();
    this.durationSeconds = durationSeconds;
  }

  /**
   * Feed one stderr line. Returns true when the line was telemetry.
   */
  parseLine(rawLine: string): boolean {
    const line = rawLine.trim();
    if (line === '') return false;

    const tokens = line.split(/\s+/);
    const pairs: [string, string][] = [];
    for (const token of tokens) {
      const match = TOKEN.exec(token);
      if (!match) return false;
      pairs.push([match[1] ?? '', match[2] ?? '']);
    }

    for (const [key, value] of pairs) {
      this.apply(key, value);
    }
    return true;
  }

  get state(): TelemetryState {
    return { ...this.current };
  }

  percent(): number | null {
    if (this.durationSeconds <= 0 || this.current.progressSeconds <= 0) return null;
    return Math.min(100, (this.current.progressSeconds / this.durationSeconds) * 100);
  }

  /**
   * Numeric speed multiplier ("2.01x" -> 2.01), 0 when unparseable
   */
  speedMultiplier(): number {
    const { speed } = this.current;
    if (!speed.endsWith('x')) return 0;
    const value = Number(speed.slice(0, -1));
    return Number.isFinite(value) ? value : 0;
  }

  private apply(key: string, value: string): void {
    switch (key) {
      case 'speed':
        this.current.speed = value;
        break;
      case 'out_time': {
        this.current.outTime = value;
        const seconds = parseFFmpegTime(value);
        if (seconds !== null) this.current.progressSeconds = seconds;
        break;
      }
      case 'frame':
        if (INTEGER.test(value)) this.current.frame = parseInt(value, 10);
        break;
      case 'fps': {
        const fps = Number(value);
        if (value !== '' && Number.isFinite(fps)) this.current.fps = fps;
        break;
      }
      case 'bitrate':
        this.current.bitrate = value;
        break;
      case 'total_size':
        this.current.totalSize = value;
        break;
      case 'q':
        this.current.q = value;
        break;
      case 'progress': {
        const event: ProgressEvent = {
          state: this.state,
          percent: this.percent(),
          phase: value === 'end' ? 'complete' : 'running',
        };
        this.emit('progress', event);
        break;
      }
      default:
        break;
    }
  }
}

/**
 * Parse "HH:MM:SS(.fraction)" into seconds, null when malformed
 */
export function parseFFmpegTime(time: string): number | null {
  const parts = time.split(':');
  if (parts.length !== 3) return null;

  const values = parts.map(p => (p.trim() === '' ? NaN : Number(p)));
  if (values.some(v => !Number.isFinite(v))) return null;

  const [hours = 0, minutes = 0, seconds = 0] = values;
  return hours * 3600 + minutes * 60 + seconds;
}

/**
 * Remaining time extrapolated from elapsed time and completion percentage
 */
export function estimateRemainingMs(elapsedMs: number, percent: number | null): number | null {
  if (percent === null || percent <= 0 || percent >= 100) return null;
  return elapsedMs / (percent / 100) - elapsedMs;
}

/**
 * Format progress for display
 */
export function formatProgress(progress: JobProgress): string {
  const parts: string[] = [`${progress.kind} ${progress.name}: ${progress.outTime}`];

  if (progress.percent !== null) {
    parts.push(`(${progress.percent.toFixed(1)}%)`);
  }
  if (progress.fps > 0) {
    parts.push(`${progress.fps.toFixed(1)}fps`);
  }
  if (progress.bitrate !== '0kbits/s') {
    parts.push(progress.bitrate);
  }
  if (progress.speed !== '0x') {
    parts.push(progress.speed);
  }
  if (progress.frames > 0) {
    parts.push(`${progress.frames} frames`);
  }
  if (progress.etaMs !== null) {
    parts.push(`ETA ${formatDuration(progress.etaMs)}`);
  }

  return parts.join(' ');
}
