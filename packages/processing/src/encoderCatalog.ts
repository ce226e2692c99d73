/**
 * Encoder Catalog
 *
 * Finds out which H.264 and AAC encoders the local ffmpeg build can actually
 * use by encoding a fraction of a second of synthetic input with each one.
 * Hardware encoders win over software ones. Results are cached per instance.
 */

import { EncoderUnavailableError } from '@hls-kit/core';
import { createLogger, executeCommand, type CommandRunner, type Logger } from '@hls-kit/utils';
import type {
  EncoderCandidate,
  EncoderChoice,
  EncoderGroups,
  EncoderKind,
  EncoderSelection,
  EncoderTestResult,
} from './types.js';

export const VIDEO_ENCODER_CANDIDATES: readonly EncoderCandidate[] = [
  { codec: 'h264_videotoolbox', name: 'VideoToolbox (macOS)', kind: 'video', acceleration: 'hardware' },
  { codec: 'h264_nvenc', name: 'NVIDIA NVENC', kind: 'video', acceleration: 'hardware' },
  { codec: 'h264_qsv', name: 'Intel QuickSync', kind: 'video', acceleration: 'hardware' },
  { codec: 'h264_vaapi', name: 'VAAPI (Linux)', kind: 'video', acceleration: 'hardware' },
  { codec: 'h264_amf', name: 'AMD AMF', kind: 'video', acceleration: 'hardware' },
  { codec: 'libx264', name: 'x264 Software', kind: 'video', acceleration: 'software' },
  { codec: 'h264', name: 'Generic H.264', kind: 'video', acceleration: 'software' },
];

export const AUDIO_ENCODER_CANDIDATES: readonly EncoderCandidate[] = [
  { codec: 'aac_at', name: 'AudioToolbox AAC (macOS)', kind: 'audio', acceleration: 'hardware' },
  { codec: 'aac', name: 'Generic AAC', kind: 'audio', acceleration: 'software' },
  { codec: 'libfdk_aac', name: 'Fraunhofer FDK AAC', kind: 'audio', acceleration: 'software' },
];

const FALLBACK_ENCODERS: Record<EncoderKind, { codec: string; name: string }> = {
  video: { codec: 'libx264', name: 'x264 Software' },
  audio: { codec: 'aac', name: 'Generic AAC' },
};

const TEST_SOURCES: Record<EncoderKind, string> = {
  video: 'testsrc=duration=0.1:size=320x240:rate=1',
  audio: 'sine=frequency=1000:duration=0.1',
};

const HARDWARE_CODECS: ReadonlySet<string> = new Set(
  [...VIDEO_ENCODER_CANDIDATES, ...AUDIO_ENCODER_CANDIDATES]
    .filter(c => c.acceleration === 'hardware')
    .map(c => c.codec)
);

export interface EncoderCatalogOptions {
  ffmpegPath?: string;
  runCommand?: CommandRunner;
  testTimeoutMs?: number;
  /** Skip hardware candidates entirely */
  forceSoftware?: boolean;
  logger?: Logger;
}

export interface DetectOptions {
  forceRefresh?: boolean;
}

export class EncoderCatalog {
  private readonly ffmpegPath: string;
  private readonly runCommand: CommandRunner;
  private readonly testTimeoutMs: number;
  private readonly forceSoftware: boolean;
  private readonly logger: Logger;
  private detection: Promise<EncoderSelection> | null = null;

  constructor(options: EncoderCatalogOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.runCommand = options.runCommand ?? executeCommand;
    this.testTimeoutMs = options.testTimeoutMs ?? 10000;
    this.forceSoftware = options.forceSoftware ?? false;
    this.logger = options.logger ?? createLogger({ component: 'encoder-catalog' });
  }

  /**
   * Detect available encoders. Concurrent and repeated calls share one run
   * unless forceRefresh is set.
   */
  detect(options: DetectOptions = {}): Promise<EncoderSelection> {
    if (this.detection && !options.forceRefresh) {
      return this.detection;
    }
    this.detection = this.runDetection();
    return this.detection;
  }

  /**
   * Discard cached results and probe again
   */
  refresh(): Promise<EncoderSelection> {
    return this.detect({ forceRefresh: true });
  }

  /**
   * Whether a codec is one of the known hardware encoders
   */
  isHardware(codec: string): boolean {
    return HARDWARE_CODECS.has(codec);
  }

  private async runDetection(): Promise<EncoderSelection> {
    this.logger.info({ forceSoftware: this.forceSoftware }, 'Detecting available encoders');

    const tested: EncoderTestResult[] = [];
    for (const candidate of [...VIDEO_ENCODER_CANDIDATES, ...AUDIO_ENCODER_CANDIDATES]) {
      if (this.forceSoftware && candidate.acceleration === 'hardware') continue;
      const available = await this.testEncoder(candidate);
      tested.push({ ...candidate, available });
    }

    const selection: EncoderSelection = Object.freeze({
      video: this.choose('video', tested),
      audio: this.choose('audio', tested),
      available: Object.freeze({
        video: groupAvailable('video', tested),
        audio: groupAvailable('audio', tested),
      }),
      tested: Object.freeze(tested),
    });

    this.logger.info({
      video: selection.video.codec,
      audio: selection.audio.codec,
      available: tested.filter(t => t.available).map(t => t.codec),
    }, 'Encoder detection complete');

    return selection;
  }

  private choose(kind: EncoderKind, tested: readonly EncoderTestResult[]): EncoderChoice {
    const groups = groupAvailable(kind, tested);
    const best = groups.hardware[0] ?? groups.software[0];
    if (best) {
      return { codec: best.codec, name: best.name, fallback: false };
    }

    const fallback = FALLBACK_ENCODERS[kind];
    const error = new EncoderUnavailableError(
      kind,
      tested.filter(t => t.kind === kind).map(t => t.codec),
      fallback.codec
    );
    this.logger.warn({ err: error }, error.message);
    return { ...fallback, fallback: true };
  }

  private async testEncoder(candidate: EncoderCandidate): Promise<boolean> {
    const streamFlag = candidate.kind === 'video' ? '-c:v' : '-c:a';
    const args = [
      '-hide_banner',
      '-f', 'lavfi',
      '-i', TEST_SOURCES[candidate.kind],
      streamFlag, candidate.codec,
      '-t', '0.1',
      '-f', 'null',
      '-',
    ];

    try {
      const result = await this.runCommand(this.ffmpegPath, args, { timeout: this.testTimeoutMs });
      const available = result.exitCode === 0 && !result.timedOut;
      this.logger.debug({ codec: candidate.codec, available }, 'Encoder tested');
      return available;
    } catch (error) {
      this.logger.debug({ codec: candidate.codec, err: error }, 'Encoder test could not run');
      return false;
    }
  }
}

function groupAvailable(kind: EncoderKind, tested: readonly EncoderTestResult[]): EncoderGroups {
  const available = tested.filter(t => t.kind === kind && t.available);
  return Object.freeze({
    hardware: available.filter(t => t.acceleration === 'hardware').map(toCandidate),
    software: available.filter(t => t.acceleration === 'software').map(toCandidate),
  });
}

function toCandidate({ codec, name, kind, acceleration }: EncoderTestResult): EncoderCandidate {
  return { codec, name, kind, acceleration };
}
