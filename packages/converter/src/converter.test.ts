import { describe, it, expect, vi } from 'vitest';
import { mkdtemp, readFile, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { InputNotFoundError, ValidationError, defaultConfig, type HlsConfig } from '@hls-kit/core';
import { FFProbe, MediaAnalyzer } from '@hls-kit/media';
import {
  EncoderCatalog,
  assignAudioRenditions,
  type PipelinePlan,
  type PipelineResult,
  type RenditionJobResult,
} from '@hls-kit/processing';
import type { CommandResult, CommandRunner } from '@hls-kit/utils';
import { HlsConverter, type RenditionRunner } from './converter.js';

function result(exitCode: number, stdout = ''): CommandResult {
  return { exitCode, stdout, stderr: '', duration: 1, timedOut: false };
}

const streams = {
  streams: [
    { codec_type: 'video', codec_name: 'h264', width: 1920, height: 1080, avg_frame_rate: '24/1', duration: '10', bit_rate: '5000000' },
    { codec_type: 'audio', codec_name: 'aac', tags: { language: 'eng' } },
    { codec_type: 'audio', codec_name: 'ac3', tags: { language: 'eng' } },
  ],
};

function success(name: string, kind: 'video' | 'audio'): RenditionJobResult {
  return {
    status: 'success',
    name,
    kind,
    durationMs: 10,
    telemetry: {
      speed: '2x',
      speedMultiplier: 2,
      framesProcessed: 240,
      avgFps: 24,
      finalBitrate: '2500kbits/s',
      outputSize: '3MB',
      quality: '23.0',
      targetResolution: 'Unknown',
    },
  };
}

function failure(name: string, kind: 'video' | 'audio'): RenditionJobResult {
  return { status: 'error', name, kind, durationMs: 10, error: 'Conversion failed!', exitCode: 1 };
}

async function setup(options: { probe?: object; failing?: string[] } = {}) {
  const dir = await mkdtemp(join(tmpdir(), 'hls-kit-converter-'));
  const inputFile = join(dir, 'movie.mkv');
  await writeFile(inputFile, 'not really a movie');
  const outputDir = join(dir, 'movie');

  const encoderRunner = vi.fn<CommandRunner>(async (_command, args) =>
    result(args.includes('libx264') || args.includes('aac') ? 0 : 1)
  );
  const probeRunner = vi.fn<CommandRunner>(async (_command, args) =>
    result(0, JSON.stringify(args.includes('-show_format') ? { format: { duration: '10' } } : options.probe ?? streams))
  );

  const failing = new Set(options.failing ?? []);
  const run = vi.fn(async (plan: PipelinePlan): Promise<PipelineResult> => {
    const audioRenditions = assignAudioRenditions(plan.audioTracks);
    const outcome = (name: string, kind: 'video' | 'audio') =>
      failing.has(name) ? failure(name, kind) : success(name, kind);
    return {
      video: plan.profiles.map(p => outcome(p.name, 'video')),
      audio: audioRenditions.map(r => outcome(r.label, 'audio')),
      audioRenditions,
      subtitles: [],
    };
  });
  const pipeline: RenditionRunner = { run, cancel: vi.fn(async () => 2) };

  const converter = new HlsConverter({
    catalog: new EncoderCatalog({ runCommand: encoderRunner }),
    analyzer: new MediaAnalyzer({ ffprobe: new FFProbe({ runCommand: probeRunner }) }),
    pipeline,
  });

  return { converter, inputFile, outputDir, run, pipeline, encoderRunner };
}

const config = (overrides: Partial<HlsConfig> = {}): HlsConfig => ({ ...defaultConfig(), maxWorkers: 3, ...overrides });

describe('HlsConverter', () => {
  it('converts with requested resolutions and reports a partial outcome', async () => {
    const { converter, inputFile, outputDir, run } = await setup({ failing: ['720p'] });

    const report = await converter.convert(inputFile, outputDir, {
      config: config(),
      resolutions: ['1080p', '720p'],
    });

    const plan = run.mock.calls[0]?.[0];
    expect(plan?.profiles.map(p => [p.name, p.maxBitrateKbps])).toEqual([['720p', 2500], ['1080p', 5000]]);
    expect(plan?.workers).toBe(3);
    expect(plan?.durationSeconds).toBe(10);
    expect(plan?.encoders.video.codec).toBe('libx264');

    expect(report).toMatchObject({
      success: true,
      outcome: 'partial',
      createdResolutions: ['1080p'],
      failedRenditions: ['video:720p'],
      audioTrackCount: 2,
      subtitleTrackCount: 0,
      inputSizeBytes: 18,
      masterPlaylist: join(outputDir, 'master.m3u8'),
    });
    expect(report.encoders.audio).toEqual({ codec: 'aac', name: 'Generic AAC', fallback: false });
    expect(report.jobs).toHaveLength(4);

    expect(await readFile(report.masterPlaylist, 'utf8')).toBe([
      '#EXTM3U',
      '#EXT-X-MEDIA:TYPE=AUDIO,GROUP-ID="audio",NAME="eng",DEFAULT=YES,AUTOSELECT=YES,LANGUAGE="eng",URI="audio_eng/playlist.m3u8"',
      '#EXT-X-MEDIA:TYPE=AUDIO,GROUP-ID="audio",NAME="eng_1",DEFAULT=NO,AUTOSELECT=YES,LANGUAGE="eng",URI="audio_eng_1/playlist.m3u8"',
      '#EXT-X-STREAM-INF:BANDWIDTH=5000000,RESOLUTION=1920x1080,CODECS="avc1.640029",AUDIO="audio"',
      '1080p/playlist.m3u8',
    ].join('\n'));
  });

  it('uses the adaptive ladder when no resolutions are requested', async () => {
    const { converter, inputFile, outputDir } = await setup();

    const report = await converter.convert(inputFile, outputDir, { config: config() });

    expect(report.outcome).toBe('complete');
    expect(report.createdResolutions).toEqual(['144p', '240p', '360p', '480p', '720p', '1080p']);
  });

  it('prefers configured bitrate profiles over the adaptive ladder', async () => {
    const { converter, inputFile, outputDir, run } = await setup();
    const custom = { name: 'custom', width: 1000, height: 500, maxBitrateKbps: 1500, minBitrateKbps: 1000, audioBitrateKbps: 128 };

    await converter.convert(inputFile, outputDir, { config: config({ bitrateProfiles: [custom] }), resolutions: ['720p'] });

    expect(run.mock.calls[0]?.[0].profiles).toEqual([custom]);
  });

  it('plans no video renditions for audio-only input', async () => {
    const { converter, inputFile, outputDir } = await setup({
      probe: { streams: [{ codec_type: 'audio', codec_name: 'mp3', tags: { language: 'fre' } }] },
    });

    const report = await converter.convert(inputFile, outputDir, { config: config() });

    expect(report.createdResolutions).toEqual([]);
    expect(await readFile(report.masterPlaylist, 'utf8')).toBe(
      '#EXTM3U\n#EXT-X-MEDIA:TYPE=AUDIO,GROUP-ID="audio",NAME="fre",DEFAULT=YES,AUTOSELECT=YES,LANGUAGE="fre",URI="audio_fre/playlist.m3u8"'
    );
  });

  it('reports failure when every rendition fails', async () => {
    const { converter, inputFile, outputDir } = await setup({ failing: ['720p', 'eng', 'eng_1'] });

    const report = await converter.convert(inputFile, outputDir, { config: config(), resolutions: ['720p'] });

    expect(report.success).toBe(false);
    expect(report.outcome).toBe('partial');
  });

  it('rejects a missing input before detecting encoders', async () => {
    const { converter, outputDir, encoderRunner } = await setup();

    await expect(
      converter.convert('/no/such/movie.mkv', outputDir, { config: config() })
    ).rejects.toBeInstanceOf(InputNotFoundError);
    expect(encoderRunner).not.toHaveBeenCalled();
  });

  it('rejects unknown resolution labels', async () => {
    const { converter, inputFile, outputDir, run } = await setup();

    await expect(
      converter.convert(inputFile, outputDir, { config: config(), resolutions: ['999p'] })
    ).rejects.toBeInstanceOf(ValidationError);
    expect(run).not.toHaveBeenCalled();
  });

  it('forwards cancellation to the pipeline', async () => {
    const { converter, pipeline } = await setup();

    await expect(converter.cancel()).resolves.toBe(2);
    expect(pipeline.cancel).toHaveBeenCalledTimes(1);
  });
});
