import { describe, it, expect, vi } from 'vitest';
import { mkdtemp, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { defaultConfig } from '@hls-kit/core';
import type { CommandRunner } from '@hls-kit/utils';
import { fakeSpawner } from './__testing__/fakeProcess.js';
import { JobExecutor } from './jobExecutor.js';
import { BASE_LADDER } from './ladder.js';
import { RenditionPipeline, assignAudioRenditions } from './renditionPipeline.js';
import { SubtitleConverter } from './subtitles.js';
import type { EncoderSelection, JobProgress, PipelinePlan, RenditionJobResult } from './types.js';

const encoders: EncoderSelection = {
  video: { codec: 'libx264', name: 'x264 Software', fallback: false },
  audio: { codec: 'aac', name: 'Generic AAC', fallback: false },
  available: {
    video: { hardware: [], software: [{ codec: 'libx264', name: 'x264 Software', kind: 'video', acceleration: 'software' }] },
    audio: { hardware: [], software: [{ codec: 'aac', name: 'Generic AAC', kind: 'audio', acceleration: 'software' }] },
  },
  tested: [],
};

const profiles = BASE_LADDER.filter(p => ['360p', '480p', '720p'].includes(p.name)).map(p => ({ ...p }));

async function setup(behave: Parameters<typeof fakeSpawner>[0]) {
  const outputDir = await mkdtemp(join(tmpdir(), 'hls-kit-pipeline-'));
  const { spawnProcess, children } = fakeSpawner(behave);
  const runCommand = vi.fn<CommandRunner>(async () => ({ exitCode: 0, stdout: '', stderr: '', duration: 1, timedOut: false }));
  const pipeline = new RenditionPipeline({
    executor: new JobExecutor({ spawnProcess }),
    subtitleConverter: new SubtitleConverter({ runCommand }),
  });

  const plan = (overrides: Partial<PipelinePlan> = {}): PipelinePlan => ({
    inputFile: '/in/movie.mkv',
    outputDir,
    profiles,
    audioTracks: [],
    subtitleTracks: [],
    encoders,
    config: defaultConfig(),
    durationSeconds: 10,
    workers: 2,
    ...overrides,
  });

  return { outputDir, pipeline, plan, spawnProcess, children, runCommand };
}

describe('RenditionPipeline', () => {
  it('isolates a failing rendition from the others', async () => {
    const { pipeline, plan } = await setup((args, child) => {
      if (args.includes('scale=1280:720')) {
        child.finish(1, ['Error initializing output stream']);
      } else {
        child.finish(0, ['frame=10', 'progress=end']);
      }
    });

    const result = await pipeline.run(plan());

    expect(result.video).toHaveLength(3);
    const failed = result.video.filter(r => r.status === 'error');
    expect(failed).toHaveLength(1);
    expect(failed[0]).toMatchObject({ name: '720p', error: 'Error initializing output stream' });
  });

  it('creates one directory per rendition and writes playlists inside it', async () => {
    const { pipeline, plan, outputDir, spawnProcess } = await setup((_args, child) => child.finish(0));

    await pipeline.run(plan({ audioTracks: [{ index: 0, language: 'eng' }] }));

    expect((await stat(join(outputDir, '480p'))).isDirectory()).toBe(true);
    expect((await stat(join(outputDir, 'audio_eng'))).isDirectory()).toBe(true);
    const outputs = spawnProcess.mock.calls.map(call => call[1].at(-1));
    expect(outputs).toContain(join(outputDir, '480p', 'playlist.m3u8'));
    expect(outputs).toContain(join(outputDir, 'audio_eng', 'playlist.m3u8'));
  });

  it('finishes every video job before the first audio job starts', async () => {
    const order: string[] = [];
    const { pipeline, plan } = await setup((args, child) => {
      const kind = args.includes('-vf') ? 'video' : 'audio';
      order.push(`start:${kind}`);
      setTimeout(() => {
        order.push(`end:${kind}`);
        child.finish(0);
      }, 20);
    });

    await pipeline.run(plan({ audioTracks: [{ index: 0, language: 'eng' }, { index: 1, language: 'fre' }] }));

    const firstAudio = order.indexOf('start:audio');
    expect(order.lastIndexOf('end:video')).toBeLessThan(firstAudio);
    expect(order.filter(e => e === 'start:audio')).toHaveLength(2);
  });

  it('keeps at most `workers` encodes running', async () => {
    let running = 0;
    let peak = 0;
    const { pipeline, plan } = await setup((_args, child) => {
      running++;
      peak = Math.max(peak, running);
      setTimeout(() => {
        running--;
        child.finish(0);
      }, 20);
    });

    await pipeline.run(plan({ workers: 2 }));

    expect(peak).toBe(2);
  });

  it('forwards progress and completion callbacks', async () => {
    const { pipeline, plan } = await setup((_args, child) =>
      child.finish(0, ['out_time=00:00:02.500000', 'progress=continue'])
    );
    const onProgress = vi.fn<(progress: JobProgress) => void>();
    const onJobComplete = vi.fn<(result: RenditionJobResult) => void>();

    await pipeline.run(plan({ profiles: profiles.slice(0, 1), onProgress, onJobComplete }));

    expect(onProgress).toHaveBeenCalledWith(expect.objectContaining({ name: '360p', percent: 25 }));
    expect(onJobComplete).toHaveBeenCalledWith(expect.objectContaining({ name: '360p', status: 'success' }));
  });

  it('runs the subtitle pass only when enabled', async () => {
    const { pipeline, plan, runCommand } = await setup((_args, child) => child.finish(0));
    const subtitleTracks = [
      { index: 0, language: 'eng', codec: 'subrip' },
      { index: 1, language: 'eng', codec: 'hdmv_pgs_subtitle' },
    ];

    const converted = await pipeline.run(plan({ profiles: [], subtitleTracks }));
    expect(converted.subtitles.map(s => s.status)).toEqual(['success', 'skipped']);
    expect(runCommand).toHaveBeenCalledTimes(1);

    const disabled = await pipeline.run(plan({ profiles: [], subtitleTracks, config: { ...defaultConfig(), convertSubtitles: false } }));
    expect(disabled.subtitles).toEqual([]);
    expect(runCommand).toHaveBeenCalledTimes(1);
  });

  it('passes the encode timeout to each job', async () => {
    const { pipeline, plan, children } = await setup(() => undefined);

    const result = await pipeline.run(plan({
      profiles: profiles.slice(0, 1),
      config: { ...defaultConfig(), encodeTimeoutMs: 20 },
    }));

    expect(children[0]?.kill).toHaveBeenCalledWith('SIGTERM');
    expect(result.video[0]).toMatchObject({ status: 'error', error: 'Timed out after 20ms' });
  });
});

describe('assignAudioRenditions', () => {
  it('gives duplicate languages distinct directories', () => {
    const renditions = assignAudioRenditions([
      { index: 0, language: 'eng' },
      { index: 1, language: 'eng' },
      { index: 2, language: 'eng_1' },
      { index: 3, language: 'fre' },
    ]);

    expect(renditions.map(r => r.directory)).toEqual(['audio_eng', 'audio_eng_1', 'audio_eng_1_1', 'audio_fre']);
    expect(renditions.map(r => r.label)).toEqual(['eng', 'eng_1', 'eng_1_1', 'fre']);
  });

  it('sanitizes unsafe language tags', () => {
    expect(assignAudioRenditions([{ index: 0, language: 'en/us' }])[0]?.directory).toBe('audio_en_us');
    expect(assignAudioRenditions([{ index: 4, language: '...' }])[0]?.directory).toBe('audio_und_4');
  });
});
