import { describe, it, expect, vi } from 'vitest';
import type { CommandResult, CommandRunner } from '@hls-kit/utils';
import { SubtitleConverter, normalizeLanguage } from './subtitles.js';

function result(exitCode: number, stderr = '', timedOut = false): CommandResult {
  return { exitCode, stdout: '', stderr, duration: 5, timedOut };
}

const config = { skipBitmapSubtitles: true, subtitleTimeoutMs: 60000 };

describe('normalizeLanguage', () => {
  it('maps common codes to names', () => {
    expect(normalizeLanguage('eng')).toBe('english');
    expect(normalizeLanguage(' FR ')).toBe('french');
    expect(normalizeLanguage('jpn')).toBe('japanese');
  });

  it('replaces unsafe characters and defaults empty tags', () => {
    expect(normalizeLanguage('pt-BR')).toBe('pt-br');
    expect(normalizeLanguage('en/us')).toBe('en_us');
    expect(normalizeLanguage('und_2')).toBe('und_2');
    expect(normalizeLanguage('   ')).toBe('english');
    expect(normalizeLanguage('constructor')).toBe('constructor');
  });
});

describe('SubtitleConverter', () => {
  it('skips bitmap tracks without running anything', async () => {
    const runCommand = vi.fn<CommandRunner>(async () => result(0));
    const converter = new SubtitleConverter({ runCommand });

    const results = await converter.convertAll('/in.mkv', '/out', [
      { index: 0, language: 'eng', codec: 'hdmv_pgs_subtitle' },
    ], config);

    expect(runCommand).not.toHaveBeenCalled();
    expect(results).toEqual([
      { status: 'skipped', index: 0, language: 'eng', reason: 'bitmap subtitle (hdmv_pgs_subtitle)' },
    ]);
  });

  it('numbers duplicate languages', async () => {
    const runCommand = vi.fn<CommandRunner>(async () => result(0));
    const converter = new SubtitleConverter({ runCommand, ffmpegPath: 'ffmpeg' });

    const results = await converter.convertAll('/in.mkv', '/out', [
      { index: 0, language: 'eng', codec: 'subrip' },
      { index: 1, language: 'eng', codec: 'ass' },
    ], config);

    expect(results.map(r => (r.status === 'success' ? r.outputFile : r.status))).toEqual([
      '/out/english.vtt',
      '/out/english_1.vtt',
    ]);
    expect(runCommand).toHaveBeenNthCalledWith(
      2,
      'ffmpeg',
      ['-y', '-i', '/in.mkv', '-map', '0:s:1', '-vn', '-an', '-c:s', 'webvtt', '/out/english_1.vtt'],
      { timeout: 60000 }
    );
  });

  it('only counts successful conversions toward the suffix', async () => {
    const runCommand = vi.fn<CommandRunner>()
      .mockResolvedValueOnce(result(1, 'Invalid data found when processing input'))
      .mockResolvedValueOnce(result(0, '', true))
      .mockResolvedValueOnce(result(0));
    const converter = new SubtitleConverter({ runCommand });

    const results = await converter.convertAll('/in.mkv', '/out', [
      { index: 0, language: 'spa', codec: 'subrip' },
      { index: 1, language: 'es', codec: 'subrip' },
      { index: 2, language: 'spa', codec: 'subrip' },
    ], config);

    expect(results[0]).toMatchObject({ status: 'error', error: 'Invalid data found when processing input' });
    expect(results[1]).toMatchObject({ status: 'error', error: 'Timed out after 60000ms' });
    expect(results[2]).toMatchObject({ status: 'success', outputFile: '/out/spanish.vtt' });
  });

  it('keeps going after a track that cannot be spawned', async () => {
    const runCommand = vi.fn<CommandRunner>()
      .mockRejectedValueOnce(new Error('spawn ffmpeg EACCES'))
      .mockResolvedValueOnce(result(0));
    const converter = new SubtitleConverter({ runCommand });

    const results = await converter.convertAll('/in.mkv', '/out', [
      { index: 0, language: 'ger', codec: 'subrip' },
      { index: 1, language: 'ita', codec: 'subrip' },
    ], config);

    expect(results.map(r => r.status)).toEqual(['error', 'success']);
  });

  it('converts bitmap tracks when skipping is disabled', async () => {
    const runCommand = vi.fn<CommandRunner>(async () => result(0));

    await new SubtitleConverter({ runCommand }).convertAll('/in.mkv', '/out', [
      { index: 0, language: 'eng', codec: 'dvd_subtitle' },
    ], { ...config, skipBitmapSubtitles: false });

    expect(runCommand).toHaveBeenCalledTimes(1);
  });
});
