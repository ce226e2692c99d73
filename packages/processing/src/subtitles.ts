/**
 * Subtitle Converter
 *
 * Extracts text subtitle tracks to WebVTT files next to the playlists, one
 * track at a time. Bitmap tracks can't be converted and are skipped.
 */

import { join } from 'node:path';
import type { HlsConfig } from '@hls-kit/core';
import { isBitmapSubtitle, type SubtitleTrackInfo } from '@hls-kit/media';
import { createLogger, executeCommand, type CommandRunner, type Logger } from '@hls-kit/utils';
import { createSubtitleCommand } from './commandBuilder.js';
import type { SubtitleResult } from './types.js';

const LANGUAGE_NAMES: Readonly<Record<string, string>> = {
  eng: 'english', en: 'english',
  spa: 'spanish', es: 'spanish',
  fre: 'french', fr: 'french',
  ger: 'german', de: 'german',
  ita: 'italian', it: 'italian',
  por: 'portuguese', pt: 'portuguese',
  rus: 'russian', ru: 'russian',
  chi: 'chinese', zh: 'chinese',
  jpn: 'japanese', ja: 'japanese',
  kor: 'korean', ko: 'korean',
  ara: 'arabic', ar: 'arabic',
  hin: 'hindi', hi: 'hindi',
};

/**
 * Language tag -> file-safe name ("eng" -> "english", "pt-BR" -> "pt-br")
 */
export function normalizeLanguage(language: string): string {
  const cleaned = language.toLowerCase().trim();
  const named = Object.hasOwn(LANGUAGE_NAMES, cleaned) ? LANGUAGE_NAMES[cleaned] ?? cleaned : cleaned;
  const sanitized = Array.from(named, ch => (/^[\p{L}\p{N}_-]$/u.test(ch) ? ch : '_')).join('');
  return sanitized || 'english';
}

export type SubtitleConverterConfig = Pick<HlsConfig, 'skipBitmapSubtitles' | 'subtitleTimeoutMs'>;

export interface SubtitleConverterOptions {
  ffmpegPath?: string;
  runCommand?: CommandRunner;
  logger?: Logger;
}

export class SubtitleConverter {
  private readonly ffmpegPath: string;
  private readonly runCommand: CommandRunner;
  private readonly logger: Logger;

  constructor(options: SubtitleConverterOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.runCommand = options.runCommand ?? executeCommand;
    this.logger = options.logger ?? createLogger({ component: 'subtitle-converter' });
  }

  /**
   * Convert every track in order. A failing track does not stop the rest.
   */
  async convertAll(
    inputFile: string,
    outputDir: string,
    tracks: readonly SubtitleTrackInfo[],
    config: SubtitleConverterConfig
  ): Promise<SubtitleResult[]> {
    if (tracks.length === 0) {
      this.logger.info('No subtitle tracks found');
      return [];
    }

    this.logger.info({ count: tracks.length }, 'Converting subtitle tracks to WebVTT');

    // Successful conversions per normalized name, for duplicate suffixes
    const converted = new Map<string, number>();
    const results: SubtitleResult[] = [];

    for (const track of tracks) {
      if (config.skipBitmapSubtitles && isBitmapSubtitle(track)) {
        this.logger.warn({ language: track.language, codec: track.codec }, 'Skipping bitmap subtitle');
        results.push({
          status: 'skipped',
          index: track.index,
          language: track.language,
          reason: `bitmap subtitle (${track.codec.toLowerCase()})`,
        });
        continue;
      }

      const name = normalizeLanguage(track.language);
      const count = converted.get(name) ?? 0;
      const outputFile = join(outputDir, `${name}${count > 0 ? `_${count}` : ''}.vtt`);

      const result = await this.convertTrack(inputFile, track, outputFile, config.subtitleTimeoutMs);
      if (result.status === 'success') {
        converted.set(name, count + 1);
      }
      results.push(result);
    }

    return results;
  }

  private async convertTrack(
    inputFile: string,
    track: SubtitleTrackInfo,
    outputFile: string,
    timeoutMs: number
  ): Promise<SubtitleResult> {
    const startTime = Date.now();
    const args = createSubtitleCommand(inputFile, track.index, outputFile).build();
    const failure = (error: string): SubtitleResult => {
      this.logger.error({ language: track.language, codec: track.codec, error: error.substring(0, 200) }, 'Subtitle conversion failed');
      return { status: 'error', index: track.index, language: track.language, error, durationMs: Date.now() - startTime };
    };

    try {
      const result = await this.runCommand(this.ffmpegPath, args, { timeout: timeoutMs });
      if (result.timedOut) {
        return failure(`Timed out after ${timeoutMs}ms`);
      }
      if (result.exitCode !== 0) {
        return failure(result.stderr.trim() || `Process exited with code ${result.exitCode}`);
      }
    } catch (error) {
      return failure(error instanceof Error ? error.message : String(error));
    }

    const durationMs = Date.now() - startTime;
    this.logger.info({ language: track.language, outputFile, durationMs }, 'Subtitle converted');
    return { status: 'success', index: track.index, language: track.language, outputFile, durationMs };
  }
}
