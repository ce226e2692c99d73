/**
 * Report rendering for `convert`
 */

import chalk from 'chalk';
import type { ConversionReport } from '@hls-kit/converter';
import type { RenditionJobResult, SubtitleResult } from '@hls-kit/processing';
import { formatBytes, formatDuration } from '@hls-kit/utils';
import { printHeader, printKeyValue, printTable } from './output.js';

export function jobRows(jobs: readonly RenditionJobResult[]): Record<string, string | number>[] {
  return jobs.map(job => {
    if (job.status === 'success') {
      return {
        Rendition: job.name,
        Kind: job.kind,
        Status: 'ok',
        Duration: formatDuration(job.durationMs),
        Speed: job.telemetry.speed,
        Frames: job.telemetry.framesProcessed,
        Detail: job.telemetry.targetResolution,
      };
    }
    return {
      Rendition: job.name,
      Kind: job.kind,
      Status: 'failed',
      Duration: formatDuration(job.durationMs),
      Speed: '-',
      Frames: '-',
      Detail: firstLine(job.error),
    };
  });
}

export function subtitleRows(subtitles: readonly SubtitleResult[]): Record<string, string>[] {
  return subtitles.map(subtitle => {
    switch (subtitle.status) {
      case 'success':
        return { Track: `#${subtitle.index}`, Language: subtitle.language, Status: 'ok', Detail: subtitle.outputFile };
      case 'skipped':
        return { Track: `#${subtitle.index}`, Language: subtitle.language, Status: 'skipped', Detail: subtitle.reason };
      case 'error':
        return { Track: `#${subtitle.index}`, Language: subtitle.language, Status: 'failed', Detail: firstLine(subtitle.error) };
    }
  });
}

/**
 * Step name -> formatted duration, in execution order
 */
export function stepLines(report: Pick<ConversionReport, 'stepTimings'>): Array<[string, string]> {
  const t = report.stepTimings;
  return [
    ['Encoder detection', formatDuration(t.encoderDetectionMs)],
    ['Media analysis', formatDuration(t.mediaAnalysisMs)],
    ['Configuration', formatDuration(t.configurationMs)],
    ['Stream processing', formatDuration(t.streamProcessingMs)],
    ['Playlist creation', formatDuration(t.playlistCreationMs)],
  ];
}

export function printReport(report: ConversionReport): void {
  printHeader('Conversion Summary');
  printKeyValue('Input', report.inputFile);
  printKeyValue('Output', report.outputDir);
  printKeyValue('Master playlist', report.masterPlaylist);
  printKeyValue('Resolutions', report.createdResolutions.join(', ') || 'none');
  printKeyValue('Audio tracks', report.audioTrackCount);
  printKeyValue('Subtitle tracks', report.subtitleTrackCount);
  printKeyValue('Video encoder', encoderLabel(report.encoders.video));
  printKeyValue('Audio encoder', encoderLabel(report.encoders.audio));
  if (report.inputSizeBytes !== undefined) {
    printKeyValue('Input size', formatBytes(report.inputSizeBytes));
  }
  printKeyValue('Total time', formatDuration(report.totalDurationMs));
  if (report.processingSpeedMBps !== null) {
    printKeyValue('Processing speed', `${report.processingSpeedMBps.toFixed(2)} MB/s`);
  }

  console.log();
  console.log(chalk.bold('Steps:'));
  for (const [step, duration] of stepLines(report)) {
    printKeyValue(step, duration);
  }

  console.log();
  console.log(chalk.bold('Jobs:'));
  printTable(jobRows(report.jobs));

  if (report.subtitles.length > 0) {
    console.log(chalk.bold('Subtitles:'));
    printTable(subtitleRows(report.subtitles));
  }
}

function encoderLabel(choice: { codec: string; name: string; fallback: boolean }): string {
  return `${choice.codec} (${choice.name})${choice.fallback ? ' [unverified fallback]' : ''}`;
}

function firstLine(text: string): string {
  return text.split('\n')[0] ?? text;
}
