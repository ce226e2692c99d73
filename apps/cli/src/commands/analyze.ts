/**
 * Analyze Command
 *
 * Probe a media file and show the ladder a conversion would use.
 */

import ora from 'ora';
import chalk from 'chalk';
import { resolve } from 'node:path';
import { InputNotFoundError } from '@hls-kit/core';
import { FFProbe, MediaAnalyzer, aspectRatio, mediaDuration } from '@hls-kit/media';
import { createAdaptiveProfiles, filterByLabels } from '@hls-kit/processing';
import { formatBytes, formatClock, isFile } from '@hls-kit/utils';
import { env } from '../config/index.js';
import {
  errorMessage,
  printError,
  printHeader,
  printJson,
  printKeyValue,
  printTable,
} from '../lib/output.js';

interface AnalyzeOptions {
  json?: boolean;
}

export async function analyzeCommand(input: string, options: AnalyzeOptions): Promise<void> {
  const inputFile = resolve(input);
  const spinner = ora({ text: 'Analyzing media file...', isSilent: options.json === true }).start();

  try {
    if (!(await isFile(inputFile))) {
      throw new InputNotFoundError(inputFile);
    }

    const analyzer = new MediaAnalyzer({ ffprobe: new FFProbe({ ffprobePath: env.ffprobePath }) });
    const descriptor = await analyzer.analyze(inputFile);
    const recommended = analyzer.getOptimalResolutions(descriptor.video);
    const profiles = descriptor.video
      ? filterByLabels(
          createAdaptiveProfiles(descriptor.video.width, descriptor.video.height, descriptor.video.bitrate),
          recommended
        )
      : [];

    spinner.stop();

    if (options.json) {
      printJson({ descriptor, recommended, profiles });
      return;
    }

    printHeader('Media Analysis');
    printKeyValue('File', inputFile);
    if (descriptor.formatName) printKeyValue('Format', descriptor.formatName);
    printKeyValue('Duration', formatClock(mediaDuration(descriptor)));
    if (descriptor.fileSize !== undefined) printKeyValue('Size', formatBytes(descriptor.fileSize));
    console.log();

    const { video } = descriptor;
    if (video) {
      console.log(chalk.bold('Video:'));
      console.log(
        `  ${video.codec ?? 'unknown'} ${video.width}x${video.height} @ ${video.fps.toFixed(2)} fps` +
        ` (aspect ${aspectRatio(video).toFixed(2)})` +
        (video.bitrate ? ` ${video.bitrate} kbps` : '')
      );
      console.log();
    } else {
      console.log(chalk.yellow('No video stream'));
      console.log();
    }

    if (descriptor.audioTracks.length > 0) {
      console.log(chalk.bold(`Audio Tracks (${descriptor.audioTracks.length}):`));
      for (const a of descriptor.audioTracks) {
        console.log(
          `  ${chalk.cyan(`#${a.index}`)} ${a.codec ?? 'unknown'} [${a.language}]` +
          (a.channels ? ` ${a.channels}ch` : '') +
          (a.sampleRate ? ` @ ${a.sampleRate} Hz` : '') +
          (a.bitrate ? ` ${a.bitrate} kbps` : '')
        );
      }
      console.log();
    }

    if (descriptor.subtitleTracks.length > 0) {
      console.log(chalk.bold(`Subtitle Tracks (${descriptor.subtitleTracks.length}):`));
      for (const s of descriptor.subtitleTracks) {
        console.log(`  ${chalk.cyan(`#${s.index}`)} ${s.codec} [${s.language}]`);
      }
      console.log();
    }

    printKeyValue('Recommended', recommended.join(', '));
    console.log();
    printTable(profiles.map(p => ({
      Name: p.name,
      Size: `${p.width}x${p.height}`,
      'Max kbps': p.maxBitrateKbps,
      'Min kbps': p.minBitrateKbps,
      'Audio kbps': p.audioBitrateKbps,
    })));
  } catch (error) {
    spinner.fail('Analysis failed');
    printError(errorMessage(error));
    process.exit(1);
  }
}
