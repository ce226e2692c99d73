#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Command-line interface for hls-kit.
 */

// Loads .env before any package reads process.env
import './config/env.js';

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { X264_PRESETS } from '@hls-kit/core';

import { convertCommand } from './commands/convert.js';
import { analyzeCommand } from './commands/analyze.js';
import { encodersCommand } from './commands/encoders.js';
import { parseNonNegativeInt, parsePositiveInt } from './lib/parsers.js';

const program = new Command();

program
  .name('hls-kit')
  .description('Convert media files into adaptive HLS packages')
  .version('0.1.0');

program
  .command('convert <input>')
  .description('Encode an input file into HLS renditions and a master playlist')
  .option('-o, --output <dir>', 'Output directory (default: input path without extension)')
  .option('-r, --resolutions <list>', 'Comma-separated resolutions, e.g. "720p,1080p" (default: from input)')
  .addOption(new Option('-p, --preset <preset>', 'Encoding preset').choices(X264_PRESETS))
  .option('--crf <n>', 'Constant rate factor for software encoding (0-51)', parseNonNegativeInt)
  .option('-w, --workers <n>', 'Parallel encodes (default: auto)', parsePositiveInt)
  .option('--segment-duration <seconds>', 'HLS segment duration', parsePositiveInt)
  .option('--gop-size <frames>', 'GOP size', parsePositiveInt)
  .option('--no-subtitles', 'Skip subtitle conversion')
  .option('--include-bitmap-subtitles', 'Try to convert bitmap subtitles instead of skipping them')
  .option('-c, --config <file>', 'JSON configuration file')
  .option('--save-config <file>', 'Write the merged configuration to a file and exit')
  .option('--software-only', 'Never use hardware encoders')
  .option('--no-hwaccel', 'Do not pass -hwaccel auto to ffmpeg')
  .option('--threads <n>', 'ffmpeg threads per encode', parsePositiveInt)
  .option('--encode-timeout <seconds>', 'Kill encodes running longer than this', parsePositiveInt)
  .option('--json', 'Print the report as JSON')
  .action(convertCommand);

program
  .command('analyze <input>')
  .description('Probe a media file and show the recommended ladder')
  .option('--json', 'Output in JSON format')
  .action(analyzeCommand);

program
  .command('encoders')
  .description('List available video and audio encoders')
  .option('--software-only', 'Skip hardware candidates')
  .option('--json', 'Output in JSON format')
  .action(encodersCommand);

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('hls-kit --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

await program.parseAsync(process.argv);
