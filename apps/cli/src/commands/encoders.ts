/**
 * Encoders Command
 *
 * Test every candidate encoder and show what a conversion would pick.
 */

import ora from 'ora';
import chalk from 'chalk';
import { isBinaryAvailable } from '@hls-kit/core';
import { EncoderCatalog, type EncoderChoice } from '@hls-kit/processing';
import { env } from '../config/index.js';
import {
  errorMessage,
  printError,
  printHeader,
  printJson,
  printKeyValue,
  printTable,
  printWarning,
} from '../lib/output.js';

interface EncodersOptions {
  softwareOnly?: boolean;
  json?: boolean;
}

export async function encodersCommand(options: EncodersOptions): Promise<void> {
  const spinner = ora({ text: 'Testing encoders...', isSilent: options.json === true }).start();

  try {
    if (!(await isBinaryAvailable('ffmpeg'))) {
      spinner.stop();
      printWarning(`ffmpeg not found at "${env.ffmpegPath}"; every encoder will test as unavailable`);
      spinner.start();
    }

    const catalog = new EncoderCatalog({
      ffmpegPath: env.ffmpegPath,
      forceSoftware: options.softwareOnly === true,
    });
    const selection = await catalog.detect();
    spinner.stop();

    if (options.json) {
      printJson(selection);
      return;
    }

    printHeader('Encoders');
    printTable(selection.tested.map(t => ({
      Codec: t.codec,
      Name: t.name,
      Type: t.kind,
      Acceleration: t.acceleration,
      Available: t.available ? 'yes' : 'no',
    })));

    console.log(chalk.bold('Selected:'));
    printKeyValue('Video', choiceLabel(selection.video, catalog.isHardware(selection.video.codec)));
    printKeyValue('Audio', choiceLabel(selection.audio, catalog.isHardware(selection.audio.codec)));
  } catch (error) {
    spinner.fail('Encoder detection failed');
    printError(errorMessage(error));
    process.exit(1);
  }
}

function choiceLabel(choice: EncoderChoice, hardware: boolean): string {
  const kind = hardware ? chalk.green('hardware') : 'software';
  const fallback = choice.fallback ? chalk.yellow(' [unverified fallback]') : '';
  return `${choice.codec} (${choice.name}, ${kind})${fallback}`;
}
