/**
 * Convert Command
 *
 * Converts one input file into an HLS package.
 */

import ora from 'ora';
import chalk from 'chalk';
import { resolve } from 'node:path';
import { saveConfigFile, type HlsConfig } from '@hls-kit/core';
import { HlsConverter } from '@hls-kit/converter';
import { formatProgress } from '@hls-kit/processing';
import { stripExtension } from '@hls-kit/utils';
import { buildConfig, env, loadBaseConfig, type ConvertFlags } from '../config/index.js';
import { parseResolutions } from '../lib/parsers.js';
import {
  errorMessage,
  printError,
  printJson,
  printSuccess,
  printWarning,
} from '../lib/output.js';
import { printReport } from '../lib/summary.js';

/** Exit code after Ctrl+C */
const EXIT_INTERRUPTED = 130;

export async function convertCommand(input: string, options: ConvertFlags): Promise<void> {
  const inputFile = resolve(input);
  const outputDir = options.output ? resolve(options.output) : stripExtension(inputFile);

  let config: HlsConfig;
  let resolutions: string[] | undefined;
  try {
    resolutions = options.resolutions ? parseResolutions(options.resolutions) : undefined;
    config = buildConfig(await loadBaseConfig(options.config), options, env.workers);
  } catch (error) {
    printError(errorMessage(error));
    process.exit(1);
  }

  if (options.saveConfig) {
    try {
      await saveConfigFile(options.saveConfig, config);
      printSuccess(`Configuration saved to ${options.saveConfig}`);
      return;
    } catch (error) {
      printError(`Could not save configuration: ${errorMessage(error)}`);
      process.exit(1);
    }
  }

  const converter = new HlsConverter({ ffmpegPath: env.ffmpegPath, ffprobePath: env.ffprobePath });
  const spinner = ora({ text: 'Detecting encoders and analyzing input...', isSilent: options.json === true }).start();

  let interrupted = false;
  const onInterrupt = (): void => {
    interrupted = true;
    spinner.text = 'Cancelling running encodes...';
    converter.cancel().catch((error: unknown) => {
      printError(`Cancel failed: ${errorMessage(error)}`);
    });
  };
  process.once('SIGINT', onInterrupt);

  try {
    const report = await converter.convert(inputFile, outputDir, {
      config,
      resolutions,
      onProgress: progress => {
        spinner.text = formatProgress(progress);
      },
      onJobComplete: result => {
        const label = `${result.kind} ${result.name}`;
        if (result.status === 'success') {
          spinner.stopAndPersist({ symbol: chalk.green('✓'), text: `${label} done` });
        } else {
          spinner.stopAndPersist({ symbol: chalk.red('✗'), text: `${label} failed` });
        }
        spinner.start('Encoding...');
      },
    });

    if (interrupted) {
      spinner.warn('Conversion cancelled');
      process.exit(EXIT_INTERRUPTED);
    }

    spinner.stop();
    if (options.json) {
      printJson(report);
    } else {
      printReport(report);
    }

    if (!report.success) {
      printError('Conversion failed: no rendition could be encoded');
      process.exit(1);
    }
    if (report.outcome === 'partial') {
      printWarning(`Some renditions failed: ${report.failedRenditions.join(', ')}`);
    } else {
      printSuccess(`Conversion complete: ${report.masterPlaylist}`);
    }
  } catch (error) {
    spinner.fail('Conversion failed');
    printError(errorMessage(error));
    process.exit(interrupted ? EXIT_INTERRUPTED : 1);
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}
