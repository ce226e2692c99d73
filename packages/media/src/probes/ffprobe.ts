/**
 * FFProbe Wrapper
 * 
 * Runs ffprobe twice per file (container format, then streams) and validates
 * the JSON it prints. Unknown or malformed fields fall back to "absent"; only
 * an unusable run (spawn failure, timeout, nonzero exit, non-JSON) throws.
 */

import { z } from 'zod';
import { executeCommand, type CommandRunner } from '@hls-kit/utils';
import { ProbeError } from '@hls-kit/core';

const optionalString = z.string().optional().catch(undefined);
const optionalNumber = z.number().optional().catch(undefined);

export const rawFormatSchema = z.object({
  format_name: optionalString,
  duration: optionalString,
  bit_rate: optionalString,
  size: optionalString,
});

export const rawStreamSchema = z.object({
  codec_type: z.string().catch(''),
  codec_name: optionalString,
  width: optionalNumber,
  height: optionalNumber,
  duration: optionalString,
  avg_frame_rate: optionalString,
  bit_rate: optionalString,
  sample_rate: optionalString,
  channels: optionalNumber,
  tags: z.record(z.string()).optional().catch(undefined),
});

const formatOutputSchema = z.object({
  format: rawFormatSchema.catch({}),
});

const streamsOutputSchema = z.object({
  streams: z.array(rawStreamSchema).catch([]),
});

export type RawFormat = z.infer<typeof rawFormatSchema>;
export type RawStream = z.infer<typeof rawStreamSchema>;

export interface FFProbeOptions {
  ffprobePath?: string;
  timeoutMs?: number;
  runCommand?: CommandRunner;
}

export class FFProbe {
  private readonly ffprobePath: string;
  private readonly timeoutMs: number;
  private readonly runCommand: CommandRunner;

  constructor(options: FFProbeOptions = {}) {
    this.ffprobePath = options.ffprobePath ?? 'ffprobe';
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.runCommand = options.runCommand ?? executeCommand;
  }

  /**
   * Container-level information (`-show_format`)
   */
  async probeFormat(filePath: string): Promise<RawFormat> {
    const output = await this.query(filePath, '-show_format');
    const parsed = formatOutputSchema.safeParse(output);
    if (!parsed.success) {
      throw new ProbeError(filePath, 'format output is not a JSON object');
    }
    return parsed.data.format;
  }

  /**
   * Per-stream information (`-show_streams`), in ffprobe's order
   */
  async probeStreams(filePath: string): Promise<RawStream[]> {
    const output = await this.query(filePath, '-show_streams');
    const parsed = streamsOutputSchema.safeParse(output);
    if (!parsed.success) {
      throw new ProbeError(filePath, 'stream output is not a JSON object');
    }
    return parsed.data.streams;
  }

  private async query(filePath: string, section: '-show_format' | '-show_streams'): Promise<unknown> {
    const args = ['-v', 'error', section, '-of', 'json', filePath];

    let result;
    try {
      result = await this.runCommand(this.ffprobePath, args, { timeout: this.timeoutMs });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ProbeError(filePath, `could not run ${this.ffprobePath}: ${reason}`, error);
    }

    if (result.timedOut) {
      throw new ProbeError(filePath, `${section} timed out after ${this.timeoutMs}ms`);
    }
    if (result.exitCode !== 0) {
      throw new ProbeError(filePath, `${section} exited with code ${result.exitCode}: ${result.stderr.trim().substring(0, 200)}`);
    }

    try {
      return JSON.parse(result.stdout);
    } catch (error) {
      throw new ProbeError(filePath, `${section} printed invalid JSON: ${result.stdout.substring(0, 200)}`, error);
    }
  }
}
