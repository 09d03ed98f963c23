/**
 * FFProbe Wrapper
 * 
 * Safe wrapper for ffprobe command execution.
 * Extracts container and stream metadata in JSON format.
 */

import { z } from 'zod';
import { executeCommand, createLogger, type CommandResult } from '@vidbatch/utils';

const log = createLogger({ module: 'ffprobe' });

const numeric = z.union([z.number(), z.string()]).optional();

export const ffprobeStreamSchema = z
  .object({
    index: z.number().int(),
    codec_name: z.string().optional(),
    codec_long_name: z.string().optional(),
    codec_type: z.string().optional(),
    profile: z.string().optional(),
    width: z.number().optional(),
    height: z.number().optional(),
    coded_width: z.number().optional(),
    coded_height: z.number().optional(),
    display_aspect_ratio: z.string().optional(),
    pix_fmt: z.string().optional(),
    sample_rate: z.string().optional(),
    channels: z.number().optional(),
    channel_layout: z.string().optional(),
    bit_rate: numeric,
    duration: numeric,
    tags: z.record(z.string()).optional(),
  })
  .passthrough();

export const ffprobeResultSchema = z
  .object({
    format: z
      .object({
        filename: z.string().optional(),
        nb_streams: z.number().optional(),
        format_name: z.string(),
        format_long_name: z.string().optional(),
        duration: numeric,
        size: numeric,
        bit_rate: numeric,
        tags: z.record(z.string()).optional(),
      })
      .passthrough(),
    streams: z.array(ffprobeStreamSchema).default([]),
  })
  .passthrough();

export type FFProbeStream = z.infer<typeof ffprobeStreamSchema>;
export type FFProbeResult = z.infer<typeof ffprobeResultSchema>;

/**
 * Anything that can run the probe tool for one file. The prober depends on
 * this seam rather than on a process so tests can answer in-process.
 */
export interface ProbeRunner {
  run(filePath: string): Promise<CommandResult>;
}

export interface FFProbeOptions {
  ffprobePath?: string;
  timeoutMs?: number;
}

export class FFProbe implements ProbeRunner {
  private readonly ffprobePath: string;
  private readonly timeoutMs: number;

  constructor(options: FFProbeOptions = {}) {
    this.ffprobePath = options.ffprobePath ?? 'ffprobe';
    this.timeoutMs = options.timeoutMs ?? 60000; // 1 minute timeout
  }

  static args(filePath: string): string[] {
    return [
      '-v', 'quiet',
      '-print_format', 'json',
      '-show_format',
      '-show_streams',
      filePath,
    ];
  }

  /**
   * Run ffprobe against a file and return the raw command result.
   * Spawn failures (e.g. ENOENT) propagate to the caller.
   */
  async run(filePath: string): Promise<CommandResult> {
    const args = FFProbe.args(filePath);
    log.debug({ command: `${this.ffprobePath} ${args.join(' ')}` }, 'Running ffprobe');

    return executeCommand(this.ffprobePath, args, {
      timeout: this.timeoutMs,
    });
  }
}

/**
 * Parse ffprobe JSON output. Returns null when the text is not JSON or does
 * not have the expected shape.
 */
export function parseFFProbeOutput(stdout: string): FFProbeResult | null {
  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch {
    return null;
  }
  const parsed = ffprobeResultSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}
