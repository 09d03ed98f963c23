/**
 * Transcode Runner
 * 
 * Spawns ffmpeg for one CommandSpec with progress tracking and cancellation.
 */

import { spawn } from 'node:child_process';
import { JobError } from '@vidbatch/core';
import { createLogger, isSpawnNotFound } from '@vidbatch/utils';
import type { CommandSpec } from './commandBuilder.js';
import { FFmpegProgressParser, type TranscodeProgress } from './progressParser.js';

const log = createLogger({ module: 'transcode-runner' });

const MAX_STDERR_BYTES = 256 * 1024;

export interface RunOptions {
  signal?: AbortSignal;
  onProgress?: (progress: TranscodeProgress) => void;
  /** Source duration, for percentage progress */
  durationMs?: number;
}

export interface RunOutcome {
  /** Null when the process ended on a signal */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stderr: string;
  durationMs: number;
  /** The run was aborted through the signal */
  cancelled: boolean;
}

export interface TranscodeRunner {
  run(spec: CommandSpec, options?: RunOptions): Promise<RunOutcome>;
}

export interface FFmpegRunnerOptions {
  /** SIGTERM -> SIGKILL delay on cancellation */
  killGraceMs?: number;
}

export class FFmpegRunner implements TranscodeRunner {
  private readonly killGraceMs: number;

  constructor(options: FFmpegRunnerOptions = {}) {
    this.killGraceMs = options.killGraceMs ?? 5000;
  }

  /**
   * Run ffmpeg to completion. Resolves on any exit, including cancellation.
   *
   * @throws JobError(SpawnFailed) when the process cannot be started
   */
  run(spec: CommandSpec, options: RunOptions = {}): Promise<RunOutcome> {
    const { signal, onProgress } = options;
    const startTime = Date.now();

    log.debug({ command: spec.commandLine }, 'FFmpeg command');

    return new Promise((resolve, reject) => {
      const child = spawn(spec.binary, [...spec.args], {
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stderr = '';
      let cancelled = false;
      let killTimer: NodeJS.Timeout | null = null;
      const parser = new FFmpegProgressParser(options.durationMs ?? 0);

      const onAbort = (): void => {
        cancelled = true;
        log.info({ input: spec.inputPath }, 'Cancelling transcode');
        child.kill('SIGTERM');
        killTimer = setTimeout(() => {
          if (child.exitCode === null && child.signalCode === null) {
            child.kill('SIGKILL');
          }
        }, this.killGraceMs);
        killTimer.unref();
      };

      if (signal) {
        if (signal.aborted) {
          onAbort();
        } else {
          signal.addEventListener('abort', onAbort, { once: true });
        }
      }

      // Progress blocks arrive on stdout
      child.stdout.on('data', (data: Buffer) => {
        for (const block of parser.push(data.toString())) {
          onProgress?.(block);
        }
      });

      // Keep the tail of stderr for diagnostics
      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
        if (stderr.length > MAX_STDERR_BYTES) {
          stderr = stderr.slice(-MAX_STDERR_BYTES);
        }
      });

      const cleanup = (): void => {
        if (killTimer) clearTimeout(killTimer);
        signal?.removeEventListener('abort', onAbort);
      };

      child.on('close', (exitCode, exitSignal) => {
        cleanup();
        resolve({
          exitCode,
          signal: exitSignal,
          stderr,
          durationMs: Date.now() - startTime,
          cancelled,
        });
      });

      child.on('error', (error) => {
        cleanup();
        reject(
          new JobError(
            'SpawnFailed',
            isSpawnNotFound(error)
              ? `Cannot start ${spec.binary}: not found`
              : `Cannot start ${spec.binary}: ${error.message}`,
            { command: spec.commandLine }
          )
        );
      });
    });
  }
}

const ERROR_PATTERNS = [
  /^.*\berror\b.*$/im,
  /^.*\binvalid\b.*$/im,
  /^.*No such file or directory.*$/m,
  /^.*Permission denied.*$/m,
  /^.*Conversion failed.*$/m,
];

/**
 * Most relevant error line of an ffmpeg log, or its last lines
 */
export function summarizeDiagnostics(stderr: string, tailLines: number = 3): string {
  for (const pattern of ERROR_PATTERNS) {
    const match = stderr.match(pattern);
    if (match) {
      return match[0].trim();
    }
  }

  const lines = stderr.trim().split('\n').filter((line) => line.trim() !== '');
  return lines.slice(-tailLines).join('\n');
}
