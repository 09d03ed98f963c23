import { describe, it, expect } from 'vitest';
import { JobError } from '@vidbatch/core';
import { FFmpegRunner, formatCommandLine, summarizeDiagnostics, type CommandSpec, type TranscodeProgress } from '../src/index.js';

/** A command that runs a short Node script in place of ffmpeg */
function script(source: string): CommandSpec {
  const args = ['-e', source];
  return {
    binary: process.execPath,
    args,
    inputPath: '/media/in.mkv',
    outputPath: '/media/out.mkv',
    commandLine: formatCommandLine(process.execPath, args),
  };
}

describe('FFmpegRunner', () => {
  it('reports exit code, stderr and progress', async () => {
    const progress: TranscodeProgress[] = [];
    const outcome = await new FFmpegRunner().run(
      script(
        "process.stdout.write('out_time_us=500000\\nprogress=continue\\n');" +
          "process.stderr.write('Error opening output file\\n');" +
          'process.exitCode = 3;'
      ),
      { durationMs: 1000, onProgress: (p) => progress.push(p) }
    );

    expect(outcome.exitCode).toBe(3);
    expect(outcome.cancelled).toBe(false);
    expect(outcome.stderr).toBe('Error opening output file\n');
    expect(progress).toHaveLength(1);
    expect(progress[0]).toMatchObject({ outTimeMs: 500, percent: 50, done: false });
  });

  it('terminates the process when the signal aborts', async () => {
    const controller = new AbortController();
    const running = new FFmpegRunner({ killGraceMs: 1000 }).run(script('setInterval(() => {}, 1000);'), {
      signal: controller.signal,
    });
    setTimeout(() => controller.abort(), 50);

    const outcome = await running;
    expect(outcome.cancelled).toBe(true);
    expect(outcome.exitCode).toBeNull();
    expect(outcome.signal).toBe('SIGTERM');
  });

  it('rejects with SpawnFailed when the binary is missing', async () => {
    const spec = { ...script(''), binary: '/nonexistent/ffmpeg' };
    const error = await new FFmpegRunner().run(spec).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(JobError);
    expect(error).toMatchObject({ kind: 'SpawnFailed', message: 'Cannot start /nonexistent/ffmpeg: not found' });
  });
});

describe('summarizeDiagnostics', () => {
  it('picks the first error line', () => {
    const stderr = [
      'Input #0, matroska,webm, from in.mkv:',
      '  Duration: 00:01:00.00',
      '[libx265 @ 0x1] Error setting option crf to value abc.',
      'Conversion failed!',
    ].join('\n');
    expect(summarizeDiagnostics(stderr)).toBe('[libx265 @ 0x1] Error setting option crf to value abc.');
  });

  it('falls back to the last lines', () => {
    expect(summarizeDiagnostics('one\ntwo\n\nthree\nfour\n', 2)).toBe('three\nfour');
  });

  it('returns an empty string for empty output', () => {
    expect(summarizeDiagnostics('')).toBe('');
  });
});
