/**
 * Metadata Prober
 *
 * Probes a file with ffprobe and returns a normalised MediaDescriptor.
 * Results are cached per absolute path and modification time, so repeated
 * probes of an unchanged file never spawn a second process.
 */

import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { ProbeError } from '@vidbatch/core';
import { createLogger, errnoCode, isSpawnNotFound, type CommandResult } from '@vidbatch/utils';
import { FFProbe, parseFFProbeOutput, type ProbeRunner } from './probes/ffprobe.js';
import { DescriptorCache } from './descriptorCache.js';
import { toMediaDescriptor } from './descriptor.js';
import type { MediaDescriptor } from './types.js';

const log = createLogger({ module: 'prober' });

export interface FileStat {
  mtimeMs: number;
  size: number;
  isFile(): boolean;
}

/**
 * Source of file facts (and therefore of the cache's modification times)
 */
export type StatFn = (path: string) => Promise<FileStat>;

export interface MediaProberOptions {
  runner?: ProbeRunner;
  ffprobePath?: string;
  timeoutMs?: number;
  cache?: DescriptorCache;
  stat?: StatFn;
}

/**
 * The part of the prober other components depend on
 */
export interface Prober {
  probe(filePath: string): Promise<MediaDescriptor>;
}

export class MediaProber implements Prober {
  private readonly runner: ProbeRunner;
  private readonly statFn: StatFn;
  readonly cache: DescriptorCache;
  private readonly inFlight = new Map<string, Promise<MediaDescriptor>>();

  constructor(options: MediaProberOptions = {}) {
    this.runner = options.runner ?? new FFProbe({
      ffprobePath: options.ffprobePath,
      timeoutMs: options.timeoutMs,
    });
    this.statFn = options.stat ?? ((path) => stat(path));
    this.cache = options.cache ?? new DescriptorCache();
  }

  async probe(filePath: string): Promise<MediaDescriptor> {
    const absolute = resolve(filePath);
    const facts = await this.statFile(absolute);

    const cached = this.cache.get(absolute, facts.mtimeMs);
    if (cached) {
      log.trace({ path: absolute }, 'Descriptor cache hit');
      return cached;
    }

    // Concurrent probes of the same unchanged file share one process
    const key = `${absolute}\0${facts.mtimeMs}`;
    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const task = this.runProbe(absolute, facts).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, task);
    return task;
  }

  private async runProbe(path: string, facts: FileStat): Promise<MediaDescriptor> {
    let result: CommandResult;
    try {
      result = await this.runner.run(path);
    } catch (error) {
      if (isSpawnNotFound(error)) {
        throw new ProbeError('ToolMissing', path, 'ffprobe executable not found');
      }
      throw error;
    }

    if (result.timedOut) {
      throw new ProbeError('ToolTimeout', path, `ffprobe timed out after ${result.duration}ms`);
    }

    if (result.exitCode !== 0) {
      const reason = result.stderr.trim() || `exit code ${result.exitCode}`;
      throw new ProbeError('Unreadable', path, `ffprobe could not read ${path}: ${reason}`);
    }

    const parsed = parseFFProbeOutput(result.stdout);
    if (!parsed) {
      throw new ProbeError(
        'MalformedOutput',
        path,
        `Failed to parse ffprobe output: ${result.stdout.substring(0, 200)}`
      );
    }

    const descriptor = toMediaDescriptor(path, parsed, facts);
    this.cache.set(path, facts.mtimeMs, descriptor);

    log.debug({ path, streams: descriptor.streams.length }, 'Probed media file');
    return descriptor;
  }

  private async statFile(path: string): Promise<FileStat> {
    let facts: FileStat;
    try {
      facts = await this.statFn(path);
    } catch (error) {
      const code = errnoCode(error);
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        throw new ProbeError('NotFound', path, `File not found: ${path}`);
      }
      throw new ProbeError('Unreadable', path, `Cannot access ${path}: ${code ?? String(error)}`);
    }

    if (!facts.isFile()) {
      throw new ProbeError('Unreadable', path, `Not a regular file: ${path}`);
    }
    return facts;
  }
}
