/**
 * Batch Orchestrator
 * 
 * Runs one transcode job per selected file with bounded concurrency, and
 * records every state change in an append-only event log.
 * 
 * ffmpeg always writes to a hidden partial sibling of the output, which is
 * renamed onto the output only after a clean exit. A failed or cancelled
 * job therefore never leaves a truncated file under the output name.
 */

import { EventEmitter } from 'node:events';
import { basename, dirname, extname, join, resolve } from 'node:path';
import {
  JobError,
  JobStateMachine,
  TemplateError,
  VidbatchError,
  isVidbatchError,
  type JobStatus,
  type TerminalJobStatus,
} from '@vidbatch/core';
import type { MediaDescriptor, Prober } from '@vidbatch/media';
import {
  Mutex,
  PARTIAL_OUTPUT_MARKER,
  createLogger,
  ensureDir,
  moveFile,
  pathExists,
  removeFile,
} from '@vidbatch/utils';
import { buildTranscodeCommand, type CommandSpec } from './commandBuilder.js';
import { resolveOutputPath, type OutputOptions } from './pathTemplate.js';
import type { TranscodeProgress } from './progressParser.js';
import type { TranscodeOptions } from './transcodeOptions.js';
import { FFmpegRunner, summarizeDiagnostics, type TranscodeRunner } from './transcodeRunner.js';

const log = createLogger({ module: 'orchestrator' });

const PROGRESS_INTERVAL_MS = 250;

export interface JobInfo {
  readonly id: string;
  /** Position in the batch, 0-based */
  readonly index: number;
  readonly sourcePath: string;
  readonly outputPath?: string;
  readonly commandLine?: string;
}

export interface JobFailure {
  readonly name: string;
  readonly kind?: string;
  readonly message: string;
  readonly diagnostics?: string;
  readonly exitCode?: number;
}

export interface BatchEntry {
  readonly job: JobInfo;
  readonly status: TerminalJobStatus;
  readonly error?: JobFailure;
  /** Prepared but not spawned */
  readonly dryRun?: boolean;
}

export interface BatchCounts {
  succeeded: number;
  failed: number;
  skipped: number;
  cancelled: number;
}

export interface BatchResult {
  readonly entries: readonly BatchEntry[];
  readonly counts: Readonly<BatchCounts>;
  /** Cancellation was requested during the run */
  readonly cancelled: boolean;
  readonly durationMs: number;
}

export type BatchEvent =
  | { readonly seq: number; readonly type: 'batch:start'; readonly total: number }
  | { readonly seq: number; readonly type: 'job:start'; readonly job: JobInfo; readonly dryRun: boolean }
  | { readonly seq: number; readonly type: 'job:progress'; readonly job: JobInfo; readonly progress: TranscodeProgress }
  | { readonly seq: number; readonly type: 'job:settled'; readonly entry: BatchEntry; readonly counts: Readonly<BatchCounts> }
  | { readonly seq: number; readonly type: 'batch:cancel-requested' }
  | { readonly seq: number; readonly type: 'batch:end'; readonly result: BatchResult };

type WithoutSeq<T> = T extends unknown ? Omit<T, 'seq'> : never;

export interface CollisionQuestion {
  readonly sourcePath: string;
  readonly outputPath: string;
}

/** Answers whether an existing output may be overwritten */
export type CollisionResolver = (question: CollisionQuestion) => Promise<boolean> | boolean;

export interface BatchRequest {
  paths: readonly string[];
  transcode: TranscodeOptions;
  output: OutputOptions;
  /** Descriptors already probed (e.g. during selection), keyed by absolute path */
  descriptors?: ReadonlyMap<string, MediaDescriptor>;
  concurrency?: number;
  signal?: AbortSignal;
  resolveCollision?: CollisionResolver;
  dryRun?: boolean;
}

export interface BatchOrchestratorOptions {
  prober: Prober;
  runner?: TranscodeRunner;
  ffmpegPath?: string;
  killGraceMs?: number;
  exists?: (path: string) => Promise<boolean>;
  now?: () => Date;
}

interface JobState {
  id: string;
  index: number;
  sourcePath: string;
  outputPath?: string;
  commandLine?: string;
  machine: JobStateMachine;
}

interface PreparedJob {
  outputPath: string;
  partialPath: string;
  command: CommandSpec;
  durationMs: number;
}

/**
 * Hidden sibling the process writes to: `/out/movie.mkv` -> `/out/.movie.vidbatch-partial.mkv`
 */
export function partialOutputPath(outputPath: string): string {
  const ext = extname(outputPath);
  const stem = basename(outputPath, ext);
  return join(dirname(outputPath), `.${stem}${PARTIAL_OUTPUT_MARKER}${ext}`);
}

function toFailure(error: unknown): JobFailure {
  if (error instanceof JobError) {
    return {
      name: error.name,
      kind: error.kind,
      message: error.message,
      diagnostics: error.diagnostics || undefined,
      exitCode: error.exitCode,
    };
  }
  if (isVidbatchError(error)) {
    const kind = 'kind' in error && typeof error.kind === 'string' ? error.kind : undefined;
    return { name: error.name, kind, message: error.message };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: 'Error', message: String(error) };
}

function snapshot(job: JobState): JobInfo {
  return Object.freeze({
    id: job.id,
    index: job.index,
    sourcePath: job.sourcePath,
    outputPath: job.outputPath,
    commandLine: job.commandLine,
  });
}

const COUNT_KEYS: Record<TerminalJobStatus, keyof BatchCounts> = {
  SUCCEEDED: 'succeeded',
  FAILED: 'failed',
  SKIPPED: 'skipped',
  CANCELLED: 'cancelled',
};

export class BatchOrchestrator extends EventEmitter {
  private readonly prober: Prober;
  private readonly runner: TranscodeRunner;
  private readonly ffmpegPath?: string;
  private readonly exists: (path: string) => Promise<boolean>;
  private readonly now?: () => Date;
  private readonly promptLock = new Mutex();
  private readonly reservationLock = new Mutex();

  private eventLog: BatchEvent[] = [];
  private seq = 0;
  /** Output paths taken by jobs of the current batch */
  private reserved = new Set<string>();
  private running = false;
  private cancelRequested = false;
  private controller = new AbortController();
  private counts: BatchCounts = { succeeded: 0, failed: 0, skipped: 0, cancelled: 0 };

  constructor(options: BatchOrchestratorOptions) {
    super();
    this.prober = options.prober;
    this.runner = options.runner ?? new FFmpegRunner({ killGraceMs: options.killGraceMs });
    this.ffmpegPath = options.ffmpegPath;
    this.exists = options.exists ?? pathExists;
    this.now = options.now;
  }

  /**
   * Frozen copy of every event of the current (or last) batch
   */
  events(): readonly BatchEvent[] {
    return Object.freeze([...this.eventLog]);
  }

  /**
   * Request cancellation: jobs not yet started settle as CANCELLED and
   * running processes are terminated.
   */
  cancel(): void {
    if (this.cancelRequested || !this.running) return;
    this.cancelRequested = true;
    log.info('Batch cancellation requested');
    this.append({ type: 'batch:cancel-requested' });
    this.controller.abort();
  }

  async run(request: BatchRequest): Promise<BatchResult> {
    if (this.running) {
      throw new VidbatchError('A batch is already running on this orchestrator', 'BATCH_RUNNING');
    }

    const startTime = Date.now();
    this.running = true;
    this.cancelRequested = false;
    this.controller = new AbortController();
    this.counts = { succeeded: 0, failed: 0, skipped: 0, cancelled: 0 };
    this.eventLog = [];
    this.seq = 0;
    this.reserved = new Set();

    const onExternalAbort = (): void => this.cancel();
    request.signal?.addEventListener('abort', onExternalAbort, { once: true });

    const jobs: JobState[] = request.paths.map((path, index) => ({
      id: `job-${index + 1}`,
      index,
      sourcePath: resolve(path),
      machine: new JobStateMachine(`job-${index + 1}`),
    }));
    const entries: BatchEntry[] = new Array<BatchEntry>(jobs.length);
    const concurrency = Math.max(1, Math.floor(request.concurrency ?? 1));

    log.info({ jobs: jobs.length, concurrency, dryRun: Boolean(request.dryRun) }, 'Batch started');
    this.append({ type: 'batch:start', total: jobs.length });

    if (request.signal?.aborted) {
      this.cancel();
    }

    try {
      // Worker slots pull jobs in list order
      let next = 0;
      const worker = async (): Promise<void> => {
        for (let i = next++; i < jobs.length; i = next++) {
          const job = jobs[i];
          if (job) entries[i] = await this.processJob(job, request);
        }
      };
      await Promise.all(Array.from({ length: Math.min(concurrency, jobs.length) }, worker));
    } finally {
      request.signal?.removeEventListener('abort', onExternalAbort);
      this.running = false;
    }

    const result: BatchResult = Object.freeze({
      entries: Object.freeze(entries),
      counts: Object.freeze({ ...this.counts }),
      cancelled: this.cancelRequested,
      durationMs: Date.now() - startTime,
    });

    log.info({ ...result.counts, cancelled: result.cancelled, durationMs: result.durationMs }, 'Batch finished');
    this.append({ type: 'batch:end', result });
    return result;
  }

  private async processJob(job: JobState, request: BatchRequest): Promise<BatchEntry> {
    if (this.cancelRequested) {
      return this.settle(job, 'CANCELLED');
    }

    let prepared: PreparedJob;
    try {
      prepared = await this.prepare(job, request);
    } catch (error) {
      if (this.cancelRequested) {
        return this.settle(job, 'CANCELLED');
      }
      log.warn({ path: job.sourcePath, err: error }, 'Job skipped');
      return this.settle(job, 'SKIPPED', toFailure(error));
    }

    if (this.cancelRequested) {
      return this.settle(job, 'CANCELLED');
    }

    this.transition(job, 'RUNNING');
    this.append({ type: 'job:start', job: snapshot(job), dryRun: Boolean(request.dryRun) });

    if (request.dryRun) {
      return this.settle(job, 'SUCCEEDED', undefined, true);
    }

    return this.execute(job, prepared);
  }

  private async prepare(job: JobState, request: BatchRequest): Promise<PreparedJob> {
    const descriptor = request.descriptors?.get(job.sourcePath) ?? (await this.prober.probe(job.sourcePath));

    // Resolve and claim in one step so two jobs never pick the same output
    const resolved = await this.reservationLock.runExclusive(async () => {
      const result = await resolveOutputPath(job.sourcePath, descriptor, request.output, {
        exists: this.exists,
        now: this.now,
        quality: request.transcode.crf,
        isClaimed: (path) => this.reserved.has(path),
      });
      this.reserved.add(result.path);
      return result;
    });
    job.outputPath = resolved.path;

    try {
      if (resolved.action === 'ask') {
        await this.confirmOverwrite(job.sourcePath, resolved.path, request.resolveCollision);
      }

      const partialPath = partialOutputPath(resolved.path);
      const command = buildTranscodeCommand(descriptor, request.transcode, partialPath, {
        overwrite: true,
        progress: true,
        ffmpegPath: this.ffmpegPath,
      });
      job.commandLine = command.commandLine;

      return {
        outputPath: resolved.path,
        partialPath,
        command,
        durationMs: Math.round(descriptor.durationSec * 1000),
      };
    } catch (error) {
      this.reserved.delete(resolved.path);
      throw error;
    }
  }

  private async confirmOverwrite(
    sourcePath: string,
    outputPath: string,
    resolver: CollisionResolver | undefined
  ): Promise<void> {
    if (!resolver) {
      throw new TemplateError('CollisionDenied', `Output exists and no one can be asked: ${outputPath}`, {
        path: outputPath,
      });
    }

    // One question at a time, even with several slots
    const allowed = await this.promptLock.runExclusive(() =>
      this.cancelRequested ? false : resolver({ sourcePath, outputPath })
    );
    if (!allowed) {
      throw new TemplateError('CollisionDenied', `Overwrite declined: ${outputPath}`, { path: outputPath });
    }
  }

  private async execute(job: JobState, prepared: PreparedJob): Promise<BatchEntry> {
    const info = snapshot(job);
    let lastProgressAt = 0;

    const onProgress = (progress: TranscodeProgress): void => {
      const now = Date.now();
      if (!progress.done && now - lastProgressAt < PROGRESS_INTERVAL_MS) return;
      lastProgressAt = now;
      this.append({ type: 'job:progress', job: info, progress });
    };

    try {
      await ensureDir(dirname(prepared.outputPath));
      const outcome = await this.runner.run(prepared.command, {
        signal: this.controller.signal,
        onProgress,
        durationMs: prepared.durationMs,
      });

      if (outcome.cancelled) {
        await this.discardPartial(prepared.partialPath);
        return this.settle(job, 'CANCELLED');
      }

      if (outcome.exitCode !== 0) {
        await this.discardPartial(prepared.partialPath);
        const killed = outcome.exitCode === null;
        const error = new JobError(
          killed ? 'Killed' : 'NonZeroExit',
          killed
            ? `ffmpeg was killed by ${outcome.signal ?? 'a signal'}`
            : `ffmpeg exited with code ${outcome.exitCode}`,
          {
            exitCode: outcome.exitCode ?? undefined,
            diagnostics: summarizeDiagnostics(outcome.stderr),
            command: prepared.command.commandLine,
          }
        );
        log.warn({ path: job.sourcePath, exitCode: outcome.exitCode, diagnostics: error.diagnostics }, 'Job failed');
        return this.settle(job, 'FAILED', toFailure(error));
      }
    } catch (error) {
      await this.discardPartial(prepared.partialPath);
      log.warn({ path: job.sourcePath, err: error }, 'Job failed');
      return this.settle(job, 'FAILED', toFailure(error));
    }

    try {
      await moveFile(prepared.partialPath, prepared.outputPath);
    } catch (error) {
      await this.discardPartial(prepared.partialPath);
      const failure = new JobError(
        'OutputWriteFailed',
        `Cannot move output into place at ${prepared.outputPath}: ${error instanceof Error ? error.message : String(error)}`,
        { command: prepared.command.commandLine }
      );
      log.warn({ path: job.sourcePath, err: error }, 'Job failed');
      return this.settle(job, 'FAILED', toFailure(failure));
    }

    return this.settle(job, 'SUCCEEDED');
  }

  private async discardPartial(partialPath: string): Promise<void> {
    try {
      await removeFile(partialPath);
    } catch (error) {
      log.warn({ path: partialPath, err: error }, 'Could not remove partial output');
    }
  }

  private transition(job: JobState, status: JobStatus): void {
    job.machine.transitionTo(status);
  }

  private settle(job: JobState, status: TerminalJobStatus, error?: JobFailure, dryRun?: boolean): BatchEntry {
    this.transition(job, status);
    this.counts[COUNT_KEYS[status]] += 1;

    const entry: BatchEntry = Object.freeze({
      job: snapshot(job),
      status,
      ...(error ? { error: Object.freeze(error) } : {}),
      ...(dryRun ? { dryRun } : {}),
    });
    this.append({ type: 'job:settled', entry, counts: Object.freeze({ ...this.counts }) });
    return entry;
  }

  private append(event: WithoutSeq<BatchEvent>): void {
    const stamped: BatchEvent = Object.freeze({ ...event, seq: ++this.seq });
    this.eventLog.push(stamped);
    this.emit('event', stamped);
  }
}

/**
 * Source paths of failed jobs, for an explicit re-run
 */
export function retryFailed(result: BatchResult): string[] {
  return result.entries
    .filter((entry) => entry.status === 'FAILED')
    .map((entry) => entry.job.sourcePath);
}
