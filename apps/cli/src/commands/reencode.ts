/**
 * Reencode Command
 * 
 * Transcode one file, or every file a glob selects, with the given options.
 */

import ora from 'ora';
import chalk from 'chalk';
import { relative, resolve } from 'node:path';
import {
  BatchOrchestrator,
  createOutputOptions,
  createTranscodeOptions,
  describeTranscodeOptions,
  mergeTranscodeInput,
  toTranscodeInput,
  type BatchEvent,
  type BatchResult,
  type CollisionResolver,
  type TranscodeInput,
} from '@vidbatch/processing';
import { Selector, createSelectionCriteria } from '@vidbatch/selection';
import type { MediaDescriptor } from '@vidbatch/media';
import { formatDuration } from '@vidbatch/utils';
import { loadConfig } from '../config/index.js';
import { createEngine, openPresetStore } from '../lib/engine.js';
import {
  batchSelection,
  collisionPolicyFromFlags,
  flagsToTranscodeInput,
  parseIntegerFlag,
  type ReencodeFlags,
} from '../lib/flags.js';
import { printInfo, printJson, printSuccess, printWarning } from '../lib/output.js';
import { askYesNo, canPrompt } from '../lib/prompt.js';

export const EXIT_INTERRUPTED = 130;

function display(path: string): string {
  const rel = relative(process.cwd(), path);
  return rel.startsWith('..') ? path : rel;
}

function renderEvent(event: BatchEvent, dryRun: boolean): void {
  const live = Boolean(process.stderr.isTTY);

  switch (event.type) {
    case 'job:start':
      if (!dryRun) {
        console.log(`${chalk.cyan('→')} ${display(event.job.sourcePath)}`);
      }
      break;
    case 'job:progress': {
      if (!live) break;
      const { progress } = event;
      const percent = progress.percent !== undefined ? `${progress.percent.toFixed(1)}%` : formatDuration(progress.outTimeMs);
      process.stderr.write(`\r  ${chalk.gray(percent)} ${chalk.gray(`${progress.speed.toFixed(2)}x`)}   `);
      if (progress.done) process.stderr.write('\n');
      break;
    }
    case 'job:settled': {
      const { entry } = event;
      const target = entry.job.outputPath ? display(entry.job.outputPath) : display(entry.job.sourcePath);
      if (entry.dryRun) {
        console.log(entry.job.commandLine ?? '');
      } else if (entry.status === 'SUCCEEDED') {
        printSuccess(target);
      } else if (entry.status === 'FAILED') {
        console.log(chalk.red('✗'), `${display(entry.job.sourcePath)}: ${entry.error?.message ?? 'failed'}`);
      } else if (entry.status === 'SKIPPED') {
        printWarning(`Skipped ${display(entry.job.sourcePath)}: ${entry.error?.message ?? 'skipped'}`);
      } else {
        printWarning(`Cancelled ${display(entry.job.sourcePath)}`);
      }
      break;
    }
    case 'batch:cancel-requested':
      printWarning('Interrupted, cancelling the batch...');
      break;
    default:
      break;
  }
}

function printSummary(result: BatchResult): void {
  const { counts } = result;
  console.log();
  console.log(
    chalk.bold('Summary:'),
    chalk.green(`${counts.succeeded} succeeded`),
    chalk.red(`${counts.failed} failed`),
    chalk.yellow(`${counts.skipped} skipped`),
    chalk.gray(`${counts.cancelled} cancelled`),
    chalk.gray(`in ${formatDuration(result.durationMs)}`)
  );

  for (const entry of result.entries) {
    if (entry.status !== 'FAILED' || !entry.error) continue;
    console.log();
    console.log(chalk.red(display(entry.job.sourcePath)));
    console.log(`  ${entry.error.message}`);
    if (entry.error.diagnostics) {
      for (const line of entry.error.diagnostics.split('\n')) {
        console.log(chalk.gray(`  ${line}`));
      }
    }
  }
}

export function exitCodeFor(result: BatchResult): number {
  if (result.cancelled) return EXIT_INTERRUPTED;
  return result.counts.failed > 0 ? 1 : 0;
}

export async function reencodeCommand(
  pattern: string,
  ext: string,
  suffix: string,
  flags: ReencodeFlags
): Promise<void> {
  const config = loadConfig();

  // Options first: conflicts are reported before anything touches the disk
  const policy = collisionPolicyFromFlags(flags);
  const store = flags.preset || flags.savePreset ? await openPresetStore(config) : null;
  let input: TranscodeInput = flagsToTranscodeInput(flags);
  if (store && flags.preset) {
    input = mergeTranscodeInput(toTranscodeInput(store.load(flags.preset)), input);
  }
  const transcode = createTranscodeOptions(input);
  const output = createOutputOptions({
    pattern: flags.name,
    extension: ext,
    suffix,
    collisionPolicy: policy,
  });
  const concurrency = flags.concurrency === undefined
    ? config.concurrency
    : parseIntegerFlag('--concurrency', flags.concurrency, 1);

  if (store && flags.savePreset) {
    await store.save(flags.savePreset, transcode);
    printSuccess(`Saved preset "${flags.savePreset.trim()}"`);
  }

  const { binaries, prober } = await createEngine(config);

  let paths: readonly string[];
  let descriptors: ReadonlyMap<string, MediaDescriptor> = new Map();

  if (flags.batch) {
    const selection = batchSelection(pattern, flags.depth, process.cwd());
    const spinner = ora(`Selecting files in ${display(selection.root)}...`).start();
    const selected = await new Selector(prober)
      .select([selection.root], createSelectionCriteria({ pattern: { kind: 'glob', value: selection.pattern } }), selection.depth)
      .finally(() => spinner.stop());
    for (const warning of selected.warnings) {
      printWarning(`${display(warning.path)}: ${warning.error.message}`);
    }
    paths = selected.paths;
    descriptors = selected.descriptors;
  } else {
    const spinner = ora(`Probing ${pattern}...`).start();
    const descriptor = await prober.probe(pattern).finally(() => spinner.stop());
    paths = [descriptor.path];
    descriptors = new Map([[descriptor.path, descriptor]]);
  }

  if (paths.length === 0) {
    printInfo('No files matched');
    return;
  }

  if (!flags.json) {
    printInfo(`${paths.length} file(s): ${describeTranscodeOptions(transcode)}`);
  }

  const resolveCollision: CollisionResolver | undefined = canPrompt()
    ? ({ outputPath }) => askYesNo(`${display(outputPath)} exists. Overwrite?`)
    : undefined;

  const orchestrator = new BatchOrchestrator({
    prober,
    ffmpegPath: binaries.ffmpeg.resolvedPath,
    killGraceMs: config.killGraceMs,
  });
  if (!flags.json) {
    orchestrator.on('event', (event: BatchEvent) => renderEvent(event, Boolean(flags.dryRun)));
  }

  const onSigint = (): void => orchestrator.cancel();
  process.on('SIGINT', onSigint);

  let result: BatchResult;
  try {
    result = await orchestrator.run({
      paths: paths.map((path) => resolve(path)),
      transcode,
      output,
      descriptors,
      concurrency,
      resolveCollision,
      dryRun: flags.dryRun,
    });
  } finally {
    process.off('SIGINT', onSigint);
  }

  if (flags.json) {
    printJson(result);
  } else {
    printSummary(result);
  }

  process.exitCode = exitCodeFor(result);
}
