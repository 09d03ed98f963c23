/**
 * Info Command
 * 
 * Print a file's streams, or the raw ffprobe JSON with --json.
 */

import ora from 'ora';
import { formatInfoBlock } from '@vidbatch/media';
import { loadConfig } from '../config/index.js';
import { createEngine } from '../lib/engine.js';
import { printJson } from '../lib/output.js';

interface InfoOptions {
  json?: boolean;
}

export async function infoCommand(file: string, options: InfoOptions): Promise<void> {
  const { prober } = await createEngine(loadConfig());

  const spinner = ora(`Probing ${file}...`).start();
  const descriptor = await prober.probe(file).finally(() => spinner.stop());

  if (options.json) {
    printJson(descriptor.raw);
    return;
  }
  console.log(formatInfoBlock(descriptor));
}
