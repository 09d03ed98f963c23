/**
 * Rename Command
 * 
 * Append the video resolution to file names: `movie.mkv` -> `movie-1920x1080.mkv`.
 */

import ora from 'ora';
import { basename } from 'node:path';
import { renameWithResolution } from '@vidbatch/processing';
import { Selector, VIDEO_EXTENSIONS, createSelectionCriteria } from '@vidbatch/selection';
import { loadConfig } from '../config/index.js';
import { createEngine } from '../lib/engine.js';
import { printError, printFailure, printInfo, printSuccess, printWarning } from '../lib/output.js';

interface RenameOptions {
  batch?: boolean;
}

export async function renameCommand(file: string | undefined, options: RenameOptions): Promise<void> {
  if (!options.batch && !file) {
    printError('A file is required unless --batch is given');
    process.exitCode = 1;
    return;
  }

  const { prober } = await createEngine(loadConfig());

  let files: readonly string[];
  if (options.batch) {
    const spinner = ora('Looking for video files...').start();
    const selected = await new Selector(prober)
      .select([file ?? '.'], createSelectionCriteria({ extensions: [...VIDEO_EXTENSIONS] }), -1)
      .finally(() => spinner.stop());
    files = selected.paths;
  } else {
    files = file ? [file] : [];
  }

  if (files.length === 0) {
    printInfo('No video files found');
    return;
  }

  let failures = 0;
  for (const path of files) {
    try {
      const result = await renameWithResolution(path, prober);
      if (result.renamed) {
        printSuccess(`${basename(result.from)} -> ${basename(result.to)}`);
      } else {
        printWarning(`${basename(result.from)}: ${basename(result.to)} already exists`);
      }
    } catch (error) {
      failures++;
      printFailure(error);
    }
  }

  if (failures > 0) {
    process.exitCode = 1;
  }
}
