/**
 * Presets Commands
 * 
 * Manage the named option sets in the preset file.
 */

import chalk from 'chalk';
import { describeTranscodeOptions, toTranscodeInput } from '@vidbatch/processing';
import { loadConfig } from '../config/index.js';
import { openPresetStore } from '../lib/engine.js';
import { printHeader, printInfo, printJson, printKeyValue, printSuccess, printWarning } from '../lib/output.js';

interface ListOptions {
  json?: boolean;
}

export async function presetsListCommand(options: ListOptions): Promise<void> {
  const store = await openPresetStore(loadConfig());
  const entries = store.list().map((name) => store.describe(name));

  if (options.json) {
    printJson(entries.map((entry) => ({
      name: entry.name,
      description: entry.description,
      options: toTranscodeInput(entry.options),
    })));
    return;
  }

  if (entries.length === 0) {
    printInfo(`No presets in ${store.file}`);
    return;
  }

  printHeader(`Presets (${store.file})`);
  for (const entry of entries) {
    console.log(`  ${chalk.cyan(entry.name)}${entry.description ? chalk.gray(` - ${entry.description}`) : ''}`);
  }
}

export async function presetsShowCommand(name: string): Promise<void> {
  const store = await openPresetStore(loadConfig());
  const entry = store.describe(name);

  printHeader(entry.name);
  if (entry.description) printKeyValue('Description', entry.description);
  printKeyValue('Effect', describeTranscodeOptions(entry.options));
  console.log();
  printJson(toTranscodeInput(entry.options));
}

export async function presetsDeleteCommand(name: string): Promise<void> {
  const store = await openPresetStore(loadConfig());
  if (await store.delete(name)) {
    printSuccess(`Deleted preset "${name}"`);
  } else {
    printWarning(`No preset named "${name}"`);
  }
}

export async function presetsRenameCommand(from: string, to: string): Promise<void> {
  const store = await openPresetStore(loadConfig());
  await store.rename(from, to);
  printSuccess(`Renamed preset "${from}" to "${to}"`);
}

interface ImportOptions {
  overwrite?: boolean;
}

export async function presetsImportCommand(file: string, options: ImportOptions): Promise<void> {
  const store = await openPresetStore(loadConfig());
  const names = await store.importFrom(file, { onConflict: options.overwrite ? 'overwrite' : 'rename' });
  printSuccess(`Imported ${names.length} preset(s): ${names.join(', ')}`);
}

export async function presetsExportCommand(file: string, names: string[]): Promise<void> {
  const store = await openPresetStore(loadConfig());
  const exported = await store.exportTo(file, names.length > 0 ? names : undefined);
  printSuccess(`Exported ${exported.length} preset(s) to ${file}`);
}
