#!/usr/bin/env -S node --import tsx
/**
 * CLI Entry Point
 * 
 * Command-line interface for vidbatch. Commands only parse flags and print;
 * the work happens in the engine packages.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { loadEnvFile } from './config/index.js';
import { printFailure } from './lib/output.js';

// Commands
import { reencodeCommand } from './commands/reencode.js';
import { infoCommand } from './commands/info.js';
import { renameCommand } from './commands/rename.js';
import {
  presetsDeleteCommand,
  presetsExportCommand,
  presetsImportCommand,
  presetsListCommand,
  presetsRenameCommand,
  presetsShowCommand,
} from './commands/presets.js';

/**
 * Report a thrown error and mark the process as failed
 */
function guarded<A extends unknown[]>(action: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (error) {
      printFailure(error);
      process.exitCode = 1;
    }
  };
}

const program = new Command();

program
  .name('vidbatch')
  .description('Batch video reencoding with ffmpeg')
  .version('0.1.0');

// ============================================
// TRANSCODING
// ============================================

program
  .command('reencode <pattern> <ext> <suffix>')
  .description('Reencode a file (or, with --batch, every file matching a glob)')
  .option('--vcodec <codec>', 'Video encoder, "copy" or "strip"')
  .option('--acodec <codec>', 'Audio encoder, "copy" or "strip"')
  .option('--strip-video', 'Drop video streams')
  .option('--strip-audio', 'Drop audio streams')
  .option('--strip-subs', 'Drop subtitle streams')
  .option('--strip-data', 'Drop data and attachment streams')
  .option('--av-copy-only', 'Keep only video and audio streams')
  .option('--x265', 'Encode video with libx265 (crf 28 unless --crf)')
  .option('--crf <n>', 'Constant rate factor for the video encoder')
  .option('--custom-flags <flags...>', 'Extra ffmpeg output arguments, passed verbatim')
  .option('--batch', 'Treat <pattern> as a glob under the current directory')
  .option('--depth <n>', 'Directory levels below the root to search (-1 for unlimited)')
  .option('--fix-resolution', 'Scale odd dimensions down to even ones')
  .option('--fix-errors', 'Ignore decode errors in the input')
  .option('--force', 'Overwrite existing outputs')
  .option('--no-clobber', 'Skip files whose output exists')
  .option('--increment', 'Number the output when it exists (name_001.ext)')
  .option('--name <template>', 'Output naming pattern, e.g. "{stem}-{resolution}{extension}"')
  .option('--preset <name>', 'Start from a saved preset')
  .option('--save-preset <name>', 'Save the resulting options as a preset')
  .option('--concurrency <n>', 'Number of ffmpeg processes at once')
  .option('--dry-run', 'Print commands without running them')
  .option('--json', 'Print the batch result as JSON')
  .action(guarded(reencodeCommand));

// ============================================
// MEDIA COMMANDS
// ============================================

program
  .command('info <file>')
  .description('Show the streams of a media file')
  .option('--json', 'Print the raw ffprobe output')
  .action(guarded(infoCommand));

program
  .command('rename [file]')
  .description('Append the video resolution to a file name')
  .option('--batch', 'Rename every video file under [file] (default: current directory)')
  .action(guarded(renameCommand));

// ============================================
// PRESETS
// ============================================

const presets = program
  .command('presets')
  .description('Manage saved option presets');

presets
  .command('list')
  .description('List presets')
  .option('--json', 'Output in JSON format')
  .action(guarded(presetsListCommand));

presets
  .command('show <name>')
  .description('Show one preset')
  .action(guarded(presetsShowCommand));

presets
  .command('delete <name>')
  .description('Delete a preset')
  .action(guarded(presetsDeleteCommand));

presets
  .command('rename <old> <new>')
  .description('Rename a preset')
  .action(guarded(presetsRenameCommand));

presets
  .command('import <file>')
  .description('Import presets from a file')
  .option('--overwrite', 'Replace presets with the same name instead of numbering them')
  .action(guarded(presetsImportCommand));

presets
  .command('export <file> [names...]')
  .description('Export presets (all by default) to a file')
  .action(guarded(presetsExportCommand));

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('vidbatch --help'), 'for available commands');
  }
  process.exit(err.exitCode === 0 ? 0 : 1);
});

// Parse and execute
loadEnvFile();
await program.parseAsync();
