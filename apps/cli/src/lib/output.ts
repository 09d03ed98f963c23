/**
 * Output Formatter
 * 
 * Consistent CLI output formatting. Human output goes to stdout, problems
 * to stderr.
 */

import chalk from 'chalk';
import { isVidbatchError, OptionConflictError } from '@vidbatch/core';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}

/**
 * Report any thrown value the way every command does
 */
export function printFailure(error: unknown): void {
  if (error instanceof OptionConflictError) {
    printError('Conflicting options:');
    for (const conflict of error.conflicts) {
      console.error(`  ${chalk.gray('-')} ${conflict}`);
    }
    return;
  }
  if (isVidbatchError(error)) {
    printError(error.message);
    return;
  }
  printError(error instanceof Error ? error.message : 'Unknown error');
}
