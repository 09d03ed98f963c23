/**
 * Interactive yes/no question on the terminal
 */

import chalk from 'chalk';
import { createInterface } from 'node:readline';

export function canPrompt(): boolean {
  return Boolean(process.stdin.isTTY);
}

export async function askYesNo(question: string): Promise<boolean> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stderr,
  });

  const answer = await new Promise<string>((resolve) => {
    rl.question(chalk.yellow(`${question} [y/N] `), (reply) => {
      rl.close();
      resolve(reply);
    });
  });

  return /^y(es)?$/i.test(answer.trim());
}
