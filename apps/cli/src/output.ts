/**
 * chalk-based status output. Documents go to stdout; everything printed
 * here goes to stderr so it never mixes into a piped document.
 */

import chalk from 'chalk';

export function success(message: string): void {
  console.error(chalk.green(message));
}

export function error(message: string): void {
  console.error(chalk.red(message));
}
