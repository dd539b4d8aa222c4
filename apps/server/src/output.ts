/**
 * chalk-based console output for the CLI.
 */

import chalk from 'chalk';

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function info(message: string): void {
  console.log(chalk.dim(message));
}

export function error(message: string): void {
  console.error(chalk.red(message));
}

export function formatAddress(host: string, port: number): string {
  const shown = host === '0.0.0.0' || host === '::' ? 'localhost' : host;
  return chalk.bold(`http://${shown}:${port}`);
}
