/**
 * CLI helpers: option parsing, error handling.
 */

import { InvalidArgumentError } from 'commander';
import * as out from './output.js';

/** commander argParser for --port */
export function parsePort(value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 0 and 65535.');
  }
  return port;
}

/**
 * Wrap an async command action: report the error and exit non-zero.
 */
export function withErrorHandling<A extends unknown[]>(fn: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (err: unknown) {
      out.error(err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    }
  };
}
