// packages/cli/src/utils.ts

import { ExecutionError, errorMessage } from '@blockflow/core';
import chalk from 'chalk';

/** Print a failed command's error in red and mark the process as failed. */
export function reportError(error: unknown): void {
  console.error(chalk.red(`Error: ${errorMessage(error)}`));
  if (error instanceof ExecutionError && error.stderr.trim() !== '') {
    console.error(chalk.gray(error.stderr.trimEnd()));
  }
  process.exitCode = 1;
}

export function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value) || Number.parseInt(value, 10) <= 0) {
    throw new Error(`expected a positive integer, got "${value}"`);
  }
  return Number.parseInt(value, 10);
}
