// Console output and prompt helpers shared by the CLI scripts

import * as clack from '@clack/prompts';
import chalk from 'chalk';

export function logInfo(message: string): void {
  clack.log.info(message);
}

export function logSuccess(message: string): void {
  clack.log.success(chalk.green(message));
}

export function logWarning(message: string): void {
  clack.log.warn(chalk.yellow(message));
}

export function logError(message: string): void {
  clack.log.error(chalk.red(message));
}

/**
 * Throw when the user cancelled a clack prompt (Ctrl+C)
 */
export function ensureAnswered<T>(value: T | symbol, what = 'Configuration'): T {
  if (clack.isCancel(value)) {
    throw new Error(`${what} cancelled`);
  }
  return value;
}
