import chalk from 'chalk';
import { CatalogParseError, ConfigError, ReconcileError } from '@parlance/core';
import { EXIT_CODES } from './exit-codes.js';

export class CliError extends Error {
  constructor(message: string, public exitCode: number = EXIT_CODES.ERROR) {
    super(message);
    this.name = 'CliError';
  }
}

type MaybePromise<T> = T | Promise<T>;

/** Maps errors raised by the core onto CLI errors with their exit code. */
export function toCliError(error: unknown): CliError | undefined {
  if (error instanceof CliError) {
    return error;
  }
  if (error instanceof ConfigError) {
    return new CliError(error.message, EXIT_CODES.CONFIG);
  }
  if (error instanceof ReconcileError) {
    return new CliError(error.message, EXIT_CODES.CONFLICT);
  }
  if (error instanceof CatalogParseError) {
    return new CliError(error.message, EXIT_CODES.ERROR);
  }
  return undefined;
}

export function withErrorHandling<A extends unknown[], R>(
  action: (...args: A) => MaybePromise<R>
): (...args: A) => Promise<Awaited<R> | undefined> {
  return async (...args: A): Promise<Awaited<R> | undefined> => {
    try {
      return await action(...args);
    } catch (error) {
      const cliError = toCliError(error);
      if (cliError) {
        console.error(chalk.red(cliError.message));
        process.exitCode = cliError.exitCode;
        return undefined;
      }

      const message = error instanceof Error ? error.message : String(error);
      console.error(chalk.red(`Unexpected error: ${message}`));
      if (error instanceof Error && error.stack) {
        console.error(chalk.gray(error.stack));
      }
      process.exitCode = EXIT_CODES.ERROR;
      return undefined;
    }
  };
}
