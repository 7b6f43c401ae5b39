import chalk from 'chalk';
import { DuplicateKeyError, ImmutableResourceError, isResourceModelError } from '@culturegrid/core';
import { EXIT_CODES } from './exit-codes.js';

export class CliError extends Error {
  constructor(message: string, public exitCode: number = EXIT_CODES.ERROR) {
    super(message);
    this.name = 'CliError';
  }
}

/**
 * Map structural model failures to CLI errors carrying their exit codes.
 * Anything else is returned untouched.
 */
export function toCliError(error: unknown, context: string): unknown {
  if (error instanceof DuplicateKeyError) {
    return new CliError(`${context}: ${error.message}`, EXIT_CODES.DUPLICATE_KEY);
  }
  if (error instanceof ImmutableResourceError) {
    return new CliError(`${context}: ${error.message}`, EXIT_CODES.IMMUTABLE);
  }
  if (isResourceModelError(error)) {
    return new CliError(`${context}: ${error.message}`);
  }
  return error;
}

type MaybePromise<T> = T | Promise<T>;

export function withErrorHandling<A extends unknown[], R>(
  action: (...args: A) => MaybePromise<R>
): (...args: A) => Promise<R | undefined> {
  return async (...args: A): Promise<R | undefined> => {
    try {
      return await action(...args);
    } catch (error) {
      if (error instanceof CliError) {
        console.error(chalk.red(error.message));
        process.exitCode = error.exitCode;
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
