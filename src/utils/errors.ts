import { EXIT_CODE } from '../constants.js';

/**
 * Error thrown for bad command-line input: missing or unreadable arguments,
 * unknown options, invalid option values.
 */
export class UsageError extends Error {
  readonly exitCode = EXIT_CODE.USAGE;

  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function isUsageError(error: unknown): error is UsageError {
  return error instanceof UsageError;
}
