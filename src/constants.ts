/**
 * Application-wide constants.
 */

export const VERSION = '0.5.0';

/**
 * Name of the pointer to the real implementation used by delegation statements.
 */
export const DEFAULT_REAL_INSTANCE_NAME = 'real';

/**
 * googletest matcher accepting any argument.
 */
export const MATCH_ANY_PLACEHOLDER = '_';

/**
 * CLI exit codes
 */
export const EXIT_CODE = {
  SUCCESS: 0,
  FAILURE: 1,
  USAGE: 2
} as const;

/**
 * Path standing for the process standard streams.
 */
export const STDIO_PATH = '-';
