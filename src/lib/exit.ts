/**
 * Exit codes and the last-resort error report for commands
 */

import type { Logger } from './logger.js';
import { RetriesExhaustedError } from '../services/retry.js';
import { AuthorizationError } from '../services/capture-server.js';

export const EXIT_CODES = {
  OK: 0,
  INVALID_INPUT: 1,
  API_ERROR: 2,
  AUTH_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof RetriesExhaustedError) {
    return EXIT_CODES.API_ERROR;
  }
  if (error instanceof AuthorizationError) {
    return EXIT_CODES.AUTH_ERROR;
  }
  // bad import file, bad config, empty token
  return EXIT_CODES.INVALID_INPUT;
}

/**
 * Log the cause as the final line and set the exit status.
 * stdout is left to drain, so the status is set rather than exiting.
 */
export function reportFatal(operation: string, error: unknown, logger: Logger): ExitCode {
  const code = exitCodeFor(error);
  logger.error(`${operation} failed`, error, { exitCode: code });
  process.exitCode = code;
  return code;
}
