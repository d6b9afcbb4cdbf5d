/**
 * Option parsing shared by commands
 */

import { Command, InvalidArgumentError } from 'commander';
import type { LogFormat } from '../lib/logger.js';
import { isOutputFormat, type OutputFormat } from '../utils/output.js';

export interface GlobalOptions {
  format?: OutputFormat;
  logFormat?: LogFormat;
  quiet: boolean;
  verbose: boolean;
}

/**
 * commander parser for `--auth-timeout <seconds>`
 */
export function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError('Expected a positive number of seconds.');
  }
  return seconds;
}

/**
 * Typed view of the options set on the root command
 */
export function readGlobalOptions(command: Command): GlobalOptions {
  const opts: Record<string, unknown> = command.optsWithGlobals();
  const format = typeof opts.format === 'string' && isOutputFormat(opts.format) ? opts.format : undefined;
  const logFormat: LogFormat | undefined =
    opts.logFormat === 'json' || opts.logFormat === 'text' ? opts.logFormat : undefined;

  return {
    format,
    logFormat,
    quiet: opts.quiet === true,
    verbose: opts.verbose === true,
  };
}
