import { existsSync } from 'node:fs';
import { UsageError } from '../errors.js';
import type { LogSink } from '../internal/logger.js';
import { consoleSink } from '../internal/logger.js';

/** Shared options of the command-line entry points. */
export interface CliOptions {
  /** Environment to read configuration from. Default: process.env. */
  env?: NodeJS.ProcessEnv;
  /** Where log lines and usage text go. Default: the console. */
  sink?: LogSink;
}

/** Exit statuses of the command-line tools. */
export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/** Rewrite `--flag=value` as `--flag value`. Only the first `=` splits. */
export function splitInlineValues(args: string[]): string[] {
  return args.flatMap(arg => {
    const eq = arg.indexOf('=');
    return arg.startsWith('--') && eq > 2 ? [arg.slice(0, eq), arg.slice(eq + 1)] : [arg];
  });
}

/** Value following a flag. */
export function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`missing value for ${flag}`);
  }
  return value;
}

export function requirePresent<T>(value: T | undefined, what: string): T {
  if (value === undefined) {
    throw new UsageError(`the following argument is required: ${what}`);
  }
  return value;
}

export function requireExists(path: string, what: string): void {
  if (!existsSync(path)) {
    throw new UsageError(`${what} not found: ${path}`);
  }
}

/** Print a usage error the way the tools report it, and return the usage exit status. */
export function reportUsageError(program: string, usage: string, err: UsageError, sink: LogSink = consoleSink): number {
  sink.err(usage);
  sink.err(`${program}: error: ${err.message}`);
  return EXIT_USAGE;
}
