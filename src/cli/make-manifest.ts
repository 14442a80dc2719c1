import { statSync } from 'node:fs';
import { ConfigError, UsageError } from '../errors.js';
import { loadConfig } from '../config.js';
import { ManifestJoiner, writeJoinedManifest } from '../joiner.js';
import { ManifestTable } from '../internal/manifest-table.js';
import { consoleSink, createLogger } from '../internal/logger.js';
import type { LogLevel } from '../internal/logger.js';
import type { CliOptions } from './args.js';
import {
  EXIT_FAILURE, EXIT_OK, EXIT_USAGE,
  reportUsageError, requireExists, requirePresent, requireValue, splitInlineValues,
} from './args.js';

export const MANIFEST_PROGRAM = 'make-quip-manifest';

export const MANIFEST_USAGE = `
Usage: ${MANIFEST_PROGRAM} --reference-manifest <csv> <input> <output>

Generate a manifest CSV for a directory of QuIP features. The input directory
holds one {subjectId}-{caseId} subdirectory per sample, as written by
convert-to-quip.

Arguments:
  input                          Top-level directory of QuIP outputs
  output                         Path of the output CSV

Options:
      --reference-manifest <csv> Clinical-trial manifest with clinicaltrialsubjectid
                                 and imageid columns (alias: --tcga-manifest)
  -h, --help                     Show help
`.trim();

export interface ManifestArgs {
  input: string;
  output: string;
  referenceManifest: string;
}

/** Parse joiner arguments. Returns null when help was requested. */
export function parseManifestArgs(argv: string[]): ManifestArgs | null {
  const args = splitInlineValues(argv);
  let referenceManifest: string | undefined;
  const positionalArgs: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '-h':
      case '--help':
        return null;
      case '--reference-manifest':
      case '--tcga-manifest':
        referenceManifest = requireValue(args, i, arg);
        i++;
        break;
      default:
        if (arg.startsWith('-') && arg !== '-') {
          throw new UsageError(`unrecognized argument: ${arg}`);
        }
        positionalArgs.push(arg);
    }
  }

  if (positionalArgs.length > 2) {
    throw new UsageError(`unrecognized arguments: ${positionalArgs.slice(2).join(' ')}`);
  }

  return {
    input: requirePresent(positionalArgs[0], 'input'),
    output: requirePresent(positionalArgs[1], 'output'),
    referenceManifest: requirePresent(referenceManifest, '--reference-manifest'),
  };
}

/** Run the joiner CLI and return its exit status. */
export function runMakeManifest(argv: string[], options: CliOptions = {}): number {
  const sink = options.sink ?? consoleSink;

  let args: ManifestArgs | null;
  let logLevel: LogLevel;
  try {
    logLevel = loadConfig(options.env).logLevel;
    args = parseManifestArgs(argv);
    if (args) {
      requireExists(args.input, 'input');
      if (!statSync(args.input).isDirectory()) {
        throw new UsageError(`input is not a directory: ${args.input}`);
      }
      requireExists(args.referenceManifest, 'reference manifest file');
    }
  } catch (err) {
    if (err instanceof UsageError) return reportUsageError(MANIFEST_PROGRAM, MANIFEST_USAGE, err, sink);
    if (err instanceof ConfigError) {
      sink.err(`${MANIFEST_PROGRAM}: error: ${err.message}`);
      return EXIT_USAGE;
    }
    throw err;
  }

  if (!args) {
    sink.out(MANIFEST_USAGE);
    return EXIT_OK;
  }

  const logger = createLogger(MANIFEST_PROGRAM, logLevel, sink);
  try {
    const reference = ManifestTable.load(args.referenceManifest, logger);
    const result = new ManifestJoiner(reference, { logger }).join(args.input);

    if (result.rows.length === 0) {
      logger.error('No rows found... exiting');
      return EXIT_FAILURE;
    }

    logger.info(`Writing manifest to ${args.output}`);
    writeJoinedManifest(result, args.output);
  } catch (err) {
    logger.error(err instanceof Error ? `${err.name}: ${err.message}` : String(err));
    return EXIT_FAILURE;
  }
  return EXIT_OK;
}
