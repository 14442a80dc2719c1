import { statSync } from 'node:fs';
import type { SlideReader } from '../types.js';
import { ConfigError, UsageError } from '../errors.js';
import { loadConfig } from '../config.js';
import { Converter } from '../converter.js';
import { consoleSink, createLogger } from '../internal/logger.js';
import type { LogLevel } from '../internal/logger.js';
import type { CliOptions } from './args.js';
import {
  EXIT_FAILURE, EXIT_OK, EXIT_USAGE,
  reportUsageError, requireExists, requirePresent, requireValue, splitInlineValues,
} from './args.js';

export const CONVERT_PROGRAM = 'convert-to-quip';

export const CONVERT_USAGE = `
Usage: ${CONVERT_PROGRAM} --slide <path> --subject-id <id> --case-id <id> --analysis-id <id>
                       [--analysis-desc <text>] [--output-dir <dir>]
                       <input_json> <output_file_prefix>

Convert nuclear-segmentation predictions to QuIP features and metadata.
Writes {prefix}_type{N}-features.csv and {prefix}_type{N}-algmeta.json
for every predicted class N.

Arguments:
  input_json                Prediction JSON, plain or gzip-compressed
  output_file_prefix        Prefix of output files (\\ / : * ? " < > | are removed)

Options:
      --slide <path>        Whole-slide image
      --subject-id <id>     Subject ID
      --case-id <id>        Case ID
      --analysis-id <id>    Analysis ID
      --analysis-desc <txt> Analysis description (default: the analysis ID)
      --output-dir <dir>    Directory to write into (default: current directory)
  -h, --help                Show help
`.trim();

export interface ConvertArgs {
  slide: string;
  subjectId: string;
  caseId: string;
  analysisId: string;
  analysisDesc?: string;
  outputDir?: string;
  inputJson: string;
  outputFilePrefix: string;
}

export interface ConvertCliOptions extends CliOptions {
  /** Slide reader handed to the Converter. */
  slideReader?: SlideReader;
}

/** Parse converter arguments. Returns null when help was requested. */
export function parseConvertArgs(argv: string[]): ConvertArgs | null {
  const args = splitInlineValues(argv);
  let slide: string | undefined;
  let subjectId: string | undefined;
  let caseId: string | undefined;
  let analysisId: string | undefined;
  let analysisDesc: string | undefined;
  let outputDir: string | undefined;
  const positionalArgs: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '-h':
      case '--help':
        return null;
      case '--slide':
        slide = requireValue(args, i, arg);
        i++;
        break;
      case '--subject-id':
        subjectId = requireValue(args, i, arg);
        i++;
        break;
      case '--case-id':
        caseId = requireValue(args, i, arg);
        i++;
        break;
      case '--analysis-id':
        analysisId = requireValue(args, i, arg);
        i++;
        break;
      case '--analysis-desc':
        analysisDesc = requireValue(args, i, arg);
        i++;
        break;
      case '--output-dir':
        outputDir = requireValue(args, i, arg);
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
    slide: requirePresent(slide, '--slide'),
    subjectId: requirePresent(subjectId, '--subject-id'),
    caseId: requirePresent(caseId, '--case-id'),
    analysisId: requirePresent(analysisId, '--analysis-id'),
    analysisDesc,
    outputDir,
    inputJson: requirePresent(positionalArgs[0], 'input_json'),
    outputFilePrefix: requirePresent(positionalArgs[1], 'output_file_prefix'),
  };
}

/** Run the converter CLI and return its exit status. */
export function runConvert(argv: string[], options: ConvertCliOptions = {}): number {
  const sink = options.sink ?? consoleSink;

  let args: ConvertArgs | null;
  let logLevel: LogLevel;
  try {
    logLevel = loadConfig(options.env).logLevel;
    args = parseConvertArgs(argv);
    if (args) {
      requireExists(args.inputJson, 'input JSON file');
      requireExists(args.slide, 'slide file');
      if (args.outputDir !== undefined && !isDirectory(args.outputDir)) {
        throw new UsageError(`output directory not found: ${args.outputDir}`);
      }
    }
  } catch (err) {
    if (err instanceof UsageError) return reportUsageError(CONVERT_PROGRAM, CONVERT_USAGE, err, sink);
    if (err instanceof ConfigError) {
      sink.err(`${CONVERT_PROGRAM}: error: ${err.message}`);
      return EXIT_USAGE;
    }
    throw err;
  }

  if (!args) {
    sink.out(CONVERT_USAGE);
    return EXIT_OK;
  }

  const logger = createLogger(CONVERT_PROGRAM, logLevel, sink);
  const converter = new Converter({ slideReader: options.slideReader, logger });
  try {
    converter.convert({
      inputPath: args.inputJson,
      slidePath: args.slide,
      outputFilePrefix: args.outputFilePrefix,
      outputDir: args.outputDir,
      subjectId: args.subjectId,
      caseId: args.caseId,
      analysisId: args.analysisId,
      analysisDesc: args.analysisDesc,
    });
  } catch (err) {
    logger.error(err instanceof Error ? `${err.name}: ${err.message}` : String(err));
    return EXIT_FAILURE;
  }
  return EXIT_OK;
}

function isDirectory(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isDirectory() ?? false;
}
