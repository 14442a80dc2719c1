import { join } from 'node:path';
import type { ClassOutput, ConversionResult, ConvertInput, SlideReader } from './types.js';
import type { Logger } from './internal/logger.js';
import { silentLogger } from './internal/logger.js';
import { loadPredictionDocument } from './internal/prediction-document.js';
import { partitionByClass } from './internal/class-partition.js';
import { writeFeaturesCsv } from './internal/feature-rows.js';
import { buildSlideMetadata, writeSlideMetadata } from './internal/slide-metadata.js';
import { TiffSlideReader } from './internal/tiff-slide-reader.js';

/** Characters removed from output prefixes. */
const UNSAFE_PREFIX_CHARS = /[\\/:*?"<>|]/g;

/** Optional collaborators, set on the Converter constructor. */
export interface ConverterOptions {
  /** Source of slide dimensions and MPP. Default: TiffSlideReader. */
  slideReader?: SlideReader;
  /** Progress logger. Default: silent. */
  logger?: Logger;
}

/** Strip characters that would break output file names. */
export function sanitizeOutputPrefix(prefix: string): string {
  return prefix.replace(UNSAFE_PREFIX_CHARS, '');
}

/** File names written for one class. */
export function classOutputNames(prefix: string, classId: number): { features: string; metadata: string } {
  const classPrefix = `${prefix}_type${classId}`;
  return {
    features: `${classPrefix}-features.csv`,
    metadata: `${classPrefix}-algmeta.json`,
  };
}

/** Converts one prediction document into per-class QuIP features and metadata. */
export class Converter {
  private readonly slideReader: SlideReader;
  private readonly logger: Logger;

  constructor(options: ConverterOptions = {}) {
    this.slideReader = options.slideReader ?? new TiffSlideReader();
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Run the conversion. Any failure aborts the run; files written for
   * earlier classes are left in place.
   */
  convert(input: ConvertInput): ConversionResult {
    const log = this.logger;
    const prefix = sanitizeOutputPrefix(input.outputFilePrefix);
    const outputDir = input.outputDir ?? process.cwd();

    log.info(`Reading input JSON file ${input.inputPath}`);
    const { detections } = loadPredictionDocument(input.inputPath);
    log.info(`Found ${detections.length.toLocaleString('en-US')} predicted polygons`);

    const groups = partitionByClass(detections);
    const classes = [...groups.keys()];
    log.info(`Found ${classes.length} predicted classes: ${classes.join(', ')}`);

    log.info(`Opening slide: ${input.slidePath}`);
    const slide = this.slideReader.open(input.slidePath);

    // Same record for every class; built up front so an MPP mismatch fails before any write.
    const metadata = buildSlideMetadata(slide, {
      subjectId: input.subjectId,
      caseId: input.caseId,
      analysisId: input.analysisId,
      analysisDesc: input.analysisDesc,
      outFilePrefix: prefix,
    });

    const outputs: ClassOutput[] = [];
    for (const [classId, members] of groups) {
      log.info(`Working on nuclear prediction type ${classId}`);
      const names = classOutputNames(prefix, classId);

      const featuresPath = join(outputDir, names.features);
      log.info(`Writing features to ${featuresPath}`);
      const rowCount = writeFeaturesCsv(featuresPath, members);

      const metadataPath = join(outputDir, names.metadata);
      log.info(`Writing manifest to ${metadataPath}`);
      writeSlideMetadata(metadataPath, metadata);

      outputs.push({ classId, rowCount, featuresPath, metadataPath });
    }

    log.info('Finished');
    return { detectionCount: detections.length, classes, outputs, metadata };
  }
}

/** Convert with the default slide reader. For repeated use, prefer creating a Converter instance. */
export function convert(input: ConvertInput): ConversionResult {
  return new Converter().convert(input);
}
