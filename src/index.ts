// Converter
export { Converter, convert, sanitizeOutputPrefix, classOutputNames } from './converter.js';
export type { ConverterOptions } from './converter.js';

// Manifest joiner
export { ManifestJoiner, renderJoinedManifest, writeJoinedManifest, PATH_COLUMN } from './joiner.js';
export type { ManifestJoinerOptions } from './joiner.js';
export { ManifestTable, sampleKey, SUBJECT_ID_COLUMN, IMAGE_ID_COLUMN } from './internal/manifest-table.js';

// Building blocks
export { polygonArea, encodePolygon, parsePolygon } from './internal/polygon.js';
export { distinctClasses, partitionByClass } from './internal/class-partition.js';
export { FEATURE_COLUMNS, toFeatureRow, renderFeaturesCsv, writeFeaturesCsv } from './internal/feature-rows.js';
export { buildSlideMetadata, renderSlideMetadata, writeSlideMetadata } from './internal/slide-metadata.js';
export {
  detectCompression,
  decodePredictionBytes,
  parsePredictionDocument,
  loadPredictionDocument,
} from './internal/prediction-document.js';
export type { Compression } from './internal/prediction-document.js';
export { TiffSlideReader, readTiffSlideProperties } from './internal/tiff-slide-reader.js';

// Ambient
export { createLogger, consoleSink, silentLogger } from './internal/logger.js';
export type { Logger, LogLevel, LogSink } from './internal/logger.js';
export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
export * from './errors.js';

// Types
export type {
  ContourPoint,
  Detection,
  PredictionDocument,
  FeatureRow,
  SlideProperties,
  SlideReader,
  AnalysisIdentifiers,
  SlideMetadata,
  ConvertInput,
  ClassOutput,
  ConversionResult,
  ManifestRow,
  JoinResult,
} from './types.js';
