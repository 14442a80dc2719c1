/** Base class for every error raised by this package. */
export class QuipExportError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A command-line argument or input precondition was not met. */
export class UsageError extends QuipExportError {}

/** An environment variable holds a value the configuration schema rejects. */
export class ConfigError extends QuipExportError {}

/** The prediction document is not JSON or lacks the `nuc` mapping. */
export class PredictionFormatError extends QuipExportError {}

/** A single detection is missing `contour` or `type`, or holds the wrong shape. */
export class MalformedDetectionError extends QuipExportError {
  readonly detectionId: string;
  readonly field: string;

  constructor(detectionId: string, field: string, detail: string) {
    super(`detection ${detectionId}: invalid "${field}" (${detail})`);
    this.detectionId = detectionId;
    this.field = field;
  }
}

/** The slide's X and Y microns-per-pixel differ. */
export class MppMismatchError extends QuipExportError {
  readonly mppX: string;
  readonly mppY: string;

  constructor(mppX: string, mppY: string) {
    super(`mppx not equal to mppy: ${mppX} != ${mppY}`);
    this.mppX = mppX;
    this.mppY = mppY;
  }
}

/** The slide could not be read, or lacks dimensions or MPP. */
export class SlidePropertyError extends QuipExportError {}

/** A polygon string is not of the form `[x0:y0:x1:y1:...]`. */
export class PolygonFormatError extends QuipExportError {}

/** The reference manifest is not a CSV with the key columns. */
export class ManifestFormatError extends QuipExportError {}

/** A manifest join produced no rows. */
export class EmptyManifestError extends QuipExportError {}
