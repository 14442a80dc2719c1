/** A 2D vertex as `[x, y]`, in slide pixel coordinates. */
export type ContourPoint = [number, number];

/** One predicted nucleus. */
export interface Detection {
  /** Id of the detection in the source document's `nuc` mapping. */
  id: string;
  /** Ordered boundary vertices. The polygon is implicitly closed. */
  contour: ContourPoint[];
  /** Predicted class id. */
  type: number;
}

/** A parsed prediction document. Detections keep the source iteration order. */
export interface PredictionDocument {
  detections: Detection[];
}

/** One line of a `-features.csv` table. */
export interface FeatureRow {
  AreaInPixels: number;
  /**
   * Same value as AreaInPixels. No physical-unit conversion is applied;
   * downstream importers expect the duplicate.
   */
  PhysicalSize: number;
  ClassId: number;
  /** Flattened contour, `[x0:y0:x1:y1:...]`. */
  Polygon: string;
}

/** The slide properties the metadata builder consumes. */
export interface SlideProperties {
  /** Level-0 width in pixels. */
  width: number;
  /** Level-0 height in pixels. */
  height: number;
  /** Microns per pixel along X, as the slide's property text (e.g. `"0.4990"`). */
  mppX: string;
  /** Microns per pixel along Y, as the slide's property text. */
  mppY: string;
}

/** Reads slide properties from a whole-slide image file. */
export interface SlideReader {
  open(path: string): SlideProperties;
}

/** Identifiers the caller attaches to every metadata document. */
export interface AnalysisIdentifiers {
  subjectId: string;
  caseId: string;
  analysisId: string;
  /** Shown in the viewer. Defaults to analysisId. */
  analysisDesc?: string;
  /** Prefix shared by the run's output files, without the `_type{N}` suffix. */
  outFilePrefix: string;
}

/** Contents of an `-algmeta.json` file. */
export interface SlideMetadata {
  input_type: 'wsi';
  otsu_ratio: number;
  curvature_weight: number;
  min_size: number;
  max_size: number;
  ms_kernel: number;
  declump_type: number;
  levelset_num_iters: number;
  /** The slide's MPP property text, unparsed. */
  mpp: string;
  image_width: number;
  image_height: number;
  tile_minx: number;
  tile_miny: number;
  tile_width: number;
  tile_height: number;
  patch_minx: number;
  patch_miny: number;
  patch_width: number;
  patch_height: number;
  output_level: 'mask';
  out_file_prefix: string;
  subject_id: string;
  case_id: string;
  analysis_id: string;
  analysis_desc: string;
}

/** Single object passed to Converter.convert(). */
export interface ConvertInput extends Omit<AnalysisIdentifiers, 'outFilePrefix'> {
  /** Prediction JSON, plain or gzip-compressed. */
  inputPath: string;
  /** Whole-slide image handed to the SlideReader. */
  slidePath: string;
  /** Output file prefix. Characters `\ / : * ? " < > |` are removed. */
  outputFilePrefix: string;
  /** Directory the files are written to. Default: process.cwd(). */
  outputDir?: string;
}

/** Files written for one class. */
export interface ClassOutput {
  classId: number;
  rowCount: number;
  featuresPath: string;
  metadataPath: string;
}

/** The result returned by Converter.convert(). */
export interface ConversionResult {
  detectionCount: number;
  /** Distinct classes, ascending. */
  classes: number[];
  outputs: ClassOutput[];
  metadata: SlideMetadata;
}

/** One joined row: reference-manifest columns, then `path`. */
export type ManifestRow = Record<string, string>;

/** The result returned by ManifestJoiner.join(). */
export interface JoinResult {
  /** Output column order. */
  columns: string[];
  rows: ManifestRow[];
  /** Sample directories processed, in processing order. */
  samples: string[];
  /** Sample directories absent from the reference manifest. */
  skipped: string[];
}
