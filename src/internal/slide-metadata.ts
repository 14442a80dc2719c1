import { writeFileSync } from 'node:fs';
import type { AnalysisIdentifiers, SlideMetadata, SlideProperties } from '../types.js';
import { MppMismatchError } from '../errors.js';

/**
 * Build the `-algmeta.json` record. Predictions cover the whole slide, so the
 * slide is described as a single tile and patch; the segmentation parameters
 * are fixed placeholders.
 */
export function buildSlideMetadata(slide: SlideProperties, ids: AnalysisIdentifiers): SlideMetadata {
  if (slide.mppX !== slide.mppY) {
    throw new MppMismatchError(slide.mppX, slide.mppY);
  }

  const { width, height } = slide;
  return {
    input_type: 'wsi',
    otsu_ratio: 0.0,
    curvature_weight: 0.0,
    min_size: 0,
    max_size: 0,
    ms_kernel: 0,
    declump_type: 0,
    levelset_num_iters: 0,
    mpp: slide.mppX,
    image_width: width,
    image_height: height,
    tile_minx: 0,
    tile_miny: 0,
    tile_width: width,
    tile_height: height,
    patch_minx: 0,
    patch_miny: 0,
    patch_width: width,
    patch_height: height,
    output_level: 'mask',
    // Un-suffixed on purpose: the per-class files add `_type{N}` to it.
    out_file_prefix: ids.outFilePrefix,
    subject_id: ids.subjectId,
    case_id: ids.caseId,
    // Label of the layer toggle in the viewer.
    analysis_id: ids.analysisId,
    analysis_desc: ids.analysisDesc || ids.analysisId,
  };
}

/** Serialize metadata as compact JSON. */
export function renderSlideMetadata(metadata: SlideMetadata): string {
  return JSON.stringify(metadata);
}

export function writeSlideMetadata(outputPath: string, metadata: SlideMetadata): void {
  writeFileSync(outputPath, renderSlideMetadata(metadata));
}
