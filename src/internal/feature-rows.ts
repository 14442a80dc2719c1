import { writeFileSync } from 'node:fs';
import { stringify } from 'csv-stringify/sync';
import type { Detection, FeatureRow } from '../types.js';
import { polygonArea, encodePolygon } from './polygon.js';

/** Column order of every features table. */
export const FEATURE_COLUMNS = ['AreaInPixels', 'PhysicalSize', 'ClassId', 'Polygon'] as const;

/** Build the feature row for one detection. */
export function toFeatureRow(detection: Detection): FeatureRow {
  const area = polygonArea(detection.contour);
  return {
    AreaInPixels: area,
    PhysicalSize: area,
    ClassId: detection.type,
    Polygon: encodePolygon(detection.contour),
  };
}

/** Format a float column the way importers expect it: `1.0`, `12.5`. */
export function formatFloat(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

/**
 * Render the features CSV. With a classId only detections of that class are
 * written; without one, all of them are. Row order follows the input.
 */
export function renderFeaturesCsv(detections: Detection[], classId?: number): string {
  const records = selectClass(detections, classId).map(detection => {
    const row = toFeatureRow(detection);
    return {
      AreaInPixels: formatFloat(row.AreaInPixels),
      PhysicalSize: formatFloat(row.PhysicalSize),
      ClassId: String(row.ClassId),
      Polygon: row.Polygon,
    };
  });

  return stringify(records, {
    header: true,
    columns: [...FEATURE_COLUMNS],
    record_delimiter: 'windows',
  });
}

/** Write the features CSV and return the number of data rows. */
export function writeFeaturesCsv(outputPath: string, detections: Detection[], classId?: number): number {
  writeFileSync(outputPath, renderFeaturesCsv(detections, classId));
  return selectClass(detections, classId).length;
}

function selectClass(detections: Detection[], classId: number | undefined): Detection[] {
  return classId === undefined ? detections : detections.filter(d => d.type === classId);
}
