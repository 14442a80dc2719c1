import type { Detection } from '../types.js';

/** Distinct class ids present in the detections, ascending. */
export function distinctClasses(detections: Detection[]): number[] {
  const classes = new Set<number>();
  for (const detection of detections) {
    classes.add(detection.type);
  }
  return [...classes].sort((a, b) => a - b);
}

/**
 * Group detections by class. Every detection lands in exactly one group, and
 * each group keeps the source order. Groups are keyed in ascending class order.
 */
export function partitionByClass(detections: Detection[]): Map<number, Detection[]> {
  const groups = new Map<number, Detection[]>();
  for (const classId of distinctClasses(detections)) {
    groups.set(classId, []);
  }

  for (const detection of detections) {
    const group = groups.get(detection.type);
    if (group) group.push(detection);
  }

  return groups;
}
