import type { ContourPoint } from '../types.js';
import { PolygonFormatError } from '../errors.js';

/**
 * Area of a simple polygon using the shoelace formula.
 * The vertex list is treated as closed; orientation does not matter.
 */
export function polygonArea(contour: ContourPoint[]): number {
  if (contour.length < 3) return 0;

  let twiceArea = 0;
  for (let i = 0, j = contour.length - 1; i < contour.length; j = i++) {
    const [xi, yi] = contour[i];
    const [xj, yj] = contour[j];
    twiceArea += xj * yi - xi * yj;
  }
  return Math.abs(twiceArea) / 2;
}

/** Encode `[[0, 1], [2, 3]]` as `"[0:1:2:3]"`. */
export function encodePolygon(contour: ContourPoint[]): string {
  const coords = contour.map(([x, y]) => `${x}:${y}`).join(':');
  return `[${coords}]`;
}

/** Parse a string produced by encodePolygon() back into vertices. */
export function parsePolygon(text: string): ContourPoint[] {
  if (!text.startsWith('[') || !text.endsWith(']')) {
    throw new PolygonFormatError(`polygon must be wrapped in brackets: ${text}`);
  }

  const body = text.slice(1, -1);
  if (body === '') return [];

  const values = body.split(':').map(token => {
    const value = Number(token);
    if (token.trim() === '' || !Number.isFinite(value)) {
      throw new PolygonFormatError(`invalid coordinate "${token}" in ${text}`);
    }
    return value;
  });

  if (values.length % 2 !== 0) {
    throw new PolygonFormatError(`odd number of coordinates (${values.length}) in ${text}`);
  }

  const points: ContourPoint[] = [];
  for (let i = 0; i < values.length; i += 2) {
    points.push([values[i], values[i + 1]]);
  }
  return points;
}
