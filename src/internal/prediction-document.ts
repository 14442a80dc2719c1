import { readFileSync } from 'node:fs';
import { gunzipSync, strFromU8 } from 'fflate';
import { z } from 'zod';
import type { Detection, PredictionDocument } from '../types.js';
import { MalformedDetectionError, PredictionFormatError } from '../errors.js';

/** How a prediction file's bytes must be decoded. */
export type Compression = 'gzip' | 'none';

const GZIP_MAGIC = [0x1f, 0x8b] as const;

const DetectionSchema = z.object({
  contour: z.array(z.tuple([z.number(), z.number()])),
  type: z.number().int(),
});

const DocumentSchema = z.object({
  nuc: z.record(z.string(), z.unknown()),
});

/** Pick the decoder from the first two bytes, not the file name. */
export function detectCompression(bytes: Uint8Array): Compression {
  return bytes.length >= 2 && bytes[0] === GZIP_MAGIC[0] && bytes[1] === GZIP_MAGIC[1]
    ? 'gzip'
    : 'none';
}

/** Decompress if needed and decode as UTF-8. */
export function decodePredictionBytes(bytes: Uint8Array): string {
  if (detectCompression(bytes) === 'gzip') {
    try {
      return strFromU8(gunzipSync(bytes));
    } catch (err) {
      throw new PredictionFormatError('failed to decompress gzip prediction file', { cause: err });
    }
  }
  return strFromU8(bytes);
}

/** Validate one raw `nuc` entry. */
export function parseDetection(id: string, raw: unknown): Detection {
  const parsed = DetectionSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.length > 0 ? String(issue.path[0]) : '<record>';
    throw new MalformedDetectionError(id, field, issue.message);
  }
  return { id, contour: parsed.data.contour, type: parsed.data.type };
}

/**
 * Parse prediction JSON into typed detections, in object iteration order:
 * document order, except that integer-like ids come first, ascending.
 */
export function parsePredictionDocument(text: string): PredictionDocument {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new PredictionFormatError('prediction file is not valid JSON', { cause: err });
  }

  const document = DocumentSchema.safeParse(json);
  if (!document.success) {
    throw new PredictionFormatError('prediction file has no "nuc" object');
  }

  const detections = Object.entries(document.data.nuc).map(([id, raw]) => parseDetection(id, raw));
  return { detections };
}

/** Read a plain or gzip-compressed prediction file. */
export function loadPredictionDocument(path: string): PredictionDocument {
  return parsePredictionDocument(decodePredictionBytes(readFileSync(path)));
}
