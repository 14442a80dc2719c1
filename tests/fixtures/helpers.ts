import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { ContourPoint, Detection, SlideProperties, SlideReader } from '../../src/types.js';
import type { LogSink } from '../../src/internal/logger.js';

/** A unit square, area 1. */
export const UNIT_SQUARE: ContourPoint[] = [[0, 0], [1, 0], [1, 1], [0, 1]];

/** Create a Detection. */
export function makeDetection(id: string, type: number, contour: ContourPoint[] = UNIT_SQUARE): Detection {
  return { id, type, contour };
}

/** Axis-aligned rectangle contour with its top-left corner at (x, y). */
export function makeRect(x: number, y: number, width: number, height: number): ContourPoint[] {
  return [[x, y], [x + width, y], [x + width, y + height], [x, y + height]];
}

/** Serialize detections as a prediction document, with the extra fields a real one carries. */
export function makePredictionJson(detections: Detection[]): string {
  const nuc: Record<string, unknown> = {};
  for (const d of detections) {
    nuc[d.id] = {
      bbox: [[0, 0], [1, 1]],
      centroid: [0.5, 0.5],
      contour: d.contour,
      type_prob: 0.9,
      type: d.type,
    };
  }
  return JSON.stringify({ mag: 40, nuc });
}

/** Slide reader returning fixed properties and remembering what it opened. */
export class FakeSlideReader implements SlideReader {
  readonly opened: string[] = [];

  constructor(private readonly properties: SlideProperties) {}

  open(path: string): SlideProperties {
    this.opened.push(path);
    return this.properties;
  }
}

export const ISOTROPIC_SLIDE: SlideProperties = { width: 4000, height: 3000, mppX: '0.25', mppY: '0.25' };

/** Log sink collecting lines instead of printing them. */
export class MemorySink implements LogSink {
  readonly stdout: string[] = [];
  readonly stderr: string[] = [];

  out(line: string): void {
    this.stdout.push(line);
  }

  err(line: string): void {
    this.stderr.push(line);
  }
}

/** Temporary directory, removed by the returned cleanup function. */
export function makeTempDir(): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), 'quip-test-'));
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

export function writeFile(dir: string, name: string, contents: string | Uint8Array): string {
  const path = join(dir, name);
  writeFileSync(path, contents);
  return path;
}

/** One TIFF directory entry for buildTiff(). */
export type TiffEntry =
  | { tag: number; type: 'short' | 'long'; value: number }
  | { tag: number; type: 'ascii'; value: string }
  | { tag: number; type: 'rational'; value: [number, number] };

const TYPE_CODES = { ascii: 2, short: 3, long: 4, rational: 5 } as const;

/** Build a little-endian TIFF holding a single image directory and no pixel data. */
export function buildTiff(entries: TiffEntry[]): Uint8Array {
  const sorted = [...entries].sort((a, b) => a.tag - b.tag);
  const ifdOffset = 8;
  const dataStart = ifdOffset + 2 + sorted.length * 12 + 4;

  const payloads = sorted.map(entryPayload);
  const dataLength = payloads.reduce((sum, p) => sum + (p.length > 4 ? p.length + (p.length % 2) : 0), 0);

  const buffer = new ArrayBuffer(dataStart + dataLength);
  const view = new DataView(buffer);
  const bytes = new Uint8Array(buffer);

  bytes[0] = 0x49;
  bytes[1] = 0x49;
  view.setUint16(2, 42, true);
  view.setUint32(4, ifdOffset, true);
  view.setUint16(ifdOffset, sorted.length, true);

  let dataOffset = dataStart;
  sorted.forEach((entry, i) => {
    const at = ifdOffset + 2 + i * 12;
    const payload = payloads[i];
    view.setUint16(at, entry.tag, true);
    view.setUint16(at + 2, TYPE_CODES[entry.type], true);
    view.setUint32(at + 4, entryCount(entry), true);
    if (payload.length <= 4) {
      bytes.set(payload, at + 8);
    } else {
      view.setUint32(at + 8, dataOffset, true);
      bytes.set(payload, dataOffset);
      dataOffset += payload.length + (payload.length % 2);
    }
  });
  view.setUint32(ifdOffset + 2 + sorted.length * 12, 0, true);

  return bytes;
}

function entryCount(entry: TiffEntry): number {
  return entry.type === 'ascii' ? entry.value.length + 1 : 1;
}

function entryPayload(entry: TiffEntry): Uint8Array {
  switch (entry.type) {
    case 'short': {
      const out = new Uint8Array(2);
      new DataView(out.buffer).setUint16(0, entry.value, true);
      return out;
    }
    case 'long': {
      const out = new Uint8Array(4);
      new DataView(out.buffer).setUint32(0, entry.value, true);
      return out;
    }
    case 'rational': {
      const out = new Uint8Array(8);
      const view = new DataView(out.buffer);
      view.setUint32(0, entry.value[0], true);
      view.setUint32(4, entry.value[1], true);
      return out;
    }
    case 'ascii': {
      const out = new Uint8Array(entry.value.length + 1);
      for (let i = 0; i < entry.value.length; i++) out[i] = entry.value.charCodeAt(i);
      return out;
    }
  }
}
