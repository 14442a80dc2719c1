import { closeSync, openSync, readSync } from 'node:fs';
import type { SlideProperties, SlideReader } from '../types.js';
import { SlidePropertyError } from '../errors.js';

const TAG_IMAGE_WIDTH = 256;
const TAG_IMAGE_LENGTH = 257;
const TAG_IMAGE_DESCRIPTION = 270;
const TAG_X_RESOLUTION = 282;
const TAG_Y_RESOLUTION = 283;
const TAG_RESOLUTION_UNIT = 296;

const WANTED_TAGS = new Set([
  TAG_IMAGE_WIDTH,
  TAG_IMAGE_LENGTH,
  TAG_IMAGE_DESCRIPTION,
  TAG_X_RESOLUTION,
  TAG_Y_RESOLUTION,
  TAG_RESOLUTION_UNIT,
]);

const TYPE_ASCII = 2;
const TYPE_SHORT = 3;
const TYPE_LONG = 4;
const TYPE_RATIONAL = 5;
const TYPE_LONG8 = 16;

const TYPE_SIZES: Record<number, number> = {
  1: 1, 2: 1, 3: 2, 4: 4, 5: 8, 6: 1, 7: 1, 8: 2, 9: 4, 10: 8, 11: 4, 12: 8, 16: 8, 17: 8, 18: 8,
};

const RESOLUTION_UNIT_INCH = 2;
const RESOLUTION_UNIT_CENTIMETER = 3;
const MICRONS_PER_INCH = 25400;
const MICRONS_PER_CENTIMETER = 10000;

const APERIO_MPP = /\|\s*MPP\s*=\s*([0-9]*\.?[0-9]+(?:[eE][-+]?[0-9]+)?)/;

/** Positional reads over a slide's bytes. May return fewer bytes at end of input. */
interface ByteSource {
  read(position: number, length: number): Uint8Array;
}

/** Layout of a classic (`42`) or BigTIFF (`43`) file. */
interface TiffLayout {
  little: boolean;
  bigTiff: boolean;
  firstIfd: number;
}

type TagValue = number[] | string;

/**
 * Slide reader for TIFF-family whole-slide images (Aperio SVS, generic
 * pyramidal TIFF, BigTIFF). Only the first image directory, the
 * full-resolution level, is consulted, and only the bytes it references
 * are read from disk.
 */
export class TiffSlideReader implements SlideReader {
  open(path: string): SlideProperties {
    let fd: number;
    try {
      fd = openSync(path, 'r');
    } catch (err) {
      throw new SlidePropertyError(`cannot read slide ${path}`, { cause: err });
    }
    try {
      return readSlideProperties(fileSource(fd, path), path);
    } finally {
      closeSync(fd);
    }
  }
}

/** Extract dimensions and MPP from in-memory TIFF bytes. */
export function readTiffSlideProperties(bytes: Uint8Array, source = '<buffer>'): SlideProperties {
  return readSlideProperties(
    { read: (position, length) => bytes.subarray(position, position + length) },
    source,
  );
}

function fileSource(fd: number, path: string): ByteSource {
  return {
    read(position, length) {
      const buffer = new Uint8Array(length);
      let bytesRead: number;
      try {
        bytesRead = readSync(fd, buffer, 0, length, position);
      } catch (err) {
        throw new SlidePropertyError(`cannot read slide ${path}`, { cause: err });
      }
      return buffer.subarray(0, bytesRead);
    },
  };
}

function readSlideProperties(input: ByteSource, source: string): SlideProperties {
  const layout = readLayout(input.read(0, 16));
  if (!layout) {
    throw new SlidePropertyError(`${source} is not a TIFF file`);
  }

  const tags = readFirstDirectory(input, layout, source);

  const width = firstNumber(tags.get(TAG_IMAGE_WIDTH));
  const height = firstNumber(tags.get(TAG_IMAGE_LENGTH));
  if (width === undefined || height === undefined) {
    throw new SlidePropertyError(`${source} has no image dimensions`);
  }

  const mpp = aperioMpp(tags.get(TAG_IMAGE_DESCRIPTION)) ?? resolutionMpp(tags);
  if (!mpp) {
    throw new SlidePropertyError(`${source} has no microns-per-pixel information`);
  }

  return { width, height, mppX: mpp.x, mppY: mpp.y };
}

function view(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

function readLayout(header: Uint8Array): TiffLayout | undefined {
  if (header.length < 8) return undefined;
  const little = header[0] === 0x49 && header[1] === 0x49;
  const bigEndian = header[0] === 0x4d && header[1] === 0x4d;
  if (!little && !bigEndian) return undefined;

  const dv = view(header);
  const version = dv.getUint16(2, little);
  if (version === 42) {
    return { little, bigTiff: false, firstIfd: dv.getUint32(4, little) };
  }
  if (version === 43 && header.length >= 16 && dv.getUint16(4, little) === 8) {
    return { little, bigTiff: true, firstIfd: Number(dv.getBigUint64(8, little)) };
  }
  return undefined;
}

/** Tags of interest from the first IFD, keyed by tag number. */
function readFirstDirectory(input: ByteSource, layout: TiffLayout, source: string): Map<number, TagValue> {
  const { little, bigTiff: big, firstIfd } = layout;
  const countSize = big ? 8 : 2;
  const entrySize = big ? 20 : 12;
  const fieldSize = big ? 8 : 4;

  const readExact = (position: number, length: number): Uint8Array => {
    const bytes = input.read(position, length);
    if (bytes.length < length) {
      throw new SlidePropertyError(`${source} is truncated at offset ${position}`);
    }
    return bytes;
  };

  if (firstIfd === 0) {
    throw new SlidePropertyError(`${source} has no image directory`);
  }

  const countView = view(readExact(firstIfd, countSize));
  const count = big ? Number(countView.getBigUint64(0, little)) : countView.getUint16(0, little);
  const entries = readExact(firstIfd + countSize, count * entrySize);
  const dv = view(entries);

  const tags = new Map<number, TagValue>();
  for (let i = 0; i < count; i++) {
    const at = i * entrySize;
    const tag = dv.getUint16(at, little);
    if (!WANTED_TAGS.has(tag)) continue;

    const type = dv.getUint16(at + 2, little);
    const valueCount = big ? Number(dv.getBigUint64(at + 4, little)) : dv.getUint32(at + 4, little);
    const typeSize = TYPE_SIZES[type];
    if (typeSize === undefined) continue;

    const field = entries.subarray(at + 4 + (big ? 8 : 4), at + entrySize);
    const size = typeSize * valueCount;
    let data: Uint8Array;
    if (size <= fieldSize) {
      data = field.subarray(0, size);
    } else {
      const fv = view(field);
      const offset = big ? Number(fv.getBigUint64(0, little)) : fv.getUint32(0, little);
      data = readExact(offset, size);
    }

    const value = decodeValue(type, valueCount, data, little);
    if (value !== undefined) tags.set(tag, value);
  }
  return tags;
}

function decodeValue(type: number, count: number, data: Uint8Array, little: boolean): TagValue | undefined {
  const dv = view(data);
  const values: number[] = [];
  switch (type) {
    case TYPE_ASCII: {
      const end = data.indexOf(0);
      return Buffer.from(end === -1 ? data : data.subarray(0, end)).toString('latin1');
    }
    case TYPE_SHORT:
      for (let i = 0; i < count; i++) values.push(dv.getUint16(i * 2, little));
      return values;
    case TYPE_LONG:
      for (let i = 0; i < count; i++) values.push(dv.getUint32(i * 4, little));
      return values;
    case TYPE_LONG8:
      for (let i = 0; i < count; i++) values.push(Number(dv.getBigUint64(i * 8, little)));
      return values;
    case TYPE_RATIONAL:
      for (let i = 0; i < count; i++) {
        const denominator = dv.getUint32(i * 8 + 4, little);
        values.push(denominator === 0 ? 0 : dv.getUint32(i * 8, little) / denominator);
      }
      return values;
    default:
      return undefined;
  }
}

/** Aperio writes a single `MPP = x` entry in ImageDescription; its text is kept as-is. */
function aperioMpp(description: TagValue | undefined): { x: string; y: string } | undefined {
  if (typeof description !== 'string' || !description.startsWith('Aperio')) return undefined;

  const match = APERIO_MPP.exec(description);
  if (!match || !(Number(match[1]) > 0)) return undefined;
  return { x: match[1], y: match[1] };
}

/** MPP from X/YResolution, which hold pixels per ResolutionUnit. */
function resolutionMpp(tags: Map<number, TagValue>): { x: string; y: string } | undefined {
  const unit = firstNumber(tags.get(TAG_RESOLUTION_UNIT));
  const micronsPerUnit = unit === RESOLUTION_UNIT_CENTIMETER
    ? MICRONS_PER_CENTIMETER
    : unit === RESOLUTION_UNIT_INCH ? MICRONS_PER_INCH : undefined;
  if (micronsPerUnit === undefined) return undefined;

  const xRes = firstNumber(tags.get(TAG_X_RESOLUTION));
  const yRes = firstNumber(tags.get(TAG_Y_RESOLUTION));
  if (!xRes || !yRes) return undefined;

  return { x: String(micronsPerUnit / xRes), y: String(micronsPerUnit / yRes) };
}

function firstNumber(value: TagValue | undefined): number | undefined {
  return Array.isArray(value) ? value[0] : undefined;
}
