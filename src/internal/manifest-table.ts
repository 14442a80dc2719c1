import { readFileSync } from 'node:fs';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { ManifestRow } from '../types.js';
import { ManifestFormatError } from '../errors.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';

export const SUBJECT_ID_COLUMN = 'clinicaltrialsubjectid';
export const IMAGE_ID_COLUMN = 'imageid';

const RecordsSchema = z.array(z.array(z.string()));

/** Composite key of a sample: `{subjectId}-{caseId}`. */
export function sampleKey(subjectId: string, caseId: string): string {
  return `${subjectId}-${caseId}`;
}

/** Reference manifest indexed by sample key. */
export class ManifestTable {
  readonly columns: string[];
  private readonly rows: Map<string, string[]>;

  private constructor(columns: string[], rows: Map<string, string[]>) {
    this.columns = columns;
    this.rows = rows;
  }

  /** Parse CSV text with a header row. The first row wins when a key repeats. */
  static parse(text: string, logger: Logger = silentLogger): ManifestTable {
    let parsed: unknown;
    try {
      parsed = parse(text, { bom: true, skip_empty_lines: true });
    } catch (err) {
      throw new ManifestFormatError('reference manifest is not valid CSV', { cause: err });
    }

    const records = RecordsSchema.safeParse(parsed);
    if (!records.success) {
      throw new ManifestFormatError('reference manifest did not parse into rows of text');
    }

    const [header, ...body] = records.data;
    if (!header) {
      throw new ManifestFormatError('reference manifest is empty');
    }

    const missing = [SUBJECT_ID_COLUMN, IMAGE_ID_COLUMN].filter(c => !header.includes(c));
    if (missing.length > 0) {
      throw new ManifestFormatError(`reference manifest lacks column(s): ${missing.join(', ')}`);
    }
    const subjectIdx = header.indexOf(SUBJECT_ID_COLUMN);
    const imageIdx = header.indexOf(IMAGE_ID_COLUMN);

    const rows = new Map<string, string[]>();
    for (const record of body) {
      const key = sampleKey(record[subjectIdx], record[imageIdx]);
      if (rows.has(key)) {
        logger.warn(`reference manifest repeats ${key}; keeping the first row`);
        continue;
      }
      rows.set(key, record);
    }

    return new ManifestTable(header, rows);
  }

  static load(path: string, logger: Logger = silentLogger): ManifestTable {
    return ManifestTable.parse(readFileSync(path, 'utf8'), logger);
  }

  get size(): number {
    return this.rows.size;
  }

  has(key: string): boolean {
    return this.rows.has(key);
  }

  /** Row for a sample key as column → value, or undefined when absent. */
  get(key: string): ManifestRow | undefined {
    const record = this.rows.get(key);
    if (!record) return undefined;

    const row: ManifestRow = {};
    this.columns.forEach((column, i) => {
      row[column] = record[i];
    });
    return row;
  }
}
