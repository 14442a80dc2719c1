import { writeFileSync } from 'node:fs';
import { stringify } from 'csv-stringify/sync';
import type { JoinResult, ManifestRow } from './types.js';
import { EmptyManifestError } from './errors.js';
import type { Logger } from './internal/logger.js';
import { silentLogger } from './internal/logger.js';
import type { ManifestTable } from './internal/manifest-table.js';
import { listSampleDirectories, listSampleFiles } from './internal/sample-directories.js';

export const PATH_COLUMN = 'path';

export interface ManifestJoinerOptions {
  /** Progress logger. Default: silent. */
  logger?: Logger;
}

/**
 * Joins a directory of per-sample converter outputs against a reference
 * manifest. Each subdirectory is named `{subjectId}-{caseId}`.
 */
export class ManifestJoiner {
  private readonly reference: ManifestTable;
  private readonly logger: Logger;

  constructor(reference: ManifestTable, options: ManifestJoinerOptions = {}) {
    this.reference = reference;
    this.logger = options.logger ?? silentLogger;
  }

  /** One row per file of every sample the reference manifest knows. Unknown samples are skipped. */
  join(inputDir: string): JoinResult {
    const log = this.logger;
    const columns = this.reference.columns.includes(PATH_COLUMN)
      ? [...this.reference.columns]
      : [...this.reference.columns, PATH_COLUMN];

    const samples = listSampleDirectories(inputDir);
    log.info(`Found ${samples.length} subject-case pairs`);

    const rows: ManifestRow[] = [];
    const skipped: string[] = [];
    for (const sample of samples) {
      log.info(`Working on ${sample} ...`);
      const referenceRow = this.reference.get(sample);
      if (!referenceRow) {
        log.warn(`manifest does not contain ${sample}, skipping`);
        skipped.push(sample);
        continue;
      }

      for (const path of listSampleFiles(inputDir, sample)) {
        log.info(`  ${path}`);
        rows.push({ ...referenceRow, [PATH_COLUMN]: path });
      }
    }

    return { columns, rows, samples, skipped };
  }
}

/** Render joined rows as CSV: reference columns, then `path`. */
export function renderJoinedManifest(result: JoinResult): string {
  const records = [
    result.columns,
    ...result.rows.map(row => result.columns.map(column => row[column] ?? '')),
  ];
  return stringify(records);
}

/** Write the joined manifest. An empty join is refused and nothing is written. */
export function writeJoinedManifest(result: JoinResult, outputPath: string): void {
  if (result.rows.length === 0) {
    throw new EmptyManifestError('no rows to write');
  }
  writeFileSync(outputPath, renderJoinedManifest(result));
}
