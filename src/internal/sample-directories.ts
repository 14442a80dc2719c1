import { readdirSync, statSync } from 'node:fs';
import { join } from 'node:path';

function visibleEntries(dir: string): string[] {
  return readdirSync(dir)
    .filter(name => !name.startsWith('.'))
    .sort();
}

/**
 * Names of the immediate, non-hidden subdirectories, sorted. Symlinks are
 * followed; a dangling link is not a directory.
 */
export function listSampleDirectories(inputDir: string): string[] {
  return visibleEntries(inputDir).filter(
    name => statSync(join(inputDir, name), { throwIfNoEntry: false })?.isDirectory() ?? false,
  );
}

/** Paths of the non-hidden entries inside one sample directory, sorted by name. */
export function listSampleFiles(inputDir: string, sample: string): string[] {
  const sampleDir = join(inputDir, sample);
  return visibleEntries(sampleDir).map(name => join(sampleDir, name));
}
