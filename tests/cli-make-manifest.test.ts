import { existsSync, mkdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { runMakeManifest, parseManifestArgs } from '../src/cli/make-manifest.js';
import { MemorySink, makeTempDir, writeFile } from './fixtures/helpers.js';

const REFERENCE = 'clinicaltrialsubjectid,imageid,study\nS1,C1,PAAD\n';

describe('parseManifestArgs', () => {
  it('parses positionals and the reference manifest', () => {
    expect(parseManifestArgs(['quip', 'out.csv', '--reference-manifest', 'ref.csv'])).toEqual({
      input: 'quip',
      output: 'out.csv',
      referenceManifest: 'ref.csv',
    });
  });

  it('accepts --tcga-manifest as an alias', () => {
    expect(parseManifestArgs(['--tcga-manifest', 'ref.csv', 'quip', 'out.csv'])?.referenceManifest).toBe('ref.csv');
  });

  it('accepts the reference manifest as --flag=value', () => {
    expect(parseManifestArgs(['quip', 'out.csv', '--reference-manifest=ref.csv'])?.referenceManifest).toBe('ref.csv');
    expect(parseManifestArgs(['--tcga-manifest=ref.csv', 'quip', 'out.csv'])?.referenceManifest).toBe('ref.csv');
  });

  it('requires the reference manifest', () => {
    expect(() => parseManifestArgs(['quip', 'out.csv'])).toThrow(
      'the following argument is required: --reference-manifest',
    );
  });
});

describe('runMakeManifest', () => {
  let root: string;
  let inputDir: string;
  let referencePath: string;
  let outputPath: string;
  let cleanup: () => void;
  let sink: MemorySink;

  beforeEach(() => {
    ({ dir: root, cleanup } = makeTempDir());
    inputDir = join(root, 'quip');
    mkdirSync(inputDir);
    referencePath = writeFile(root, 'reference.csv', REFERENCE);
    outputPath = join(root, 'manifest.csv');
    sink = new MemorySink();
  });

  afterEach(() => cleanup());

  function makeSample(name: string, files: string[]): void {
    mkdirSync(join(inputDir, name));
    for (const file of files) writeFile(join(inputDir, name), file, 'x');
  }

  it('writes two rows for a sample with two files', () => {
    makeSample('S1-C1', ['x_type1-algmeta.json', 'x_type1-features.csv']);
    makeSample('S2-C2', ['y_type1-features.csv']);

    const status = runMakeManifest([inputDir, outputPath, '--reference-manifest', referencePath], { sink, env: {} });

    expect(status).toBe(0);
    expect(readFileSync(outputPath, 'utf8')).toBe(
      'clinicaltrialsubjectid,imageid,study,path\n' +
      `S1,C1,PAAD,${join(inputDir, 'S1-C1', 'x_type1-algmeta.json')}\n` +
      `S1,C1,PAAD,${join(inputDir, 'S1-C1', 'x_type1-features.csv')}\n`,
    );
    expect(sink.stderr.some(line => line.endsWith('manifest does not contain S2-C2, skipping'))).toBe(true);
  });

  it('exits 1 and writes nothing when no sample matches', () => {
    makeSample('S2-C2', ['y_type1-features.csv']);

    const status = runMakeManifest([inputDir, outputPath, '--reference-manifest', referencePath], { sink, env: {} });

    expect(status).toBe(1);
    expect(existsSync(outputPath)).toBe(false);
    expect(sink.stderr[sink.stderr.length - 1]).toMatch(/\[make-quip-manifest:error\] No rows found\.\.\. exiting$/);
  });

  it('exits 1 for an empty input directory', () => {
    const status = runMakeManifest([inputDir, outputPath, '--reference-manifest', referencePath], { sink, env: {} });

    expect(status).toBe(1);
    expect(existsSync(outputPath)).toBe(false);
  });

  it('exits 2 when the input directory is missing', () => {
    const missing = join(root, 'nope');

    const status = runMakeManifest([missing, outputPath, '--reference-manifest', referencePath], { sink, env: {} });

    expect(status).toBe(2);
    expect(sink.stderr[sink.stderr.length - 1]).toBe(`make-quip-manifest: error: input not found: ${missing}`);
  });

  it('exits 2 when the reference manifest is missing', () => {
    const missing = join(root, 'nope.csv');

    const status = runMakeManifest([inputDir, outputPath, '--reference-manifest', missing], { sink, env: {} });

    expect(status).toBe(2);
    expect(sink.stderr[sink.stderr.length - 1]).toBe(
      `make-quip-manifest: error: reference manifest file not found: ${missing}`,
    );
  });

  it('exits 1 when the reference manifest lacks the key columns', () => {
    makeSample('S1-C1', ['a.csv']);
    const badReference = writeFile(root, 'bad.csv', 'subject,image\nS1,C1\n');

    const status = runMakeManifest([inputDir, outputPath, '--reference-manifest', badReference], { sink, env: {} });

    expect(status).toBe(1);
    expect(existsSync(outputPath)).toBe(false);
  });
});
