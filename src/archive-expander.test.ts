import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ArchiveExpander } from './archive-expander.js';
import { DEFAULT_ARCHIVE_EXTENSIONS } from './classifier.js';
import { nodeFileSystem, type FileSystem } from './filesystem.js';
import { OperationLog } from './operation-log.js';
import { listTree, makeTempDir, makeZip, writeTree } from '../tests/fixtures.js';

describe('ArchiveExpander', () => {
  let root: string;
  let log: OperationLog;

  const expanderFor = (options: { maxPasses?: number; dryRun?: boolean; fileSystem?: FileSystem } = {}) =>
    new ArchiveExpander({
      fileSystem: nodeFileSystem,
      operationLog: log,
      archiveExtensions: DEFAULT_ARCHIVE_EXTENSIONS,
      exclude: [path.join(root, 'NonMedia')],
      ...options,
    });

  beforeEach(() => {
    root = makeTempDir('archive-expander-');
    log = new OperationLog();
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('extracts next to the archive and removes it', async () => {
    writeTree(root, {
      'alice/photos.zip': await makeZip({ 'a.jpg': 'jpeg', 'docs/readme.txt': 'hello' }),
    });

    const expander = expanderFor();
    expect(await expander.expand(root)).toBe(1);

    expect(listTree(root)).toEqual(['alice/a.jpg', 'alice/docs/readme.txt']);
    expect([...expander.extractedPaths].sort()).toEqual([
      path.join(root, 'alice/a.jpg'),
      path.join(root, 'alice/docs/readme.txt'),
    ]);

    const [record] = log.records();
    expect(log.size).toBe(1);
    expect(record.kind).toBe('extract');
    expect(record.sourcePath).toBe(path.join(root, 'alice/photos.zip'));
    expect(record.destinationPath).toBe(path.join(root, 'alice'));
    expect(record.simulated).toBe(false);
    expect(record.reason).toBe('2 file(s) extracted');
  });

  it('keeps extracting until archives inside archives are gone', async () => {
    const inner = await makeZip({ 'leaf.txt': 'leaf' });
    writeTree(root, { 'outer.zip': await makeZip({ 'inner.zip': inner }) });

    expect(await expanderFor().expand(root)).toBe(2);
    expect(listTree(root)).toEqual(['leaf.txt']);
    expect(log.records().map(record => path.basename(record.sourcePath))).toEqual(['outer.zip', 'inner.zip']);
  });

  it('does nothing on a tree without archives, however often it runs', async () => {
    writeTree(root, { 'a/b.txt': 'b', 'c.mp4': 'c' });
    const expander = expanderFor();

    expect(await expander.expand(root)).toBe(0);
    expect(await expander.expand(root)).toBe(0);
    expect(log.size).toBe(0);
    expect(listTree(root)).toEqual(['a/b.txt', 'c.mp4']);
  });

  it('records a corrupt archive once and leaves it in place', async () => {
    writeTree(root, { 'broken.zip': 'this is not a zip file' });

    expect(await expanderFor().expand(root)).toBe(0);
    expect(listTree(root)).toEqual(['broken.zip']);

    const records = log.records();
    expect(records).toHaveLength(1);
    expect(records[0].kind).toBe('error');
    expect(records[0].sourcePath).toBe(path.join(root, 'broken.zip'));
    expect(records[0].error).not.toBeNull();
    expect(records[0].sizeBytes).toBe('this is not a zip file'.length);
  });

  it('reports archives left after the pass limit as errors', async () => {
    const third = await makeZip({ 'leaf.txt': 'leaf' });
    const second = await makeZip({ 'third.zip': third });
    writeTree(root, { 'first.zip': await makeZip({ 'second.zip': second }) });

    expect(await expanderFor({ maxPasses: 2 }).expand(root)).toBe(2);
    expect(listTree(root)).toEqual(['third.zip']);

    const last = log.records().at(-1);
    expect(last?.kind).toBe('error');
    expect(last?.sourcePath).toBe(path.join(root, 'third.zip'));
    expect(last?.error).toBe('Archive still present after 2 extraction passes');
  });

  it('stops an archive that keeps reproducing itself at the pass limit', async () => {
    const loop = Buffer.from(await makeZip({ 'loop.zip': 'placeholder' }));
    const fileSystem: FileSystem = {
      ...nodeFileSystem,
      readFile: filePath => (path.basename(filePath).startsWith('loop') ? loop : nodeFileSystem.readFile(filePath)),
    };
    writeTree(root, { 'loop.zip': 'placeholder' });

    expect(await expanderFor({ maxPasses: 3, fileSystem }).expand(root)).toBe(3);

    expect(listTree(root)).toEqual(['loop (1).zip']);
    expect(log.countOf('extract')).toBe(3);
    const errors = log.records().filter(record => record.kind === 'error');
    expect(errors).toHaveLength(1);
    expect(errors[0].sourcePath).toBe(path.join(root, 'loop (1).zip'));
    expect(errors[0].error).toBe('Archive still present after 3 extraction passes');
  });

  it('removes files and directories written for an archive that fails midway', async () => {
    writeTree(root, {
      'sub/existing.txt': 'kept',
      'bundle.zip': await makeZip({ 'sub/deep/a.txt': 'a', 'sub/deep/b.txt': 'b' }),
    });
    const fileSystem: FileSystem = {
      ...nodeFileSystem,
      writeFile: (filePath, content) => {
        if (path.basename(filePath) === 'b.txt') throw new Error('disk full');
        nodeFileSystem.writeFile(filePath, content);
      },
    };

    expect(await expanderFor({ fileSystem }).expand(root)).toBe(0);

    expect(listTree(root)).toEqual(['bundle.zip', 'sub/existing.txt']);
    expect(fs.existsSync(path.join(root, 'sub/deep'))).toBe(false);
    const [record] = log.records();
    expect(log.size).toBe(1);
    expect(record.kind).toBe('error');
    expect(record.error).toBe('disk full');
  });

  it('never overwrites an existing file with an extracted one', async () => {
    writeTree(root, {
      'notes.txt': 'original',
      'bundle.zip': await makeZip({ 'notes.txt': 'from archive' }),
    });

    await expanderFor().expand(root);

    expect(listTree(root)).toEqual(['notes (1).txt', 'notes.txt']);
    expect(fs.readFileSync(path.join(root, 'notes.txt'), 'utf8')).toBe('original');
    expect(fs.readFileSync(path.join(root, 'notes (1).txt'), 'utf8')).toBe('from archive');
  });

  it('matches archive extensions regardless of case', async () => {
    writeTree(root, { 'SCANS.ZIP': await makeZip({ 'scan.png': 'png' }) });

    expect(await expanderFor().expand(root)).toBe(1);
    expect(listTree(root)).toEqual(['scan.png']);
  });

  it('ignores archives inside the backup root', async () => {
    writeTree(root, { 'NonMedia/kept.zip': await makeZip({ 'x.txt': 'x' }) });

    expect(await expanderFor().expand(root)).toBe(0);
    expect(listTree(root)).toEqual(['NonMedia/kept.zip']);
  });

  it('only records what it would extract in a dry run', async () => {
    writeTree(root, { 'a/photos.zip': await makeZip({ 'a.jpg': 'jpeg' }) });

    expect(await expanderFor({ dryRun: true }).expand(root)).toBe(1);
    expect(listTree(root)).toEqual(['a/photos.zip']);

    const [record] = log.records();
    expect(record.kind).toBe('extract');
    expect(record.simulated).toBe(true);
    expect(record.destinationPath).toBe(path.join(root, 'a'));
  });
});
