import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { collectVacatedDirectories, removeEmptyDirectories } from './directory-cleanup.js';
import { nodeFileSystem } from './filesystem.js';
import { OperationLog } from './operation-log.js';
import { makeTempDir, writeTree } from '../tests/fixtures.js';

describe('collectVacatedDirectories', () => {
  it('lists every ancestor below the source root, deepest first', () => {
    expect(
      collectVacatedDirectories('/root', ['/root/a/b/x.txt', '/root/a/y.txt', '/root/c/z.txt', '/root/top.txt']),
    ).toEqual(['/root/a/b', '/root/a', '/root/c']);
  });

  it('ignores files outside the source root', () => {
    expect(collectVacatedDirectories('/root', ['/elsewhere/a/x.txt'])).toEqual([]);
  });
});

describe('removeEmptyDirectories', () => {
  let root: string;
  let log: OperationLog;

  const cleanup = (vacated: string[], extra: { keep?: string[]; signal?: AbortSignal } = {}) =>
    removeEmptyDirectories(
      vacated.map(file => path.join(root, file)),
      {
        fileSystem: nodeFileSystem,
        operationLog: log,
        sourceRoot: root,
        backupRoot: path.join(root, 'NonMedia'),
        ...extra,
      },
    );

  beforeEach(() => {
    root = makeTempDir('cleanup-');
    log = new OperationLog();
    fs.mkdirSync(path.join(root, 'alice/trip/day1'), { recursive: true });
    writeTree(root, { 'bob/docs/keep.txt': 'still here', 'NonMedia/alice/trip/day1/x.txt': 'x' });
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('removes emptied directories bottom-up and records each one', async () => {
    const removed = await cleanup(['alice/trip/day1/x.txt', 'bob/docs/y.txt'], {
      keep: [path.join(root, 'alice'), path.join(root, 'bob')],
    });

    expect(removed).toBe(2);
    expect(log.records().map(record => [record.kind, record.sourcePath])).toEqual([
      ['remove-directory', path.join(root, 'alice/trip/day1')],
      ['remove-directory', path.join(root, 'alice/trip')],
    ]);
    expect(fs.existsSync(path.join(root, 'alice'))).toBe(true);
    expect(fs.existsSync(path.join(root, 'bob/docs/keep.txt'))).toBe(true);
  });

  it('removes a directory that is not kept once it is empty', async () => {
    expect(await cleanup(['alice/trip/day1/x.txt'])).toBe(3);
    expect(fs.existsSync(path.join(root, 'alice'))).toBe(false);
    expect(fs.existsSync(root)).toBe(true);
  });

  it('never touches the backup root', async () => {
    fs.rmSync(path.join(root, 'NonMedia/alice/trip/day1/x.txt'));

    expect(await cleanup(['NonMedia/alice/trip/day1/x.txt'])).toBe(0);
    expect(fs.existsSync(path.join(root, 'NonMedia/alice/trip/day1'))).toBe(true);
  });

  it('stops once the run is aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    expect(await cleanup(['alice/trip/day1/x.txt'], { signal: controller.signal })).toBe(0);
    expect(fs.existsSync(path.join(root, 'alice/trip/day1'))).toBe(true);
    expect(log.size).toBe(0);
  });
});

describe('removeEmptyDirectories with a late interrupt', () => {
  let root: string;

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('stops when an abort arrives from outside between removals', async () => {
    root = makeTempDir('cleanup-late-');
    fs.mkdirSync(path.join(root, 'a/b/c'), { recursive: true });
    const log = new OperationLog();
    const controller = new AbortController();
    const fileSystem = {
      ...nodeFileSystem,
      rmdir: (dirPath: string) => {
        nodeFileSystem.rmdir(dirPath);
        setImmediate(() => controller.abort());
      },
    };

    const removed = await removeEmptyDirectories([path.join(root, 'a/b/c/x.txt')], {
      fileSystem,
      operationLog: log,
      sourceRoot: root,
      backupRoot: path.join(root, 'NonMedia'),
      signal: controller.signal,
    });

    expect(removed).toBe(1);
    expect(fs.existsSync(path.join(root, 'a/b/c'))).toBe(false);
    expect(fs.existsSync(path.join(root, 'a/b'))).toBe(true);
  });
});
