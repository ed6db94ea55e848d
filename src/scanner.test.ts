import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { nodeFileSystem } from './filesystem.js';
import { walkFiles } from './scanner.js';
import { makeTempDir, writeTree } from '../tests/fixtures.js';

describe('walkFiles', () => {
  let root: string;

  const relative = (files: Iterable<{ path: string }>) =>
    [...files].map(file => path.relative(root, file.path).split(path.sep).join('/'));

  beforeEach(() => {
    root = makeTempDir('scanner-');
    writeTree(root, {
      'b.txt': 'bb',
      'A.txt': 'a',
      'a/z.txt': 'z',
      'a/c/d.txt': 'd',
      'e/f.jpg': 'f',
      'NonMedia/x.txt': 'x',
    });
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('lists files before subdirectories, each in name order', () => {
    expect(relative(walkFiles(nodeFileSystem, root))).toEqual([
      'A.txt',
      'b.txt',
      'NonMedia/x.txt',
      'a/z.txt',
      'a/c/d.txt',
      'e/f.jpg',
    ]);
  });

  it('skips excluded directories entirely', () => {
    const files = walkFiles(nodeFileSystem, root, { exclude: [path.join(root, 'NonMedia')] });
    expect(relative(files)).toEqual(['A.txt', 'b.txt', 'a/z.txt', 'a/c/d.txt', 'e/f.jpg']);
  });

  it('reports sizes', () => {
    const sizes = [...walkFiles(nodeFileSystem, root)].map(file => file.sizeBytes);
    expect(sizes).toEqual([1, 2, 1, 1, 1, 1]);
  });

  it('starts a fresh walk on every iteration', () => {
    const files = walkFiles(nodeFileSystem, root, { exclude: [path.join(root, 'NonMedia')] });
    expect(relative(files)).toHaveLength(5);

    fs.unlinkSync(path.join(root, 'e/f.jpg'));
    writeTree(root, { 'e/g.jpg': 'g' });

    expect(relative(files)).toEqual(['A.txt', 'b.txt', 'a/z.txt', 'a/c/d.txt', 'e/g.jpg']);
  });

  it('lists symlinks as non-regular entries without following them', () => {
    const outside = makeTempDir('scanner-outside-');
    try {
      writeTree(outside, { 'target.txt': 'target', 'dir/inner.txt': 'inner' });
      fs.symlinkSync(path.join(outside, 'target.txt'), path.join(root, 'e/link.txt'));
      fs.symlinkSync(path.join(outside, 'dir'), path.join(root, 'e/linked-dir'));

      const entries = [...walkFiles(nodeFileSystem, path.join(root, 'e'))];

      expect(entries).toEqual([
        { path: path.join(root, 'e/f.jpg'), sizeBytes: 1, regular: true },
        { path: path.join(root, 'e/link.txt'), sizeBytes: 0, regular: false },
        { path: path.join(root, 'e/linked-dir'), sizeBytes: 0, regular: false },
      ]);
    } finally {
      fs.rmSync(outside, { recursive: true, force: true });
    }
  });

  it('hands unreadable directories to onError and carries on', () => {
    const onError = vi.fn();
    const missing = path.join(root, 'missing');

    expect([...walkFiles(nodeFileSystem, missing, { onError })]).toEqual([]);
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0][0]).toBe(missing);
  });
});
