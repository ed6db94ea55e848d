import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import JSZip from 'jszip';
import { DEFAULT_ARCHIVE_EXTENSIONS, DEFAULT_MEDIA_EXTENSIONS } from '../src/classifier.js';
import type { PlanMode, SorterConfig } from '../src/types.js';

export type TreeSpec = Record<string, string | Uint8Array>;

export function makeTempDir(prefix = 'mediasift-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function writeTree(root: string, tree: TreeSpec): void {
  for (const [relativePath, content] of Object.entries(tree)) {
    const target = path.join(root, relativePath);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content);
  }
}

/**
 * Every file under `root`, relative and with forward slashes, sorted
 */
export function listTree(root: string): string[] {
  if (!fs.existsSync(root)) return [];
  const files: string[] = [];
  const visit = (directory: string) => {
    for (const entry of fs.readdirSync(directory, { withFileTypes: true })) {
      const absolutePath = path.join(directory, entry.name);
      if (entry.isDirectory()) visit(absolutePath);
      else files.push(path.relative(root, absolutePath).split(path.sep).join('/'));
    }
  };
  visit(root);
  return files.sort();
}

export async function makeZip(entries: Record<string, string | Uint8Array>): Promise<Uint8Array> {
  const zip = new JSZip();
  for (const [name, content] of Object.entries(entries)) {
    zip.file(name, content);
  }
  return zip.generateAsync({ type: 'uint8array' });
}

export function makeConfig(
  sourceRoot: string,
  overrides: Partial<Omit<SorterConfig, 'sourceRoot'>> & { mode?: PlanMode } = {},
): SorterConfig {
  return {
    sourceRoot,
    backupRoot: path.join(sourceRoot, 'NonMedia'),
    mode: 'preserve',
    dryRun: false,
    mediaExtensions: DEFAULT_MEDIA_EXTENSIONS,
    archiveExtensions: DEFAULT_ARCHIVE_EXTENSIONS,
    maxArchivePasses: 10,
    ...overrides,
  };
}

// Signature, IHDR and IEND chunks of a 1x1 PNG (no pixel data)
export const PNG_BYTES = Uint8Array.from([
  0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a,
  0x00, 0x00, 0x00, 0x0d, 0x49, 0x48, 0x44, 0x52,
  0x00, 0x00, 0x00, 0x01, 0x00, 0x00, 0x00, 0x01,
  0x08, 0x06, 0x00, 0x00, 0x00, 0x1f, 0x15, 0xc4, 0x89,
  0x00, 0x00, 0x00, 0x00, 0x49, 0x45, 0x4e, 0x44, 0xae, 0x42, 0x60, 0x82,
]);
