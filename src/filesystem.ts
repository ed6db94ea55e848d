/**
 * Filesystem primitives the engine depends on.
 *
 * Everything goes through this interface so that tests can swap single
 * operations (a rename that fails with EXDEV, a copy that comes up short)
 * without touching the rest of the tree.
 */

import fs from 'node:fs';

export interface DirectoryEntry {
  name: string;
  isDirectory(): boolean;
  isFile(): boolean;
}

export interface FileStats {
  size: number;
  isDirectory(): boolean;
  isFile(): boolean;
}

export interface FileSystem {
  readdir(dirPath: string): DirectoryEntry[];
  stat(targetPath: string): FileStats;
  exists(targetPath: string): boolean;
  /** Throws when `targetPath` cannot be accessed with `mode` (fs.constants.R_OK etc.) */
  access(targetPath: string, mode: number): void;
  rename(fromPath: string, toPath: string): void;
  copyFile(fromPath: string, toPath: string): void;
  unlink(targetPath: string): void;
  rmdir(dirPath: string): void;
  mkdir(dirPath: string): void;
  readFile(targetPath: string): Buffer;
  writeFile(targetPath: string, content: Uint8Array): void;
  /** First `length` bytes of a file, fewer when the file is shorter */
  readHead(targetPath: string, length: number): Buffer;
}

function readHead(targetPath: string, length: number): Buffer {
  const fd = fs.openSync(targetPath, 'r');
  try {
    const buffer = Buffer.alloc(length);
    const bytesRead = fs.readSync(fd, buffer, 0, length, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    fs.closeSync(fd);
  }
}

export const nodeFileSystem: FileSystem = {
  readdir: dirPath => fs.readdirSync(dirPath, { withFileTypes: true }),
  stat: targetPath => fs.statSync(targetPath),
  exists: targetPath => fs.existsSync(targetPath),
  access: (targetPath, mode) => fs.accessSync(targetPath, mode),
  rename: (fromPath, toPath) => fs.renameSync(fromPath, toPath),
  // COPYFILE_EXCL: a copy never lands on top of an existing file
  copyFile: (fromPath, toPath) => fs.copyFileSync(fromPath, toPath, fs.constants.COPYFILE_EXCL),
  unlink: targetPath => fs.unlinkSync(targetPath),
  rmdir: dirPath => fs.rmdirSync(dirPath),
  mkdir: dirPath => {
    fs.mkdirSync(dirPath, { recursive: true });
  },
  readFile: targetPath => fs.readFileSync(targetPath),
  writeFile: (targetPath, content) => fs.writeFileSync(targetPath, content, { flag: 'wx' }),
  readHead,
};

export function hasErrorCode(error: unknown, code: string): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === code
  );
}
