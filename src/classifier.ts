/**
 * Media classification by extension and sniffed MIME type
 */

import path from 'node:path';
import { fileTypeFromBuffer } from 'file-type';
import type { FileSystem } from './filesystem.js';
import type { Classification } from './types.js';
import { errorMessage, logger } from './logger.js';

export const VIDEO_EXTENSIONS = ['.mp4', '.avi', '.mov', '.mkv', '.wmv', '.flv'] as const;
export const AUDIO_EXTENSIONS = ['.mp3', '.wav', '.flac', '.m4a', '.aac'] as const;
export const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.gif', '.bmp', '.tiff'] as const;

export const DEFAULT_MEDIA_EXTENSIONS: ReadonlySet<string> = new Set([
  ...VIDEO_EXTENSIONS,
  ...AUDIO_EXTENSIONS,
  ...IMAGE_EXTENSIONS,
]);

export const DEFAULT_ARCHIVE_EXTENSIONS: ReadonlySet<string> = new Set(['.zip']);

const MEDIA_MIME_CATEGORIES = new Set(['video', 'audio', 'image']);

// Enough for every signature file-type knows about
const SNIFF_BYTES = 4100;

export function normalizeExtension(value: string): string {
  const trimmed = value.trim().toLowerCase();
  if (!trimmed) return '';
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

export function extensionOf(filePath: string): string {
  return path.extname(filePath).toLowerCase();
}

export function hasExtension(filePath: string, extensions: ReadonlySet<string>): boolean {
  const extension = extensionOf(filePath);
  return extension !== '' && extensions.has(extension);
}

/**
 * Decide whether a file is media. Extension and MIME checks are independent;
 * either one is enough. A missing sniff never makes a file media on its own.
 */
export function classify(
  filePath: string,
  sniffedType: string | null,
  mediaExtensions: ReadonlySet<string> = DEFAULT_MEDIA_EXTENSIONS,
): Classification {
  if (hasExtension(filePath, mediaExtensions)) {
    return 'media';
  }

  if (sniffedType) {
    const category = sniffedType.split('/')[0]?.trim().toLowerCase();
    if (category && MEDIA_MIME_CATEGORIES.has(category)) {
      return 'media';
    }
  }

  return 'non-media';
}

/**
 * MIME type from the file's leading bytes, or null when unreadable or unknown
 */
export async function sniffMimeType(fileSystem: FileSystem, filePath: string): Promise<string | null> {
  try {
    const head = fileSystem.readHead(filePath, SNIFF_BYTES);
    if (head.length === 0) return null;
    const detected = await fileTypeFromBuffer(head);
    return detected?.mime ?? null;
  } catch (error) {
    logger.debug('MIME sniff failed', { path: filePath, error: errorMessage(error) }, 'classifier');
    return null;
  }
}
