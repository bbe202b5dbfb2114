/**
 * Directory listing shared by the intake API and the batch runner.
 */

import fs from 'fs';
import path from 'path';

/**
 * All regular files below a directory, depth first, sorted by name within
 * each directory for stable ordering.
 */
export function listFilesRecursive(directory: string): string[] {
  const files: string[] = [];

  const entries = fs
    .readdirSync(directory, { withFileTypes: true })
    .sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    const fullPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      files.push(...listFilesRecursive(fullPath));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }

  return files;
}

/**
 * Unicode NFKC form of a file name, so names written by different operating
 * systems compare equal.
 */
export function normalizeFilename(filename: string): string {
  return filename.normalize('NFKC');
}
