/**
 * Filing
 *
 * Moves processed documents into uploads/<category>/. Documents with an
 * identifier are renamed to {identifier}_{ddmmyyyy}.{ext}; name collisions
 * get a "(n)" suffix before the extension.
 */

import fs from 'fs';
import path from 'path';
import {
  CATEGORIES,
  FilingError,
  PROCESSING_ERROR,
  logger,
  normalizeFilename,
  type Category,
  type ClassificationOutcome,
} from '@triage/shared';

export interface FilingOptions {
  uploadRoot: string;
  /** Clock used for the date part of identifier file names */
  now?: () => Date;
}

export interface FiledDocument {
  category: Category;
  filename: string;
  targetPath: string;
}

/**
 * ddmmyyyy in local time
 */
export function formatFilingDate(date: Date): string {
  const day = String(date.getDate()).padStart(2, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  return `${day}${month}${date.getFullYear()}`;
}

function splitFilename(filename: string): { base: string; ext: string } {
  const ext = path.extname(filename);
  return { base: filename.slice(0, filename.length - ext.length), ext };
}

/**
 * First of name.ext, name(1).ext, name(2).ext, ... for which exists() is false.
 */
export function resolveUniqueFilename(filename: string, exists: (candidate: string) => boolean): string {
  if (!exists(filename)) return filename;

  const { base, ext } = splitFilename(filename);
  let counter = 1;
  while (exists(`${base}(${counter})${ext}`)) {
    counter++;
  }
  return `${base}(${counter})${ext}`;
}

/**
 * Target name before collision handling: {identifier}_{ddmmyyyy}.{ext} when an
 * identifier was extracted, otherwise the normalized original name.
 */
export function buildTargetFilename(
  outcome: Pick<ClassificationOutcome, 'identifier'>,
  originalName: string,
  date: Date
): string {
  const normalized = normalizeFilename(originalName);
  if (!outcome.identifier) return normalized;

  const { ext } = splitFilename(normalized);
  return `${outcome.identifier.value}_${formatFilingDate(date)}${ext}`;
}

/**
 * Create one folder per category under the upload root.
 */
export function ensureCategoryFolders(uploadRoot: string): void {
  for (const category of CATEGORIES) {
    fs.mkdirSync(path.join(uploadRoot, category), { recursive: true });
  }
}

function moveFile(sourcePath: string, targetPath: string): void {
  try {
    fs.renameSync(sourcePath, targetPath);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'EXDEV') {
      fs.copyFileSync(sourcePath, targetPath, fs.constants.COPYFILE_EXCL);
      fs.unlinkSync(sourcePath);
      return;
    }
    throw err;
  }
}

function placeFile(sourcePath: string, category: Category, filename: string, uploadRoot: string): FiledDocument {
  const folder = path.join(uploadRoot, category);

  try {
    fs.mkdirSync(folder, { recursive: true });
    const unique = resolveUniqueFilename(filename, (candidate) =>
      fs.existsSync(path.join(folder, candidate))
    );
    const targetPath = path.join(folder, unique);
    moveFile(sourcePath, targetPath);
    return { category, filename: unique, targetPath };
  } catch (err) {
    throw new FilingError(`Could not move ${sourcePath} into ${folder}`, err);
  }
}

/**
 * Move a classified document into its category folder.
 */
export function fileDocument(
  sourcePath: string,
  outcome: ClassificationOutcome,
  options: FilingOptions
): FiledDocument {
  const now = options.now ? options.now() : new Date();
  const filename = buildTargetFilename(outcome, path.basename(sourcePath), now);
  const filed = placeFile(sourcePath, outcome.category, filename, options.uploadRoot);

  logger.debug('Filed document', {
    category: filed.category,
    filename: filed.filename,
    renamed: outcome.identifier !== null,
  });
  return filed;
}

/**
 * Move a document whose processing failed into the error bucket, keeping its
 * (normalized) name.
 */
export function fileFailedDocument(sourcePath: string, options: FilingOptions): FiledDocument {
  const filename = normalizeFilename(path.basename(sourcePath));
  return placeFile(sourcePath, PROCESSING_ERROR, filename, options.uploadRoot);
}
