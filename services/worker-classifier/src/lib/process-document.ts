/**
 * Document Processing
 *
 * Classify one document, then file it. Used by both the queue worker and the
 * one-shot batch runner.
 */

import path from 'path';
import {
  CATEGORIES,
  PROCESSING_ERROR,
  listFilesRecursive,
  logger,
  normalizeFilename,
  type Category,
  type ClassificationOutcome,
  type NationalIdentifier,
} from '@triage/shared';
import { fileDocument, fileFailedDocument, type FilingOptions } from './filing';

export interface DocumentClassifier {
  classifyDocument(filePath: string): Promise<ClassificationOutcome>;
}

export interface ProcessDocumentDeps {
  classifier: DocumentClassifier;
  filing: FilingOptions;
}

export interface ProcessedDocument {
  sourceFilename: string;
  category: Category;
  identifier: NationalIdentifier | null;
  filename: string;
  targetPath: string;
  attempts: number;
}

/**
 * Classify and file a single document.
 *
 * Any failure before filing (including an image variant that cannot be
 * produced) routes the file into the processing-error bucket. Only a failure
 * to move the file itself propagates.
 */
export async function processDocument(
  sourcePath: string,
  deps: ProcessDocumentDeps
): Promise<ProcessedDocument> {
  const sourceFilename = normalizeFilename(path.basename(sourcePath));

  let outcome: ClassificationOutcome;
  try {
    outcome = await deps.classifier.classifyDocument(sourcePath);
  } catch (error) {
    logger.error('Document processing failed, moving to error bucket', error, { sourceFilename });
    const filed = fileFailedDocument(sourcePath, deps.filing);
    return {
      sourceFilename,
      category: PROCESSING_ERROR,
      identifier: null,
      filename: filed.filename,
      targetPath: filed.targetPath,
      attempts: 0,
    };
  }

  const filed = fileDocument(sourcePath, outcome, deps.filing);

  logger.info('Document filed', {
    sourceFilename,
    category: filed.category,
    filename: filed.filename,
    identifier_kind: outcome.identifier?.kind ?? null,
  });

  return {
    sourceFilename,
    category: outcome.category,
    identifier: outcome.identifier,
    filename: filed.filename,
    targetPath: filed.targetPath,
    attempts: outcome.attempts.length,
  };
}

export interface CategoryCount {
  category: Category;
  count: number;
}

/**
 * Per-category document counts in category order, every category present.
 */
export function summarizeResults(results: ProcessedDocument[]): CategoryCount[] {
  return CATEGORIES.map((category) => ({
    category,
    count: results.filter((result) => result.category === category).length,
  }));
}

/**
 * Process every file below a directory, one at a time.
 */
export async function processDirectory(
  directory: string,
  deps: ProcessDocumentDeps
): Promise<{ results: ProcessedDocument[]; counts: CategoryCount[] }> {
  const files = listFilesRecursive(directory);
  const results: ProcessedDocument[] = [];

  for (const [index, filePath] of files.entries()) {
    const result = await processDocument(filePath, deps);
    logger.info(`[${index + 1}/${files.length}] ${result.sourceFilename} -> ${result.category}`, {
      filename: result.filename,
    });
    results.push(result);
  }

  return { results, counts: summarizeResults(results) };
}
