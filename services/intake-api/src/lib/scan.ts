/**
 * Scan Logic
 *
 * Walks an input directory, fingerprints every file, and enqueues one
 * classify_document job per file.
 */

import fs from 'fs';
import path from 'path';
import crypto from 'crypto';
import {
  logger,
  listFilesRecursive,
  normalizeFilename,
  QUEUE_NAMES,
  type ClassifyDocumentJob,
  type ScanRequest,
} from '@triage/shared';

/** The slice of a BullMQ queue the scanner needs */
export interface DocumentQueue {
  add(name: string, data: ClassifyDocumentJob, opts: { jobId: string }): Promise<unknown>;
}

export interface ScanResult {
  enqueued: number;
  failed: number;
}

function sha256Hex(data: Buffer | string): string {
  return crypto.createHash('sha256').update(data).digest('hex');
}

/**
 * Identical bytes at two paths are two documents to file, so the job ID
 * covers both content and location.
 */
export function classifyJobId(documentId: string, sourcePath: string): string {
  return `classify_${sha256Hex(`${documentId}\u0000${sourcePath}`)}`;
}

/**
 * Build the job payload for one file
 */
export function buildClassifyJob(
  filePath: string,
  correlationId: string,
  discoveredAt: Date = new Date()
): ClassifyDocumentJob {
  const bytes = fs.readFileSync(filePath);

  return {
    event_type: 'document.received',
    correlation_id: correlationId,
    document_id: `sha256:${sha256Hex(bytes)}`,
    source_path: path.resolve(filePath),
    source_filename: normalizeFilename(path.basename(filePath)),
    discovered_at: discoveredAt.toISOString(),
  };
}

/**
 * Enqueue every file below request.directory, up to max_documents.
 * A file that cannot be read is logged and skipped.
 */
export async function scanDirectory(
  request: ScanRequest,
  correlationId: string,
  queue: DocumentQueue
): Promise<ScanResult> {
  const allFiles = listFilesRecursive(request.directory);
  const files = request.max_documents === null ? allFiles : allFiles.slice(0, request.max_documents);

  logger.info('Found documents', {
    directory: request.directory,
    count: allFiles.length,
    selected: files.length,
  });

  const result: ScanResult = { enqueued: 0, failed: 0 };

  for (const filePath of files) {
    try {
      const job = buildClassifyJob(filePath, correlationId);
      await queue.add(QUEUE_NAMES.CLASSIFY_DOCUMENT, job, { jobId: classifyJobId(job.document_id, job.source_path) });
      result.enqueued++;

      logger.info('Enqueued classify_document job', {
        document_id: job.document_id,
        source_filename: job.source_filename,
      });
    } catch (error) {
      result.failed++;
      logger.error('Failed to enqueue document', error, { filePath });
    }
  }

  return result;
}

export type ScanRequestParseResult =
  | { ok: true; request: ScanRequest }
  | { ok: false; message: string };

/**
 * Validate a POST /scan body. directory defaults to the configured input
 * folder and must exist.
 */
export function parseScanRequest(body: unknown, defaultDirectory: string): ScanRequestParseResult {
  let directory: unknown = defaultDirectory;
  let maxDocuments: unknown = null;

  if (typeof body === 'object' && body !== null) {
    if ('directory' in body && body.directory != null) directory = body.directory;
    if ('max_documents' in body && body.max_documents != null) maxDocuments = body.max_documents;
  }

  if (typeof directory !== 'string' || directory.length === 0) {
    return { ok: false, message: 'directory must be a non-empty string' };
  }
  if (!fs.existsSync(directory) || !fs.statSync(directory).isDirectory()) {
    return { ok: false, message: `directory not found: ${directory}` };
  }

  if (maxDocuments === null) {
    return { ok: true, request: { directory, max_documents: null } };
  }
  if (typeof maxDocuments !== 'number' || !Number.isInteger(maxDocuments) || maxDocuments <= 0) {
    return { ok: false, message: 'max_documents must be a positive integer' };
  }

  return { ok: true, request: { directory, max_documents: maxDocuments } };
}
