/**
 * Classifier Worker
 *
 * Consumes classify_document jobs: runs the recognition ladder over the
 * document, then files it under its category folder.
 */

import fs from 'fs';
import type { Job } from 'bullmq';
import {
  logger,
  config,
  runWithContextAsync,
  createClassifyWorker,
  serveMetrics,
  validateClassifyJob,
  defaultKeywordTable,
  RecognitionOrchestrator,
  QUEUE_NAMES,
  type ClassifyDocumentJob,
  jobsProcessedCounter,
  jobDurationHistogram,
} from '@triage/shared';
import { SharpImageSource } from './lib/image-source';
import { TesseractEngine } from './lib/tesseract';
import { ensureCategoryFolders } from './lib/filing';
import { processDocument, type ProcessDocumentDeps, type ProcessedDocument } from './lib/process-document';

// Fail at startup, not on the first job, when the keyword table is broken
const keywordTable = defaultKeywordTable();
ensureCategoryFolders(config.uploadFolder);

const deps: ProcessDocumentDeps = {
  classifier: new RecognitionOrchestrator({
    imageSource: new SharpImageSource(),
    engine: new TesseractEngine(),
    keywordTable,
  }),
  filing: { uploadRoot: config.uploadFolder },
};

/**
 * Process classify_document job
 */
async function processClassifyDocument(
  job: Job<ClassifyDocumentJob, ProcessedDocument>
): Promise<ProcessedDocument> {
  const validation = validateClassifyJob(job.data);
  if (!validation.valid) {
    jobsProcessedCounter.inc({ queue: QUEUE_NAMES.CLASSIFY_DOCUMENT, status: 'invalid' });
    throw new Error(`Invalid classify_document payload: ${validation.errors.join('; ')}`);
  }

  const { correlation_id, document_id, source_path, source_filename } = validation.value;

  return runWithContextAsync(
    { correlationId: correlation_id, documentId: document_id, sourceFile: source_filename },
    async () => {
      const startTime = Date.now();

      logger.info('Processing classify_document', {
        jobId: job.id,
        attempt: job.attemptsMade + 1,
      });

      // A previous attempt may already have filed the document
      if (!fs.existsSync(source_path)) {
        jobsProcessedCounter.inc({ queue: QUEUE_NAMES.CLASSIFY_DOCUMENT, status: 'missing' });
        throw new Error(`Source file not found: ${source_path}`);
      }

      try {
        const result = await processDocument(source_path, deps);

        const duration = (Date.now() - startTime) / 1000;
        jobsProcessedCounter.inc({ queue: QUEUE_NAMES.CLASSIFY_DOCUMENT, status: 'success' });
        jobDurationHistogram.observe(
          { queue: QUEUE_NAMES.CLASSIFY_DOCUMENT, status: 'success' },
          duration
        );
        return result;
      } catch (error) {
        jobsProcessedCounter.inc({ queue: QUEUE_NAMES.CLASSIFY_DOCUMENT, status: 'failed' });
        throw error;
      }
    }
  );
}

// Expose /metrics for Prometheus
const metricsServer = serveMetrics(config.workerMetricsPort);

// Only FilingError is retried; the checks above fail the job for good
const worker = createClassifyWorker<ProcessedDocument>(processClassifyDocument);

logger.info('Classifier worker started', {
  keyword_table_version: keywordTable.version,
  upload_folder: config.uploadFolder,
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  metricsServer.close();
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
