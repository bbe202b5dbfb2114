/**
 * Shared Package - Main Export
 */

// Context
export {
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config } from './config';

// Errors
export {
  TriageError,
  KeywordTableError,
  ImageAcquisitionError,
  ImageVariantError,
  RecognitionTimeoutError,
  FilingError,
  errorMessage,
  type TriageErrorCode,
} from './errors';

// Types
export * from './types';

// Files
export { listFilesRecursive, normalizeFilename } from './files';

// Queues
export {
  QUEUE_NAMES,
  QUEUE_STATES,
  type QueueName,
  type QueueState,
  type ClassifyDocumentJob,
  getRedisConnection,
  classifyJobFailure,
  withRetryPolicy,
  classifyJobOptions,
  createClassifyQueue,
  createClassifyWorker,
  getQueueSnapshot,
  checkBackpressure,
  type JobFailureDisposition,
  type ClassifyWorkerOptions,
  type JobCountSource,
  type QueueSnapshot,
  type BackpressureLimits,
  type BackpressureStatus,
} from './queues';

// Metrics
export {
  register,
  queueDepthGauge,
  queueMetricsGauge,
  jobDurationHistogram,
  jobsProcessedCounter,
  recognitionAttemptsCounter,
  recognitionDurationHistogram,
  documentsClassifiedCounter,
  backpressureRejectionsCounter,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  reportQueueMetrics,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export {
  validateKeywordTableDocument,
  validateClassifyJob,
  type ValidationResult,
} from './schemas';

// Classification
export {
  createKeywordTable,
  loadKeywordTable,
  defaultKeywordTable,
  categoryPriority,
  type KeywordTable,
  type KeywordTableEntry,
  type KeywordTableInput,
} from './classification/keyword-table';
export {
  classify,
  findFirstMatch,
  normalizeRecognizedText,
  type KeywordMatch,
} from './classification/classifier';

// Identifiers
export { isValidPersonalId, isValidTaxId, mod10 } from './identifiers/checksums';
export {
  extractIdentifier,
  extractPersonalId,
  extractTaxId,
  findDigitRuns,
  type DigitRun,
} from './identifiers/extractor';

// Recognition
export {
  ROTATION_ANGLES,
  DEFAULT_UPSCALE_FACTOR,
  MAX_RECOGNITION_ATTEMPTS,
  buildAttemptPlan,
  describeAttempt,
  type AttemptPlanOptions,
} from './recognition/attempt-plan';
export { withTimeout } from './recognition/timeout';
export type { ImageSource, RecognitionEngine, RecognizeOptions } from './recognition/types';
export { RecognitionOrchestrator, type OrchestratorOptions } from './recognition/orchestrator';
