/**
 * classify_document Queue
 *
 * The pipeline has one queue: the intake API produces ClassifyDocumentJob
 * payloads and the classifier worker consumes them. This module owns the
 * Redis connection, the job options, the retry policy and queue-depth
 * backpressure for it.
 */

import {
  Queue,
  UnrecoverableError,
  Worker,
  type ConnectionOptions,
  type DefaultJobOptions,
  type Job,
} from 'bullmq';
import { config } from './config';
import { FilingError, errorMessage } from './errors';
import { logger } from './logger';

export const QUEUE_NAMES = {
  CLASSIFY_DOCUMENT: 'classify_document',
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

/**
 * classify_document - Enqueued by the intake API for every scanned file
 */
export interface ClassifyDocumentJob {
  event_type: 'document.received';
  correlation_id: string;
  /** sha256:<hex> of the file bytes */
  document_id: string;
  source_path: string;
  /** NFKC-normalized file name */
  source_filename: string;
  discovered_at: string;
}

// ============================================================================
// Redis Connection
// ============================================================================

const DEFAULT_REDIS_PORT = 6379;

/**
 * Connection options from a redis:// or rediss:// URL. Any other URL falls
 * back to REDIS_HOST / REDIS_PORT.
 */
export function getRedisConnection(redisUrl: string = config.redisUrl): ConnectionOptions {
  const fallback: ConnectionOptions = {
    host: config.redisHost,
    port: config.redisPort,
    maxRetriesPerRequest: null,
  };

  let url: URL;
  try {
    url = new URL(redisUrl);
  } catch (err) {
    logger.warn('Invalid REDIS_URL, falling back to host/port', { error: errorMessage(err) });
    return fallback;
  }

  if (url.protocol !== 'redis:' && url.protocol !== 'rediss:') {
    logger.warn('REDIS_URL is not a redis:// URL, falling back to host/port', { protocol: url.protocol });
    return fallback;
  }

  return {
    host: url.hostname,
    port: url.port ? Number(url.port) : DEFAULT_REDIS_PORT,
    ...(url.username ? { username: decodeURIComponent(url.username) } : {}),
    ...(url.password ? { password: decodeURIComponent(url.password) } : {}),
    ...(url.protocol === 'rediss:' ? { tls: {} } : {}),
    // Blocking worker connections must not give up on a slow command
    maxRetriesPerRequest: null,
  };
}

// ============================================================================
// Retry Policy
// ============================================================================

export type JobFailureDisposition = 'retry' | 'discard';

/**
 * Only a failed move into the upload folders is retried. Classification
 * failures are already filed into the processing-error bucket, and a bad
 * payload or a missing source file fails the same way on every attempt.
 */
export function classifyJobFailure(error: unknown): JobFailureDisposition {
  return error instanceof FilingError ? 'retry' : 'discard';
}

/**
 * Wrap a processor so that every failure the policy discards reaches BullMQ
 * as an UnrecoverableError.
 */
export function withRetryPolicy<TJob, TResult>(
  processor: (job: TJob) => Promise<TResult>
): (job: TJob) => Promise<TResult> {
  return async (job) => {
    try {
      return await processor(job);
    } catch (error) {
      if (error instanceof UnrecoverableError || classifyJobFailure(error) === 'retry') {
        throw error;
      }
      throw new UnrecoverableError(errorMessage(error));
    }
  };
}

// ============================================================================
// Queue & Worker
// ============================================================================

export function classifyJobOptions(): DefaultJobOptions {
  return {
    attempts: config.maxJobAttempts,
    backoff: { type: 'exponential', delay: config.backoffBaseMs },
    removeOnComplete: { count: 100 },
    removeOnFail: { count: 1000 },
  };
}

export function createClassifyQueue(): Queue<ClassifyDocumentJob> {
  return new Queue<ClassifyDocumentJob>(QUEUE_NAMES.CLASSIFY_DOCUMENT, {
    connection: getRedisConnection(),
    defaultJobOptions: classifyJobOptions(),
  });
}

export interface ClassifyWorkerOptions {
  concurrency?: number;
}

export function createClassifyWorker<TResult>(
  processor: (job: Job<ClassifyDocumentJob, TResult>) => Promise<TResult>,
  options: ClassifyWorkerOptions = {}
): Worker<ClassifyDocumentJob, TResult> {
  const concurrency = options.concurrency ?? config.workerConcurrency;
  const worker = new Worker<ClassifyDocumentJob, TResult>(
    QUEUE_NAMES.CLASSIFY_DOCUMENT,
    withRetryPolicy(processor),
    { connection: getRedisConnection(), concurrency }
  );

  worker.on('completed', (job) => {
    logger.info('Job completed', {
      jobId: job.id,
      source_filename: job.data.source_filename,
    });
  });

  worker.on('failed', (job, err) => {
    logger.error('Job failed', err, {
      jobId: job?.id,
      source_filename: job?.data.source_filename,
      attempts: job?.attemptsMade,
      disposition: classifyJobFailure(err),
    });
  });

  worker.on('error', (err) => {
    logger.error('Worker error', err, { queue: QUEUE_NAMES.CLASSIFY_DOCUMENT });
  });

  logger.info('Worker started', { queue: QUEUE_NAMES.CLASSIFY_DOCUMENT, concurrency });

  return worker;
}

// ============================================================================
// Queue Depth & Backpressure
// ============================================================================

export type QueueState = 'waiting' | 'active' | 'delayed' | 'completed' | 'failed';

export const QUEUE_STATES: readonly QueueState[] = ['waiting', 'active', 'delayed', 'completed', 'failed'];

/** The part of a BullMQ queue that reports job counts */
export interface JobCountSource {
  getJobCounts(...states: QueueState[]): Promise<Record<string, number>>;
}

export type QueueSnapshot = Record<QueueState, number>;

export async function getQueueSnapshot(queue: JobCountSource): Promise<QueueSnapshot> {
  const counts = await queue.getJobCounts(...QUEUE_STATES);
  return {
    waiting: counts.waiting ?? 0,
    active: counts.active ?? 0,
    delayed: counts.delayed ?? 0,
    completed: counts.completed ?? 0,
    failed: counts.failed ?? 0,
  };
}

export interface BackpressureLimits {
  warnAt: number;
  rejectAt: number;
}

export interface BackpressureStatus {
  /** Jobs not yet finished: waiting, delayed (backing off) and active */
  depth: number;
  shouldWarn: boolean;
  shouldReject: boolean;
}

export async function checkBackpressure(
  queue: JobCountSource,
  limits: BackpressureLimits = {
    warnAt: config.maxQueueDepthWarning,
    rejectAt: config.maxQueueDepthReject,
  }
): Promise<BackpressureStatus> {
  const snapshot = await getQueueSnapshot(queue);
  const depth = snapshot.waiting + snapshot.delayed + snapshot.active;

  return {
    depth,
    shouldWarn: depth >= limits.warnAt,
    shouldReject: depth >= limits.rejectAt,
  };
}
