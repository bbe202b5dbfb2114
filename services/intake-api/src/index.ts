/**
 * Intake API
 *
 * POST /scan - Walks an input folder and enqueues every file for classification
 */

import express, { Request, Response, NextFunction } from 'express';
import { ulid } from 'ulid';
import {
  logger,
  config,
  runWithContext,
  getMetrics,
  getMetricsContentType,
  reportQueueMetrics,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  backpressureRejectionsCounter,
  createClassifyQueue,
  checkBackpressure,
  QUEUE_NAMES,
  type ErrorEnvelope,
  type ScanResponse,
} from '@triage/shared';
import { parseScanRequest, scanDirectory } from './lib/scan';

const app = express();
const port = config.intakeApiPort;

const classifyQueue = createClassifyQueue();

// Middleware
app.use(express.json());

// Correlation ID middleware
app.use((req: Request, res: Response, next: NextFunction) => {
  const header = req.headers['x-correlation-id'];
  const correlationId = typeof header === 'string' && header ? header : ulid();
  res.locals.correlationId = correlationId;
  res.setHeader('X-Correlation-Id', correlationId);

  runWithContext({ correlationId }, () => {
    next();
  });
});

// Request timing middleware
app.use((req: Request, res: Response, next: NextFunction) => {
  const start = Date.now();

  res.on('finish', () => {
    const duration = (Date.now() - start) / 1000;
    const routePath: string = req.route?.path ?? req.path;

    httpRequestDurationHistogram.observe(
      { method: req.method, path: routePath, status: res.statusCode.toString() },
      duration
    );
    httpRequestsCounter.inc({
      method: req.method,
      path: routePath,
      status: res.statusCode.toString(),
    });

    logger.info('Request completed', {
      method: req.method,
      path: req.path,
      status: res.statusCode,
      duration_ms: Math.round(duration * 1000),
    });
  });

  next();
});

function correlationIdOf(res: Response): string {
  const value: unknown = res.locals.correlationId;
  return typeof value === 'string' ? value : '';
}

function sendError(res: Response, status: number, code: string, message: string): void {
  const error: ErrorEnvelope = {
    error: { code, message, correlation_id: correlationIdOf(res) },
  };
  res.status(status).json(error);
}

// Health check
app.get('/health', async (req: Request, res: Response) => {
  try {
    // Check Redis connection via queue
    const metrics = await checkBackpressure(classifyQueue);

    res.json({
      status: 'healthy',
      service: 'intake-api',
      queue_depth: metrics.depth,
      timestamp: new Date().toISOString(),
    });
  } catch (error) {
    res.status(503).json({
      status: 'unhealthy',
      service: 'intake-api',
      error: error instanceof Error ? error.message : 'Unknown error',
      timestamp: new Date().toISOString(),
    });
  }
});

// Metrics endpoint
app.get('/metrics', async (req: Request, res: Response) => {
  await reportQueueMetrics([{ name: QUEUE_NAMES.CLASSIFY_DOCUMENT, queue: classifyQueue }]);
  res.setHeader('Content-Type', getMetricsContentType());
  res.send(await getMetrics());
});

/**
 * POST /scan
 * Enqueues every file below the requested directory
 */
app.post('/scan', async (req: Request, res: Response) => {
  const correlationId = correlationIdOf(res);

  const parsed = parseScanRequest(req.body, config.inputFolder);
  if (!parsed.ok) {
    sendError(res, 400, 'invalid_request', parsed.message);
    return;
  }

  try {
    // Check backpressure
    const backpressure = await checkBackpressure(classifyQueue);

    if (backpressure.shouldReject) {
      backpressureRejectionsCounter.inc();
      logger.warn('Request rejected due to backpressure', {
        queue_depth: backpressure.depth,
      });
      sendError(res, 503, 'service_unavailable', 'System is under heavy load. Please retry later.');
      return;
    }

    if (backpressure.shouldWarn) {
      logger.warn('Queue depth approaching threshold', {
        queue_depth: backpressure.depth,
      });
    }

    logger.info('Starting scan', {
      directory: parsed.request.directory,
      max_documents: parsed.request.max_documents,
    });

    const result = await scanDirectory(parsed.request, correlationId, classifyQueue);

    logger.info('Scan finished', { enqueued: result.enqueued, failed: result.failed });

    const response: ScanResponse = {
      correlation_id: correlationId,
      enqueued: result.enqueued,
    };
    res.status(202).json(response);
  } catch (error) {
    logger.error('Scan failed', error);
    sendError(res, 500, 'internal_error', error instanceof Error ? error.message : 'Unknown error');
  }
});

// Start server
const server = app.listen(port, () => {
  logger.info('Intake API started', { port });
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  server.close();
  await classifyQueue.close();
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
