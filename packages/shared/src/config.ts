/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 */

export interface Config {
  // Redis
  redisHost: string;
  redisPort: number;
  redisUrl: string;

  // Queue & Worker
  workerConcurrency: number;
  maxJobAttempts: number;
  backoffBaseMs: number;

  // Backpressure Controls
  maxQueueDepthWarning: number;
  maxQueueDepthReject: number;

  // Folders
  uploadFolder: string;
  inputFolder: string;

  // Recognition
  ocrLanguage: string;
  ocrEngineMode: number;
  ocrPageSegmentationMode: number;
  recognitionTimeoutMs: number;
  upscaleFactor: number;
  pdfRenderDpi: number;
  tesseractPath: string;
  pdftoppmPath: string;

  // Classification
  keywordTablePath: string | null;

  // Ports
  intakeApiPort: number;
  workerMetricsPort: number;
}

export const config: Config = {
  // Redis
  redisHost: process.env.REDIS_HOST || 'redis',
  redisPort: parseInt(process.env.REDIS_PORT || '6379', 10),
  redisUrl: process.env.REDIS_URL || 'redis://redis:6379',

  // Queue & Worker
  workerConcurrency: parseInt(process.env.WORKER_CONCURRENCY || '2', 10),
  maxJobAttempts: parseInt(process.env.BULLMQ_DEFAULT_ATTEMPTS || '3', 10),
  backoffBaseMs: parseInt(process.env.BACKOFF_BASE_MS || '2000', 10),

  // Backpressure Controls
  maxQueueDepthWarning: parseInt(process.env.MAX_QUEUE_DEPTH_WARNING || '5000', 10),
  maxQueueDepthReject: parseInt(process.env.MAX_QUEUE_DEPTH_REJECT || '10000', 10),

  // Folders
  uploadFolder: process.env.UPLOAD_FOLDER || 'uploads',
  inputFolder: process.env.INPUT_FOLDER || 'Documents',

  // Recognition
  ocrLanguage: process.env.OCR_LANGUAGE || 'tur',
  ocrEngineMode: parseInt(process.env.OCR_ENGINE_MODE || '3', 10),
  ocrPageSegmentationMode: parseInt(process.env.OCR_PAGE_SEGMENTATION_MODE || '6', 10),
  recognitionTimeoutMs: parseInt(process.env.RECOGNITION_TIMEOUT_MS || '60000', 10),
  upscaleFactor: parseFloat(process.env.UPSCALE_FACTOR || '2'),
  pdfRenderDpi: parseInt(process.env.PDF_RENDER_DPI || '300', 10),
  tesseractPath: process.env.TESSERACT_PATH || 'tesseract',
  pdftoppmPath: process.env.PDFTOPPM_PATH || 'pdftoppm',

  // Classification
  keywordTablePath: process.env.KEYWORD_TABLE_PATH || null,

  // Ports
  intakeApiPort: parseInt(process.env.PORT || '8080', 10),
  workerMetricsPort: parseInt(process.env.METRICS_PORT || '9091', 10),
};
