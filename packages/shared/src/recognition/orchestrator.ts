/**
 * Recognition Retry Orchestrator
 *
 * Drives the attempt plan for one document: produce the variant, recognize it
 * under a timeout, classify the text, and stop at the first attempt that
 * yields a category other than "unclassified". A failed or timed-out
 * recognition counts as empty text and the ladder moves on.
 */

import { config } from '../config';
import { ImageVariantError, RecognitionTimeoutError, errorMessage } from '../errors';
import { logger } from '../logger';
import {
  documentsClassifiedCounter,
  recognitionAttemptsCounter,
  recognitionDurationHistogram,
} from '../metrics';
import { findFirstMatch, normalizeRecognizedText } from '../classification/classifier';
import { defaultKeywordTable, type KeywordTable } from '../classification/keyword-table';
import { extractIdentifier } from '../identifiers/extractor';
import {
  PROCESSING_ERROR,
  UNCLASSIFIED,
  type AttemptRecord,
  type AttemptStatus,
  type Category,
  type ClassificationOutcome,
  type ImageVariant,
  type RecognitionAttempt,
} from '../types';
import { buildAttemptPlan, describeAttempt } from './attempt-plan';
import { withTimeout } from './timeout';
import type { ImageSource, RecognitionEngine } from './types';

export interface OrchestratorOptions {
  imageSource: ImageSource;
  engine: RecognitionEngine;
  keywordTable?: KeywordTable;
  /** Recognition language passed to the engine */
  language?: string;
  /** Deadline for a single recognition call */
  timeoutMs?: number;
  upscaleFactor?: number;
}

interface RecognitionRun {
  text: string;
  status: AttemptStatus;
  durationMs: number;
}

export class RecognitionOrchestrator {
  readonly plan: readonly RecognitionAttempt[];

  private readonly imageSource: ImageSource;
  private readonly engine: RecognitionEngine;
  private readonly keywordTable: KeywordTable;
  private readonly language: string;
  private readonly timeoutMs: number;

  constructor(options: OrchestratorOptions) {
    this.imageSource = options.imageSource;
    this.engine = options.engine;
    this.keywordTable = options.keywordTable ?? defaultKeywordTable();
    this.language = options.language ?? config.ocrLanguage;
    this.timeoutMs = options.timeoutMs ?? config.recognitionTimeoutMs;
    if (!Number.isFinite(this.timeoutMs) || this.timeoutMs <= 0) {
      throw new RangeError(`Recognition timeout must be a positive number of milliseconds, got ${this.timeoutMs}`);
    }
    this.plan = buildAttemptPlan({ upscaleFactor: options.upscaleFactor ?? config.upscaleFactor });
  }

  /**
   * Classify the document at filePath. A file that cannot be loaded yields a
   * "processing-error" outcome without any recognition call.
   */
  async classifyDocument(filePath: string): Promise<ClassificationOutcome> {
    let source: ImageVariant;
    try {
      source = await this.imageSource.load(filePath);
    } catch (error) {
      logger.error('Image acquisition failed', error, { filePath });
      return this.finish(PROCESSING_ERROR, '', [], {
        stage: 'acquisition',
        message: errorMessage(error),
      });
    }

    return this.classifyImage(source);
  }

  /**
   * Run the attempt plan over an already loaded source image.
   *
   * @throws ImageVariantError when a rotated or upscaled variant cannot be produced
   */
  async classifyImage(source: ImageVariant): Promise<ClassificationOutcome> {
    const attempts: AttemptRecord[] = [];
    let lastRecognizedText = '';

    for (const attempt of this.plan) {
      const variant = await this.produceVariant(source, attempt);
      const run = await this.recognize(variant, attempt);
      const match = findFirstMatch(run.text, this.keywordTable);
      const category = match?.category ?? UNCLASSIFIED;

      attempts.push(
        Object.freeze({
          attempt,
          status: run.status,
          category,
          textLength: run.text.length,
          durationMs: run.durationMs,
        })
      );

      logger.debug('Recognition attempt finished', {
        attempt: describeAttempt(attempt),
        status: run.status,
        category,
        text_length: run.text.length,
        duration_ms: run.durationMs,
      });

      if (run.text.trim().length > 0) {
        lastRecognizedText = run.text;
      }

      if (match) {
        logger.debug('Matched keywords', { category, keywords: match.keywords });
        return this.finish(category, run.text, attempts);
      }
    }

    logger.info('No keyword matched after all attempts', { attempts: attempts.length });
    return this.finish(UNCLASSIFIED, lastRecognizedText, attempts);
  }

  private async produceVariant(source: ImageVariant, attempt: RecognitionAttempt): Promise<ImageVariant> {
    try {
      if (attempt.kind === 'rotation') {
        return await this.imageSource.rotate(source, attempt.angle);
      }
      return await this.imageSource.upscale(source, attempt.factor);
    } catch (error) {
      throw new ImageVariantError(describeAttempt(attempt), error);
    }
  }

  private async recognize(variant: ImageVariant, attempt: RecognitionAttempt): Promise<RecognitionRun> {
    const startTime = Date.now();
    let text = '';
    let status: AttemptStatus = 'recognized';

    try {
      const raw = await withTimeout(this.timeoutMs, (signal) =>
        this.engine.recognize(variant, { language: this.language, signal })
      );
      text = normalizeRecognizedText(raw);
    } catch (error) {
      status = error instanceof RecognitionTimeoutError ? 'timeout' : 'failed';
      logger.warn('Recognition attempt failed, continuing', {
        attempt: describeAttempt(attempt),
        engine: this.engine.name,
        status,
        error: errorMessage(error),
      });
    }

    const durationMs = Date.now() - startTime;
    recognitionAttemptsCounter.inc({ attempt_kind: attempt.kind, status });
    recognitionDurationHistogram.observe({ attempt_kind: attempt.kind }, durationMs / 1000);

    return { text, status, durationMs };
  }

  private finish(
    category: Category,
    text: string,
    attempts: AttemptRecord[],
    failure?: ClassificationOutcome['failure']
  ): ClassificationOutcome {
    const identifier = text ? extractIdentifier(text) : null;

    documentsClassifiedCounter.inc({ category, identifier_kind: identifier?.kind ?? 'none' });
    if (category !== PROCESSING_ERROR) {
      logger.info('Document classified', {
        category,
        identifier_kind: identifier?.kind ?? null,
        attempts: attempts.length,
      });
    }

    return Object.freeze({
      category,
      identifier: identifier ? Object.freeze(identifier) : null,
      attempts: Object.freeze(attempts),
      ...(failure ? { failure: Object.freeze(failure) } : {}),
    });
  }
}
