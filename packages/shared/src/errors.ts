/**
 * Typed errors raised at the edges of the triage pipeline.
 *
 * The classification core never throws for control flow; these cover
 * configuration problems and collaborator failures that callers must see.
 */

export type TriageErrorCode =
  | 'invalid_keyword_table'
  | 'image_acquisition_failed'
  | 'image_variant_failed'
  | 'recognition_timeout'
  | 'filing_failed';

export class TriageError extends Error {
  readonly code: TriageErrorCode;

  constructor(code: TriageErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class KeywordTableError extends TriageError {
  constructor(message: string) {
    super('invalid_keyword_table', message);
  }
}

/** The source file could not be turned into an image at all. */
export class ImageAcquisitionError extends TriageError {
  constructor(filePath: string, cause?: unknown) {
    super('image_acquisition_failed', `Could not load image from: ${filePath}`, { cause });
  }
}

/** A rotated or upscaled variant could not be produced from a loaded image. */
export class ImageVariantError extends TriageError {
  constructor(description: string, cause?: unknown) {
    super('image_variant_failed', `Could not produce image variant: ${description}`, { cause });
  }
}

export class RecognitionTimeoutError extends TriageError {
  constructor(timeoutMs: number) {
    super('recognition_timeout', `Recognition did not finish within ${timeoutMs}ms`);
  }
}

export class FilingError extends TriageError {
  constructor(message: string, cause?: unknown) {
    super('filing_failed', message, { cause });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
