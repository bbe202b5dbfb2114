/**
 * Recognition Collaborators
 *
 * The orchestrator only talks to the outside world through these two
 * interfaces. Production implementations live in the classifier worker; tests
 * supply in-memory fakes.
 */

import type { ImageVariant, RotationAngle } from '../types';

export interface ImageSource {
  /**
   * Decode the first page of a PDF or an image file into a native, unrotated
   * variant. Rejects when the file cannot be turned into an image at all.
   */
  load(filePath: string): Promise<ImageVariant>;

  rotate(image: ImageVariant, angle: RotationAngle): Promise<ImageVariant>;

  upscale(image: ImageVariant, factor: number): Promise<ImageVariant>;
}

export interface RecognizeOptions {
  language: string;
  /** Aborted when the caller's timeout expires */
  signal: AbortSignal;
}

export interface RecognitionEngine {
  readonly name: string;

  /** Raw recognized text; casing is normalized by the caller. */
  recognize(image: ImageVariant, options: RecognizeOptions): Promise<string>;
}
