/**
 * Recognition Attempt Plan
 *
 * The fixed ladder of recognition attempts for one document: the four
 * rotations of the source image in order, then a single upscaled pass over
 * the unrotated source.
 */

import type { RecognitionAttempt, RotationAngle } from '../types';

export const ROTATION_ANGLES: readonly RotationAngle[] = [0, 90, 180, 270];

export const DEFAULT_UPSCALE_FACTOR = 2;

export const MAX_RECOGNITION_ATTEMPTS = ROTATION_ANGLES.length + 1;

export interface AttemptPlanOptions {
  upscaleFactor?: number;
}

export function buildAttemptPlan(options: AttemptPlanOptions = {}): readonly RecognitionAttempt[] {
  const factor = options.upscaleFactor ?? DEFAULT_UPSCALE_FACTOR;
  if (!Number.isFinite(factor) || factor <= 1) {
    throw new RangeError(`Upscale factor must be a finite number greater than 1, got ${factor}`);
  }

  const rotations = ROTATION_ANGLES.map(
    (angle): RecognitionAttempt => Object.freeze({ kind: 'rotation', angle })
  );
  const upscale: RecognitionAttempt = Object.freeze({ kind: 'upscale', factor });

  return Object.freeze([...rotations, upscale]);
}

/**
 * Short label for logs and metrics, e.g. "rotation:90" or "upscale:2x".
 */
export function describeAttempt(attempt: RecognitionAttempt): string {
  switch (attempt.kind) {
    case 'rotation':
      return `rotation:${attempt.angle}`;
    case 'upscale':
      return `upscale:${attempt.factor}x`;
  }
}
