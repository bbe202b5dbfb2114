/**
 * In-memory collaborators for recognition tests.
 */

import type {
  ImageSource,
  ImageVariant,
  RecognitionEngine,
  RecognizeOptions,
  RotationAngle,
} from '@triage/shared';

export class FakeImageSource implements ImageSource {
  readonly loads: string[] = [];
  readonly rotations: Array<{ from: ImageVariant; angle: RotationAngle }> = [];
  readonly upscales: Array<{ from: ImageVariant; factor: number }> = [];

  constructor(
    private readonly behaviour: {
      loadError?: Error;
      rotateError?: { angle: RotationAngle; error: Error };
    } = {}
  ) {}

  async load(filePath: string): Promise<ImageVariant> {
    this.loads.push(filePath);
    if (this.behaviour.loadError) throw this.behaviour.loadError;
    return { data: Buffer.from('source'), orientation: 0, scale: 'native' };
  }

  async rotate(image: ImageVariant, angle: RotationAngle): Promise<ImageVariant> {
    this.rotations.push({ from: image, angle });
    if (this.behaviour.rotateError && this.behaviour.rotateError.angle === angle) {
      throw this.behaviour.rotateError.error;
    }
    return { data: Buffer.from(`rotated-${angle}`), orientation: angle, scale: image.scale };
  }

  async upscale(image: ImageVariant, factor: number): Promise<ImageVariant> {
    this.upscales.push({ from: image, factor });
    return { data: Buffer.from(`upscaled-${factor}`), orientation: image.orientation, scale: 'upscaled' };
  }
}

/**
 * One scripted response per recognition call:
 * - string: recognized text
 * - Error: the engine fails
 * - HANG: never settles on its own; rejects once the signal is aborted
 */
export const HANG = Symbol('hang');

export type ScriptedResponse = string | Error | typeof HANG;

export class ScriptedEngine implements RecognitionEngine {
  readonly name = 'scripted';
  readonly calls: Array<{ image: ImageVariant; options: RecognizeOptions }> = [];

  constructor(private readonly responses: ScriptedResponse[]) {}

  async recognize(image: ImageVariant, options: RecognizeOptions): Promise<string> {
    const response = this.responses[this.calls.length] ?? '';
    this.calls.push({ image, options });

    if (response === HANG) {
      return new Promise<string>((_, reject) => {
        options.signal.addEventListener('abort', () => reject(new Error('aborted')));
      });
    }
    if (response instanceof Error) {
      throw response;
    }
    return response;
  }
}
