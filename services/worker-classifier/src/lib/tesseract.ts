/**
 * Tesseract Recognition Engine
 *
 * Runs the tesseract command line on a temporary PNG and returns stdout.
 */

import { execFile } from 'child_process';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { promisify } from 'util';
import { config, type ImageVariant, type RecognitionEngine, type RecognizeOptions } from '@triage/shared';

const execFileAsync = promisify(execFile);

export interface TesseractOptions {
  binaryPath: string;
  /** --oem */
  engineMode: number;
  /** --psm */
  pageSegmentationMode: number;
}

export class TesseractEngine implements RecognitionEngine {
  readonly name = 'tesseract';

  private readonly options: TesseractOptions;

  constructor(options: Partial<TesseractOptions> = {}) {
    this.options = {
      binaryPath: options.binaryPath ?? config.tesseractPath,
      engineMode: options.engineMode ?? config.ocrEngineMode,
      pageSegmentationMode: options.pageSegmentationMode ?? config.ocrPageSegmentationMode,
    };
  }

  async recognize(image: ImageVariant, { language, signal }: RecognizeOptions): Promise<string> {
    const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'triage-ocr-'));

    try {
      const inputPath = path.join(dir, `variant-${image.orientation}-${image.scale}.png`);
      await fs.promises.writeFile(inputPath, image.data);

      const { stdout } = await execFileAsync(
        this.options.binaryPath,
        [
          inputPath,
          'stdout',
          '-l',
          language,
          '--oem',
          String(this.options.engineMode),
          '--psm',
          String(this.options.pageSegmentationMode),
        ],
        { encoding: 'utf-8', maxBuffer: 10 * 1024 * 1024, signal }
      );
      return stdout;
    } finally {
      await fs.promises.rm(dir, { recursive: true, force: true });
    }
  }
}
