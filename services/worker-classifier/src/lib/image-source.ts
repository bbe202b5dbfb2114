/**
 * Image Source
 *
 * Decodes documents into PNG rasters with sharp. PDFs are rendered first page
 * only through poppler's pdftoppm.
 */

import { execFile } from 'child_process';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { promisify } from 'util';
import sharp from 'sharp';
import {
  config,
  ImageAcquisitionError,
  logger,
  type ImageSource,
  type ImageVariant,
  type RotationAngle,
} from '@triage/shared';

const execFileAsync = promisify(execFile);

export interface SharpImageSourceOptions {
  pdftoppmPath: string;
  dpi: number;
  renderTimeoutMs: number;
}

export class SharpImageSource implements ImageSource {
  private readonly options: SharpImageSourceOptions;

  constructor(options: Partial<SharpImageSourceOptions> = {}) {
    this.options = {
      pdftoppmPath: options.pdftoppmPath ?? config.pdftoppmPath,
      dpi: options.dpi ?? config.pdfRenderDpi,
      renderTimeoutMs: options.renderTimeoutMs ?? 90_000,
    };
  }

  async load(filePath: string): Promise<ImageVariant> {
    try {
      const raw =
        path.extname(filePath).toLowerCase() === '.pdf'
          ? await this.renderFirstPdfPage(filePath)
          : await fs.promises.readFile(filePath);

      const data = await sharp(raw).png().toBuffer();
      return { data, orientation: 0, scale: 'native' };
    } catch (err) {
      throw new ImageAcquisitionError(filePath, err);
    }
  }

  async rotate(image: ImageVariant, angle: RotationAngle): Promise<ImageVariant> {
    if (angle === 0) {
      return { ...image, orientation: 0 };
    }
    const data = await sharp(image.data).rotate(angle).png().toBuffer();
    return { data, orientation: angle, scale: image.scale };
  }

  async upscale(image: ImageVariant, factor: number): Promise<ImageVariant> {
    const { width, height } = await sharp(image.data).metadata();
    if (!width || !height) {
      throw new Error('Image has no readable dimensions');
    }

    const data = await sharp(image.data)
      .resize(Math.round(width * factor), Math.round(height * factor), { kernel: sharp.kernel.cubic })
      .png()
      .toBuffer();
    return { data, orientation: image.orientation, scale: 'upscaled' };
  }

  private async renderFirstPdfPage(filePath: string): Promise<Buffer> {
    const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'triage-pdf-'));

    try {
      const outBase = path.join(dir, 'page');
      // -singlefile ensures a stable output name
      await execFileAsync(
        this.options.pdftoppmPath,
        ['-f', '1', '-l', '1', '-png', '-r', String(this.options.dpi), '-singlefile', filePath, outBase],
        { timeout: this.options.renderTimeoutMs }
      );

      const png = await fs.promises.readFile(`${outBase}.png`);
      logger.debug('Rendered PDF first page', { filePath, dpi: this.options.dpi, bytes: png.length });
      return png;
    } finally {
      await fs.promises.rm(dir, { recursive: true, force: true });
    }
  }
}
